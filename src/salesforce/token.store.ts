import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { readJsonFile } from '../config/json-config';
import { SalesforceToken, SalesforceTokenSchema } from '../config/schemas';
import { ConfigFileError, MissingTokenError } from '../common/errors';
import { writeJsonAtomic } from '../common/files';

/**
 * File-backed OAuth2 token. Every new token (authorization or refresh) is
 * written back so the next run starts from it.
 */
@Injectable()
export class TokenStore {
  private readonly logger = new Logger(TokenStore.name);
  private token?: SalesforceToken;

  constructor(private readonly configService: ConfigService) {}

  get tokenPath(): string {
    return this.configService.getOrThrow<AppConfig>(APP_CONFIG).paths.token;
  }

  async load(): Promise<SalesforceToken> {
    if (this.token) {
      return this.token;
    }

    let data: unknown;
    try {
      data = await readJsonFile(this.tokenPath);
    } catch (error) {
      if (error instanceof ConfigFileError) {
        this.logger.warn(error.message);
        throw new MissingTokenError(this.tokenPath);
      }
      throw error;
    }

    const parsed = SalesforceTokenSchema.safeParse(data);
    if (!parsed.success) {
      throw new MissingTokenError(this.tokenPath);
    }

    this.token = parsed.data;
    return this.token;
  }

  async save(token: SalesforceToken): Promise<void> {
    this.logger.log('Saving OAuth2 token');
    await writeJsonAtomic(this.tokenPath, token, 0o600);
    this.token = token;
  }
}
