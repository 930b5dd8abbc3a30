import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { readJsonConfig } from '../config/json-config';
import {
  SalesforceConfig,
  SalesforceConfigSchema,
  SalesforceToken,
  SalesforceTokenSchema,
} from '../config/schemas';
import { SalesforceApiError, errorMessage } from '../common/errors';
import { TokenStore } from './token.store';

export const OAUTH_SCOPES = ['chatter_api', 'api', 'refresh_token'];

/**
 * OAuth2 web-server flow and token refresh against the SalesForce login
 * host. SalesForce tokens carry no expiry, so refresh is driven by the
 * client when the API rejects a session.
 */
@Injectable()
export class SalesforceAuthService {
  private readonly logger = new Logger(SalesforceAuthService.name);
  private config?: Promise<SalesforceConfig>;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
    private readonly tokenStore: TokenStore,
  ) {}

  getConfig(): Promise<SalesforceConfig> {
    if (!this.config) {
      const { paths } = this.configService.getOrThrow<AppConfig>(APP_CONFIG);
      this.config = readJsonConfig(paths.salesforce, SalesforceConfigSchema);
    }
    return this.config;
  }

  async getAuthorizationUrl(state: string): Promise<string> {
    const config = await this.getConfig();
    const url = new URL('/services/oauth2/authorize', config.loginUrl);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', config.client_id);
    url.searchParams.set('redirect_uri', config.redirect_uri);
    url.searchParams.set('scope', OAUTH_SCOPES.join(' '));
    url.searchParams.set('state', state);
    return url.toString();
  }

  async exchangeCode(code: string): Promise<SalesforceToken> {
    const config = await this.getConfig();
    this.logger.log('Exchanging authorization code for a token');
    const token = await this.requestToken(config, {
      grant_type: 'authorization_code',
      code,
      client_id: config.client_id,
      client_secret: config.client_secret,
      redirect_uri: config.redirect_uri,
    });
    await this.tokenStore.save(token);
    this.logger.log('OAuth2 flow completed successfully');
    return token;
  }

  async refresh(): Promise<SalesforceToken> {
    const config = await this.getConfig();
    const current = await this.tokenStore.load();
    if (!current.refresh_token) {
      throw new SalesforceApiError(
        'Access token expired and no refresh_token is stored',
      );
    }

    this.logger.log('Refreshing SalesForce access token');
    const refreshed = await this.requestToken(config, {
      grant_type: 'refresh_token',
      refresh_token: current.refresh_token,
      client_id: config.client_id,
      client_secret: config.client_secret,
    });

    // Refresh responses omit refresh_token; keep the one we have
    const token: SalesforceToken = { ...current, ...refreshed };
    await this.tokenStore.save(token);
    return token;
  }

  private async requestToken(
    config: SalesforceConfig,
    params: Record<string, string>,
  ): Promise<SalesforceToken> {
    const tokenUrl = new URL('/services/oauth2/token', config.loginUrl);
    const body = new URLSearchParams(params);

    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(tokenUrl.toString(), body.toString(), {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        }),
      );
      const parsed = SalesforceTokenSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new SalesforceApiError('Unexpected token endpoint response');
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof SalesforceApiError) {
        throw error;
      }
      if (isAxiosError<{ error?: string; error_description?: string }>(error)) {
        const data = error.response?.data;
        throw new SalesforceApiError(
          `Token request failed: ${data?.error_description ?? error.message}`,
          error.response?.status,
          data?.error,
        );
      }
      throw new SalesforceApiError(`Token request failed: ${errorMessage(error)}`);
    }
  }
}
