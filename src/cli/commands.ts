import { INestApplicationContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { SalesforceApiError, errorMessage } from '../common/errors';
import { SingleInstanceLock } from '../common/single-instance.lock';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { FlowdockService } from '../flowdock/flowdock.service';
import { SalesforceAuthService } from '../salesforce/salesforce-auth.service';
import { SalesforceClient } from '../salesforce/salesforce.client';
import { SyncService } from '../sync/sync.service';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export type ContextFactory = (
  configDir?: string,
) => Promise<INestApplicationContext>;

export interface CliIO {
  print(text: string): void;
  prompt(question: string): Promise<string>;
}

export type InstanceLock = Pick<SingleInstanceLock, 'acquire' | 'release'>;

export interface ChatOptions {
  user: string;
  tags: string[];
}

/**
 * Accepts either the bare authorization code or the whole URL the browser
 * was redirected to. A URL must carry the `state` we sent.
 */
export function parseAuthorizationResponse(
  input: string,
  expectedState: string,
): string {
  const trimmed = input.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    if (!trimmed) {
      throw new SalesforceApiError('No authorization code given');
    }
    return trimmed;
  }

  const params = new URL(trimmed).searchParams;
  const error = params.get('error');
  if (error) {
    throw new SalesforceApiError(
      `Authorization denied: ${params.get('error_description') ?? error}`,
    );
  }
  if (params.get('state') !== expectedState) {
    throw new SalesforceApiError('OAuth2 state mismatch');
  }
  const code = params.get('code');
  if (!code) {
    throw new SalesforceApiError('Redirect URL has no authorization code');
  }
  return code;
}

export class CliCommands {
  private readonly logger = new Logger('Cli');

  constructor(
    private readonly createContext: ContextFactory,
    private readonly io: CliIO,
    private readonly createLock: (port: number) => InstanceLock = (port) =>
      new SingleInstanceLock(port),
  ) {}

  sync(configDir?: string): Promise<number> {
    return this.withContext(configDir, async (app) => {
      const { lockPort } = app
        .get(ConfigService)
        .getOrThrow<AppConfig>(APP_CONFIG);
      const lock = this.createLock(lockPort);

      if (!(await lock.acquire())) {
        this.logger.warn(
          `Another instance holds the lock on port ${lockPort}; exiting`,
        );
        return EXIT_OK;
      }
      try {
        await app.get(SyncService).run();
        return EXIT_OK;
      } finally {
        await lock.release();
      }
    });
  }

  authorize(configDir?: string): Promise<number> {
    return this.withContext(configDir, async (app) => {
      const auth = app.get(SalesforceAuthService);
      const state = randomBytes(16).toString('hex');

      this.io.print('Open this URL in a browser and allow access:');
      this.io.print(await auth.getAuthorizationUrl(state));
      const answer = await this.io.prompt(
        'Paste the URL you were redirected to (or just the code): ',
      );

      const token = await auth.exchangeCode(
        parseAuthorizationResponse(answer, state),
      );
      this.io.print(`Authorized for ${token.instance_url}`);
      return EXIT_OK;
    });
  }

  get(url: string, configDir?: string): Promise<number> {
    return this.withContext(configDir, async (app) => {
      const data = await app.get(SalesforceClient).getJson(url);
      this.io.print(JSON.stringify(data, null, 2));
      return EXIT_OK;
    });
  }

  apiVersions(configDir?: string): Promise<number> {
    return this.withContext(configDir, async (app) => {
      const versions = await app.get(SalesforceClient).getApiVersions();
      for (const { version, label, url } of versions) {
        this.io.print(`${version}\t${label}\t${url}`);
      }
      return EXIT_OK;
    });
  }

  chat(
    team: string,
    message: string,
    options: ChatOptions,
    configDir?: string,
  ): Promise<number> {
    return this.withContext(configDir, async (app) => {
      const flowdock = app.get(FlowdockService);
      const flowToken = await flowdock.resolveFlow(team);
      if (!flowToken) {
        return EXIT_FAILURE;
      }
      await flowdock.chat(flowToken, options.user, message, options.tags);
      return EXIT_OK;
    });
  }

  private async withContext(
    configDir: string | undefined,
    command: (app: INestApplicationContext) => Promise<number>,
  ): Promise<number> {
    let app: INestApplicationContext | undefined;
    try {
      app = await this.createContext(configDir);
      return await command(app);
    } catch (error) {
      this.logger.error(errorMessage(error));
      return EXIT_FAILURE;
    } finally {
      await app?.close();
    }
  }
}
