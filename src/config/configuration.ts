import { registerAs } from '@nestjs/config';
import { join, resolve } from 'path';

export const APP_CONFIG = 'app';

export const CONFIG_FILE_NAMES = {
  salesforce: 'sforce-config.json',
  token: 'sforce-token.json',
  flowdock: 'flowdock-config.json',
  limits: 'limits.json',
  state: 'state.json',
  opportunities: 'opportunities.json',
} as const;

export type ConfigFileKey = keyof typeof CONFIG_FILE_NAMES;

export interface AppConfig {
  configDir: string;
  paths: Record<ConfigFileKey, string>;
  lockPort: number;
  pushgatewayUrl?: string;
  logLevel: string;
  logFile?: string;
}

export const DEFAULT_LOCK_PORT = 19876;

function parsePort(value: string | undefined): number {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536
    ? port
    : DEFAULT_LOCK_PORT;
}

/**
 * Build the application config from the environment.
 * `configDir` comes from the CLI and wins over CONFIG_DIR.
 */
export function buildAppConfig(
  configDir: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const dir = resolve(configDir ?? env.CONFIG_DIR ?? 'config');
  const paths: Record<ConfigFileKey, string> = {
    salesforce: join(dir, CONFIG_FILE_NAMES.salesforce),
    token: join(dir, CONFIG_FILE_NAMES.token),
    flowdock: join(dir, CONFIG_FILE_NAMES.flowdock),
    limits: join(dir, CONFIG_FILE_NAMES.limits),
    state: join(dir, CONFIG_FILE_NAMES.state),
    opportunities: join(dir, CONFIG_FILE_NAMES.opportunities),
  };

  return {
    configDir: dir,
    paths,
    lockPort: parsePort(env.LOCK_PORT),
    pushgatewayUrl: env.PUSHGATEWAY_URL || undefined,
    logLevel: env.LOG_LEVEL ?? 'info',
    logFile: env.LOG_FILE || undefined,
  };
}

export const appConfig = (configDir?: string) =>
  registerAs(APP_CONFIG, () => buildAppConfig(configDir));
