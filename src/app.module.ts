import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule, Params } from 'nestjs-pino';
import { stdTimeFunctions } from 'pino';
import { CommonModule } from './common/common.module';
import {
  AppConfig,
  appConfig,
  buildAppConfig,
} from './config/configuration';
import { FlowdockModule } from './flowdock/flowdock.module';
import { SalesforceModule } from './salesforce/salesforce.module';
import { StateModule } from './state/state.module';
import { SyncModule } from './sync/sync.module';

export interface AppModuleOptions {
  configDir?: string;
}

export const REDACTED_PATHS = [
  'access_token',
  'refresh_token',
  'client_secret',
  '*.access_token',
  '*.refresh_token',
  '*.client_secret',
  'flowToken',
];

export function loggerParams(config: AppConfig): Params {
  const transport = config.logFile
    ? { target: 'pino/file', options: { destination: config.logFile, mkdir: true } }
    : process.env.NODE_ENV !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined;

  return {
    pinoHttp: {
      level: config.logLevel,
      timestamp: stdTimeFunctions.isoTime,
      transport,
      redact: REDACTED_PATHS,
    },
  };
}

@Module({})
export class AppModule {
  static register(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [appConfig(options.configDir)],
        }),
        LoggerModule.forRoot(loggerParams(buildAppConfig(options.configDir))),
        CommonModule,
        SalesforceModule,
        FlowdockModule,
        StateModule,
        SyncModule,
      ],
    };
  }
}
