import { buildAppConfig } from './config/configuration';
import { REDACTED_PATHS, loggerParams } from './app.module';

describe('loggerParams', () => {
  const nodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = nodeEnv;
  });

  it('should write to LOG_FILE when set', () => {
    const params = loggerParams(
      buildAppConfig('/etc/sf', { LOG_FILE: '/var/log/sf.log', LOG_LEVEL: 'warn' }),
    );

    expect(params.pinoHttp).toMatchObject({
      level: 'warn',
      transport: {
        target: 'pino/file',
        options: { destination: '/var/log/sf.log', mkdir: true },
      },
      redact: REDACTED_PATHS,
    });
  });

  it('should pretty-print outside production', () => {
    process.env.NODE_ENV = 'development';

    const params = loggerParams(buildAppConfig('/etc/sf', {}));

    expect(params.pinoHttp).toMatchObject({
      level: 'info',
      transport: { target: 'pino-pretty', options: { colorize: true } },
    });
  });

  it('should log plain JSON in production', () => {
    process.env.NODE_ENV = 'production';

    const params = loggerParams(buildAppConfig('/etc/sf', {}));

    expect(params.pinoHttp).toMatchObject({ transport: undefined });
  });
});
