import { CommandHandlers, DEFAULT_CHAT_USER, runCli } from './program';

describe('runCli', () => {
  let handlers: {
    [K in keyof CommandHandlers]: jest.Mock;
  };

  beforeEach(() => {
    handlers = {
      sync: jest.fn().mockResolvedValue(0),
      authorize: jest.fn().mockResolvedValue(0),
      get: jest.fn().mockResolvedValue(0),
      apiVersions: jest.fn().mockResolvedValue(0),
      chat: jest.fn().mockResolvedValue(0),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const run = (...args: string[]) =>
    runCli(['node', 'sforce-flowdock', ...args], handlers);

  it('should sync by default', async () => {
    await expect(run()).resolves.toBe(0);

    expect(handlers.sync).toHaveBeenCalledWith(undefined);
  });

  it('should pass the config directory to sync', async () => {
    await run('sync', '/etc/sforce');

    expect(handlers.sync).toHaveBeenCalledWith('/etc/sforce');
  });

  it('should return the exit code of the command', async () => {
    handlers.sync.mockResolvedValue(1);

    await expect(run('sync')).resolves.toBe(1);
  });

  it('should run authorize', async () => {
    await run('authorize', 'cfg');

    expect(handlers.authorize).toHaveBeenCalledWith('cfg');
  });

  it('should run get with a URL', async () => {
    await run('get', 'sobjects/Opportunity/describe');

    expect(handlers.get).toHaveBeenCalledWith(
      'sobjects/Opportunity/describe',
      undefined,
    );
  });

  it('should run api-versions', async () => {
    await run('api-versions');

    expect(handlers.apiVersions).toHaveBeenCalledWith(undefined);
  });

  it('should run chat with the default user', async () => {
    await run('chat', 'Web', 'Deploy done', 'cfg');

    expect(handlers.chat).toHaveBeenCalledWith(
      'Web',
      'Deploy done',
      { user: DEFAULT_CHAT_USER, tags: [] },
      'cfg',
    );
  });

  it('should collect chat options', async () => {
    await run('chat', 'Web', 'hi', '--user', 'Bot', '-t', 'a', '-t', 'b');

    expect(handlers.chat).toHaveBeenCalledWith(
      'Web',
      'hi',
      { user: 'Bot', tags: ['a', 'b'] },
      undefined,
    );
  });

  it('should fail on missing arguments', async () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await expect(run('get')).resolves.toBe(1);
    expect(handlers.get).not.toHaveBeenCalled();
  });
});
