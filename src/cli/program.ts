import { Command, CommanderError } from 'commander';
import { CliCommands, EXIT_OK } from './commands';

export const PROGRAM_NAME = 'sforce-flowdock';
export const DEFAULT_CHAT_USER = 'SalesForce';

export type CommandHandlers = Pick<
  CliCommands,
  'sync' | 'authorize' | 'get' | 'apiVersions' | 'chat'
>;

const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

export function createProgram(
  handlers: CommandHandlers,
  onExit: (code: number) => void,
): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description(
      'Post new and updated SalesForce opportunities and Chatter to Flowdock',
    )
    .exitOverride();

  program
    .command('sync [configDir]', { isDefault: true })
    .description('Post opportunity changes and Chatter since the last run')
    .action(async (configDir?: string) => {
      onExit(await handlers.sync(configDir));
    });

  program
    .command('authorize [configDir]')
    .description('Run the OAuth2 flow and store a SalesForce token')
    .action(async (configDir?: string) => {
      onExit(await handlers.authorize(configDir));
    });

  program
    .command('get <url> [configDir]')
    .description('Print JSON from a SalesForce REST URL')
    .action(async (url: string, configDir?: string) => {
      onExit(await handlers.get(url, configDir));
    });

  program
    .command('api-versions [configDir]')
    .description('List the REST API versions of the SalesForce instance')
    .action(async (configDir?: string) => {
      onExit(await handlers.apiVersions(configDir));
    });

  program
    .command('chat <team> <message> [configDir]')
    .description("Post a chat message to a team's flow")
    .option('-u, --user <name>', 'external user name', DEFAULT_CHAT_USER)
    .option('-t, --tag <tag>', 'tag to attach (repeatable)', collect, [])
    .action(
      async (
        team: string,
        message: string,
        configDir: string | undefined,
        options: { user: string; tag: string[] },
      ) => {
        onExit(
          await handlers.chat(
            team,
            message,
            { user: options.user, tags: options.tag },
            configDir,
          ),
        );
      },
    );

  return program;
}

/** Parse `argv` (node-style, with the executable first) and run it. */
export async function runCli(
  argv: string[],
  handlers: CommandHandlers,
): Promise<number> {
  let exitCode: number = EXIT_OK;
  const program = createProgram(handlers, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
