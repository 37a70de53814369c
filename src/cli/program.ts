import { Command } from 'commander';
import { GenieSpacesClient } from '../client';
import { SDK_VERSION } from '../constants';
import { logger } from '../logger';
import { registerSpaceCommands, SpacesFactory } from './commands/spaces';
import { registerValidateCommands } from './commands/validate';

const defaultSpacesFactory: SpacesFactory = (options) =>
  new GenieSpacesClient({ host: options.host, token: options.token, logger }).spaces;

export function buildProgram(createSpaces: SpacesFactory = defaultSpacesFactory): Command {
  const program = new Command();

  program
    .name('genie')
    .description('Genie Spaces CLI - export, import, update and clone Genie Spaces')
    .version(SDK_VERSION)
    .option('--host <url>', 'Workspace URL (default: $DATABRICKS_HOST)')
    .option('--token <token>', 'Personal access token (default: $DATABRICKS_TOKEN)')
    .option('-v, --verbose', 'Log requests and print full error details')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        logger.level = 'debug';
      }
    });

  registerSpaceCommands(program, createSpaces);
  registerValidateCommands(program);

  program.addHelpText(
    'after',
    `
Examples:
  $ genie export 01ef0123456789abcdef0123456789ab -o space.json
  $ genie validate space.json
  $ genie import space.json -w abc123 -p "/Workspace/Users/me/Genie Spaces" --title "Sales"
  $ genie update 01ef0123456789abcdef0123456789ab -f space.json
  $ genie clone 01ef0123456789abcdef0123456789ab -w abc123 -p /Workspace/Shared/Spaces
  $ genie info 01ef0123456789abcdef0123456789ab
`
  );

  return program;
}
