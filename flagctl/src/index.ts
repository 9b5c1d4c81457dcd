import { Command } from 'commander';
import { type CommandContext, defaultContext } from './context';
import { configCommand } from './commands/config/index';
import { createCommand } from './commands/create';
import { deleteCommand } from './commands/delete';
import { exportCommand } from './commands/export';
import { getCommand } from './commands/get';
import { importCommand } from './commands/import';
import { listCommand } from './commands/list';
import { updateCommand } from './commands/update';
import { API_KEY_ENV_VAR, BASE_URL_ENV_VAR } from './config/resolve';
import { isObjectRecord } from './utils/args';
import { readInvocationOptions } from './utils/options';

// Read version from package.json so it stays in sync with releases
// eslint-disable-next-line @typescript-eslint/no-require-imports
const pkg: unknown = require('../package.json');
const version = isObjectRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';

/**
 * Build the root Commander program with global options and all subcommands.
 */
export function createProgram(context: CommandContext = defaultContext()): Command {
  const program = new Command();

  program
    .name('flagctl')
    .description(
      'Manage feature flags on a remote flag service.\n\n' +
        'CONNECTION (first match wins):\n' +
        '  1. --base-url and --api-key together (requires --env)\n' +
        `  2. ${BASE_URL_ENV_VAR} and ${API_KEY_ENV_VAR} together (requires --env)\n` +
        '  3. ~/.flagctl/config.yaml entry for --env (or default_env); a lone\n' +
        '     --base-url/--api-key or a single variable overrides just that field\n\n' +
        'TYPICAL WORKFLOW:\n' +
        '  flagctl config init                           # 1. create ~/.flagctl/config.yaml\n' +
        '  flagctl config set prod.api_key <key>         # 2. fill in credentials\n' +
        '  flagctl list --env prod                       # 3. inspect flags\n' +
        '  flagctl update my_flag --rollout 25 --env prod  # 4. change one field\n\n' +
        'OUTPUT: --output supports text (default), json, and yaml.\n' +
        '  In json/yaml mode, failures are envelopes with an error code.\n' +
        '  Exit code 1 on error.'
    )
    .version(version)
    .option('--base-url <url>', 'flag service base URL')
    .option('--api-key <key>', 'API key for the flag service')
    .option('-e, --env <name>', 'target environment (e.g. dev, staging, prod)')
    .option('--output <format>', 'output format: json, text, or yaml', 'text')
    .option('-q, --quiet', 'suppress non-essential success output')
    .option('-v, --verbose', 'log HTTP requests and connection resolution to stderr')
    .hook('preAction', (_thisCommand, actionCommand) => {
      readInvocationOptions(actionCommand);
    });

  // Show help when no subcommand given; error on unknown commands
  program.action(function (this: Command) {
    if (this.args.length > 0) {
      this.error(`unknown command '${this.args[0]}'`);
    }
    program.help();
  });

  program
    .addCommand(listCommand(context))
    .addCommand(getCommand(context))
    .addCommand(createCommand(context))
    .addCommand(updateCommand(context))
    .addCommand(deleteCommand(context))
    .addCommand(importCommand(context))
    .addCommand(exportCommand(context))
    .addCommand(configCommand(context));

  return program;
}
