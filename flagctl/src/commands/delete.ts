import { Command } from 'commander';
import { type CommandContext, openSession } from '../context';
import { failCommand } from '../utils/commander';
import { FlagctlError } from '../utils/errors';
import { readInvocationOptions } from '../utils/options';
import { print, success } from '../utils/output';

export function deleteCommand(context: CommandContext): Command {
  return new Command('delete')
    .description(
      'Delete a feature flag from an environment.\n\n' +
        'Asks for confirmation on a terminal. Pass --force in scripts.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl delete feature_x --env prod\n' +
        '  flagctl delete feature_x --env prod --force'
    )
    .argument('<key>', 'flag key')
    .option('-f, --force', 'skip the confirmation prompt')
    .action(async (key: string, options: { force?: boolean }, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const { connection, client } = openSession(context, invocation);

        if (!options.force && !invocation.quiet) {
          if (!context.isInteractive()) {
            throw new FlagctlError(
              'CONFIRMATION_REQUIRED',
              'refusing to delete without confirmation on a non-interactive input; pass --force'
            );
          }
          const confirmed = await context.confirm(
            `Delete flag '${key}' from environment '${connection.environment}'?`
          );
          if (!confirmed) {
            print(success({ key, env: connection.environment, deleted: false }), invocation);
            return;
          }
        }

        await client.deleteByKeyAndEnv(key, connection.environment);
        print(success({ key, env: connection.environment, deleted: true }), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'DELETE_FAILED');
      }
    });
}
