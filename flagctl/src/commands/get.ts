import { Command } from 'commander';
import { type CommandContext, openSession } from '../context';
import { failCommand } from '../utils/commander';
import { readInvocationOptions } from '../utils/options';
import { print, success } from '../utils/output';

export function getCommand(context: CommandContext): Command {
  return new Command('get')
    .description(
      'Show one feature flag.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl get feature_x --env prod\n' +
        '  flagctl get feature_x --env prod --output json'
    )
    .argument('<key>', 'flag key')
    .action(async (key: string, _options: unknown, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const { connection, client } = openSession(context, invocation);
        const flag = await client.getByKey(key, connection.environment);
        print(success(flag), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'GET_FAILED');
      }
    });
}
