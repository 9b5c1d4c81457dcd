import { Command } from 'commander';
import type { CommandContext } from '../../context';
import { failCommand } from '../../utils/commander';
import { readInvocationOptions } from '../../utils/options';
import { print, success } from '../../utils/output';

export function configGetCommand(context: CommandContext): Command {
  return new Command('get')
    .description(
      'Print one configuration value.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl config get dev.base_url\n' +
        '  flagctl config get prod.api_key'
    )
    .argument('<env.key>', 'environment and field, e.g. dev.base_url')
    .action((keyPath: string, _options: unknown, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        print(success(context.configStore().get(keyPath)), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'CONFIG_GET_FAILED');
      }
    });
}
