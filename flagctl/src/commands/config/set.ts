import { Command } from 'commander';
import type { CommandContext } from '../../context';
import { maskApiKey, parseKeyPath } from '../../config/store';
import { failCommand } from '../../utils/commander';
import { readInvocationOptions } from '../../utils/options';
import { print, success } from '../../utils/output';

export function configSetCommand(context: CommandContext): Command {
  return new Command('set')
    .description(
      'Set one configuration value. A missing environment is created.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl config set dev.base_url http://localhost:8080\n' +
        '  flagctl config set prod.api_key <key>'
    )
    .argument('<env.key>', 'environment and field, e.g. dev.base_url')
    .argument('<value>', 'new value')
    .action((keyPath: string, value: string, _options: unknown, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const store = context.configStore();
        store.set(keyPath, value);
        const { field } = parseKeyPath(keyPath);
        print(
          success({ path: keyPath, value: field === 'api_key' ? maskApiKey(value) : value }),
          invocation
        );
      } catch (err) {
        failCommand(cmd, invocation, err, 'CONFIG_SET_FAILED');
      }
    });
}
