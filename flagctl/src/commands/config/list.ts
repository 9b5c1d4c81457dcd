import { Command } from 'commander';
import type { CommandContext } from '../../context';
import { maskApiKey } from '../../config/store';
import { failCommand } from '../../utils/commander';
import { readInvocationOptions } from '../../utils/options';
import { print, success } from '../../utils/output';

export function configListCommand(context: CommandContext): Command {
  return new Command('list')
    .description('Show the configuration file. API keys are masked.')
    .action((_options: unknown, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const store = context.configStore();
        const cfg = store.load();
        const environments = Object.entries(cfg.environments)
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([name, entry]) => ({
            name,
            base_url: entry.baseUrl,
            api_key: maskApiKey(entry.apiKey),
          }));
        print(
          success({
            path: store.path,
            defaultEnv: cfg.defaultEnv,
            environments,
          }),
          invocation
        );
      } catch (err) {
        failCommand(cmd, invocation, err, 'CONFIG_LIST_FAILED');
      }
    });
}
