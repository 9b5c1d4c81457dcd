import { Command } from 'commander';
import type { CommandContext } from '../../context';
import { failCommand } from '../../utils/commander';
import { readInvocationOptions } from '../../utils/options';
import { print, success } from '../../utils/output';

export function configInitCommand(context: CommandContext): Command {
  return new Command('init')
    .description(
      'Create a starter configuration file with dev, staging and prod entries.\n' +
        'Edit the base URLs and API keys afterwards with "config set".'
    )
    .option('--force', 'overwrite an existing configuration file')
    .action((options: { force?: boolean }, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const store = context.configStore();
        const cfg = store.init(options.force ?? false);
        print(
          success({
            path: store.path,
            defaultEnv: cfg.defaultEnv,
            environments: Object.keys(cfg.environments),
          }),
          invocation
        );
      } catch (err) {
        failCommand(cmd, invocation, err, 'CONFIG_INIT_FAILED');
      }
    });
}
