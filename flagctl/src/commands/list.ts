import { Command } from 'commander';
import { type CommandContext, openSession } from '../context';
import { filterEnabled } from '../flags/operations';
import type { FlagRecord } from '../flags/types';
import { failCommand } from '../utils/commander';
import { readInvocationOptions } from '../utils/options';
import { print, success } from '../utils/output';

/**
 * Table row for `--output text`. Structured outputs keep the full records.
 */
export function toListRow(flag: FlagRecord): Record<string, unknown> {
  return {
    key: flag.key,
    enabled: flag.enabled,
    rollout: `${flag.rollout}%`,
    env: flag.env,
    description: flag.description,
    updatedAt: flag.updatedAt ?? '',
  };
}

export function listCommand(context: CommandContext): Command {
  return new Command('list')
    .description(
      'List feature flags in an environment.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl list --env prod\n' +
        '  flagctl list --env prod --enabled-only --output json'
    )
    .option('--enabled-only', 'show only enabled flags')
    .action(async (options: { enabledOnly?: boolean }, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const { connection, client } = openSession(context, invocation);
        let flags = await client.listByEnvironment(connection.environment);
        if (options.enabledOnly) {
          flags = filterEnabled(flags);
        }
        flags.sort((a, b) => a.key.localeCompare(b.key));

        if (invocation.output === 'text' && !invocation.quiet) {
          print(success(flags.length === 0 ? 'No flags found' : flags.map(toListRow)), invocation);
          return;
        }
        print(success(flags), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'LIST_FAILED');
      }
    });
}
