import { Command } from 'commander';
import { type CommandContext, openSession } from '../context';
import { hasOverrides, parseUpdateOverrides, type RawUpdateOptions } from '../flags/merge';
import { updateFlag } from '../flags/operations';
import { failCommand } from '../utils/commander';
import { ValidationError } from '../utils/errors';
import { readInvocationOptions } from '../utils/options';
import { print, success } from '../utils/output';

export function updateCommand(context: CommandContext): Command {
  return new Command('update')
    .description(
      'Change selected fields of an existing feature flag.\n\n' +
        'The service only replaces whole flags, so the current flag is fetched first\n' +
        'and every field you do not pass keeps its current value.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl update feature_x --enabled=false --env prod\n' +
        '  flagctl update feature_x --rollout 0 --env prod\n' +
        '  flagctl update feature_x --config \'{"color":"red"}\' --env prod'
    )
    .argument('<key>', 'flag key')
    .allowExcessArguments(false)
    .option('--enabled', 'enable the flag (--enabled=false also disables)')
    .option('--no-enabled', 'disable the flag')
    .option('--rollout <percent>', 'rollout percentage (0-100)')
    .option('--config <json>', 'replace the configuration with a JSON object')
    .option('--variants <json>', 'replace variants with a JSON array of { name, weight, config? }')
    .option('--expression <expr>', 'targeting expression')
    .option('--description <text>', 'flag description')
    .action(async (key: string, options: RawUpdateOptions, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        // Bad values are rejected before any request is made.
        const overrides = parseUpdateOverrides(options);
        if (!hasOverrides(overrides)) {
          throw new ValidationError(
            'nothing to update: pass at least one of --enabled, --rollout, --config, --variants, --expression, --description'
          );
        }
        const { connection, client } = openSession(context, invocation);
        const submitted = await updateFlag(client, key, connection.environment, overrides);
        print(success(submitted), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'UPDATE_FAILED');
      }
    });
}
