import { Command } from 'commander';
import { type CommandContext, openSession } from '../context';
import { buildCreatePayload, type RawCreateOptions } from '../flags/operations';
import { failCommand } from '../utils/commander';
import { readInvocationOptions } from '../utils/options';
import { print, success } from '../utils/output';

export function createCommand(context: CommandContext): Command {
  return new Command('create')
    .description(
      'Create a new feature flag (or replace one with the same key).\n\n' +
        'Unstated fields default to: disabled, rollout 100, empty description.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl create feature_x --enabled --rollout 50 --env prod\n' +
        '  flagctl create feature_y --config \'{"color":"blue"}\' --description "New feature Y"'
    )
    .argument('<key>', 'flag key (letters, digits, "_" and "-", max 64 characters)')
    .option('--enabled', 'create the flag enabled')
    .option('--rollout <percent>', 'rollout percentage (0-100)')
    .option('--config <json>', 'flag configuration as a JSON object')
    .option('--variants <json>', 'variants as a JSON array of { name, weight, config? }')
    .option('--expression <expr>', 'targeting expression')
    .option('--description <text>', 'flag description')
    .action(async (key: string, options: RawCreateOptions, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const { connection, client } = openSession(context, invocation);
        const payload = buildCreatePayload(key, options, connection.environment);
        await client.upsert(payload);
        print(success(payload), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'CREATE_FAILED');
      }
    });
}
