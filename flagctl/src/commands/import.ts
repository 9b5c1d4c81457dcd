import { Command } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { type CommandContext, openSession } from '../context';
import { importFlags } from '../flags/operations';
import { parseImportDocument } from '../flags/transfer';
import { failCommand } from '../utils/commander';
import { FlagctlError, ValidationError } from '../utils/errors';
import { readInvocationOptions } from '../utils/options';
import { print, success } from '../utils/output';

function readImportFile(file: string): string {
  try {
    return readFileSync(resolve(file), 'utf-8');
  } catch (err) {
    throw new ValidationError(`failed to read file ${file}: ${String(err)}`, undefined, 'INVALID_DOCUMENT');
  }
}

export function importCommand(context: CommandContext): Command {
  return new Command('import')
    .description(
      'Import flags from a YAML or JSON file of the form { flags: [...] }.\n\n' +
        'Every flag is written to the resolved environment. By default the first\n' +
        'failed flag stops the import; --continue-on-error attempts every flag and\n' +
        'still exits 1 if any failed.\n\n' +
        'EXAMPLES:\n' +
        '  flagctl import flags.yaml --env prod\n' +
        '  flagctl import flags.yaml --env staging --dry-run\n' +
        '  flagctl import flags.yaml --env prod --continue-on-error'
    )
    .argument('<file>', 'path to a YAML or JSON flags document')
    .option('--dry-run', 'validate the file and show what would be imported, without sending anything')
    .option('--continue-on-error', 'keep importing after a flag fails')
    .action(
      async (
        file: string,
        options: { dryRun?: boolean; continueOnError?: boolean },
        cmd: Command
      ) => {
        const invocation = readInvocationOptions(cmd);
        try {
          const content = readImportFile(file);

          if (options.dryRun) {
            const payloads = parseImportDocument(content, file, invocation.connection.env);
            print(
              success({
                dryRun: true,
                total: payloads.length,
                flags: payloads.map((p) => ({
                  key: p.key,
                  env: p.env,
                  enabled: p.enabled,
                  rollout: p.rollout,
                })),
              }),
              invocation
            );
            return;
          }

          const { connection, client } = openSession(context, invocation);
          const payloads = parseImportDocument(content, file, connection.environment);
          const summary = await importFlags(client, payloads, {
            continueOnError: options.continueOnError ?? false,
            onRecord: invocation.verbose
              ? (payload) => process.stderr.write(`importing flag: ${payload.key}\n`)
              : undefined,
          });

          if (summary.failed > 0) {
            throw new FlagctlError(
              summary.aborted ? 'IMPORT_FAILED' : 'IMPORT_PARTIAL',
              summary.aborted
                ? `import stopped at flag '${summary.failures[0].key}'; use --continue-on-error to keep going`
                : `import completed with errors: ${summary.succeeded} succeeded, ${summary.failed} failed`,
              summary
            );
          }
          print(success({ env: connection.environment, ...summary }), invocation);
        } catch (err) {
          failCommand(cmd, invocation, err, 'IMPORT_FAILED');
        }
      }
    );
}
