import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { type CommandContext, openSession } from '../context';
import { serializeFlagDocument, type TransferFormat } from '../flags/transfer';
import { failCommand } from '../utils/commander';
import { ValidationError } from '../utils/errors';
import { readInvocationOptions } from '../utils/options';
import { print, printRaw, success } from '../utils/output';

function parseFormat(raw: string): TransferFormat {
  if (raw === 'yaml' || raw === 'json') return raw;
  throw new ValidationError(`--format must be yaml or json, got '${raw}'`);
}

export function exportCommand(context: CommandContext): Command {
  return new Command('export')
    .description(
      'Export all flags of an environment as a { flags: [...] } document.\n\n' +
        'Without --file the document is written to stdout as-is (no envelope),\n' +
        'so it can be redirected and later passed to "import".\n\n' +
        'EXAMPLES:\n' +
        '  flagctl export --env prod --file flags.yaml\n' +
        '  flagctl export --env prod --format json > flags.json'
    )
    .option('-f, --file <path>', 'write to this file instead of stdout')
    .option('--format <format>', 'document format: yaml or json', 'yaml')
    .action(async (options: { file?: string; format: string }, cmd: Command) => {
      const invocation = readInvocationOptions(cmd);
      try {
        const format = parseFormat(options.format);
        const { connection, client } = openSession(context, invocation);
        const flags = await client.listByEnvironment(connection.environment);
        flags.sort((a, b) => a.key.localeCompare(b.key));
        const document = serializeFlagDocument(flags, format);

        if (options.file === undefined || options.file === '-') {
          printRaw(document);
          return;
        }

        const path = resolve(options.file);
        writeFileSync(path, document, 'utf-8');
        print(success({ path, env: connection.environment, total: flags.length, format }), invocation);
      } catch (err) {
        failCommand(cmd, invocation, err, 'EXPORT_FAILED');
      }
    });
}
