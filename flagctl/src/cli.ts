#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram } from './index';
import { configureCommander } from './utils/commander';
import { detectRequestedOutput, normalizeBooleanOptions } from './utils/options';
import { failure, print } from './utils/output';

function normalizeCommanderMessage(message: string): string {
  return message.replace(/^error:\s*/i, '').trim();
}

/**
 * CLI entrypoint: parse args and normalize usage errors.
 */
async function main(): Promise<void> {
  const output = detectRequestedOutput(process.argv);

  const program = createProgram();
  configureCommander(program);

  try {
    await program.parseAsync(normalizeBooleanOptions(process.argv));
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version displays are not errors - exit cleanly without error output
      if (
        err.code === 'commander.helpDisplayed' ||
        err.code === 'commander.help' ||
        err.code === 'commander.version'
      ) {
        process.exit(0);
      }

      const message = err.message.trim();
      if (message.length > 0) {
        const normalizedMessage = normalizeCommanderMessage(message);
        if (output !== 'text') {
          print(failure('CLI_USAGE_ERROR', normalizedMessage, { commanderCode: err.code }), {
            output,
            quiet: false,
          });
        } else {
          process.stderr.write(`${normalizedMessage}\n`);
        }
      }
      process.exit(err.exitCode || 1);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  print(failure('CLI_FATAL', String(err)), { output: detectRequestedOutput(process.argv), quiet: false });
  process.exit(1);
});
