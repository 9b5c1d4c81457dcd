import type { Command } from 'commander';
import { FlagctlError } from './errors';
import type { OutputSettings } from './options';
import { failure, print } from './output';

/**
 * Detect Commander-thrown usage/control-flow errors so command handlers can rethrow
 * them instead of wrapping them as runtime failures.
 */
export function isCommanderError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  if ('name' in err && err.name === 'CommanderError') return true;
  if ('code' in err && typeof err.code === 'string' && err.code.startsWith('commander.')) {
    return true;
  }
  return false;
}

/**
 * Print `err` as a failure envelope and exit the command with status 1.
 * Known errors keep their own code; anything else is reported under `fallbackCode`.
 */
export function failCommand(
  cmd: Command,
  settings: OutputSettings,
  err: unknown,
  fallbackCode: string
): never {
  if (isCommanderError(err)) throw err;
  if (err instanceof FlagctlError) {
    print(failure(err.code, err.message, err.details), settings);
  } else {
    print(failure(fallbackCode, err instanceof Error ? err.message : String(err)), settings);
  }
  return cmd.error('', { exitCode: 1 });
}

// Recursively override Commander output handlers to keep error rendering centralized.
export function configureCommander(command: Command): void {
  command.configureOutput({
    writeOut: (str) => process.stdout.write(str),
    writeErr: () => {
      // Suppress Commander default stderr. Failures are printed as envelopes instead.
    },
  });
  command.exitOverride();
  for (const subcommand of command.commands) {
    configureCommander(subcommand);
  }
}
