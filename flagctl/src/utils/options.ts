import type { Command } from 'commander';
import type { ConnectionInputs } from '../config/resolve';
import { parseBooleanWord } from './args';

export const OUTPUT_FORMATS = ['json', 'text', 'yaml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Global option values for one CLI invocation. Built once from the parsed
 * command line and passed down; nothing is kept at module level.
 */
export interface InvocationOptions {
  readonly connection: Readonly<ConnectionInputs>;
  readonly output: OutputFormat;
  readonly quiet: boolean;
  readonly verbose: boolean;
}

export type OutputSettings = Pick<InvocationOptions, 'output' | 'quiet'>;

interface GlobalOptionValues {
  baseUrl?: string;
  apiKey?: string;
  env?: string;
  output: string;
  quiet?: boolean;
  verbose?: boolean;
}

export function readInvocationOptions(command: Command): InvocationOptions {
  const opts = command.optsWithGlobals<GlobalOptionValues>();
  if (!isOutputFormat(opts.output)) {
    return command.error(`Unknown output format '${opts.output}'. Valid formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return Object.freeze({
    connection: Object.freeze({
      ...(opts.baseUrl !== undefined ? { baseUrl: opts.baseUrl } : {}),
      ...(opts.apiKey !== undefined ? { apiKey: opts.apiKey } : {}),
      ...(opts.env !== undefined ? { env: opts.env } : {}),
    }),
    output: opts.output,
    quiet: opts.quiet ?? false,
    verbose: opts.verbose ?? false,
  });
}

/**
 * Find `--output` in raw argv before Commander runs, so usage errors can be
 * printed in the requested format.
 */
export function detectRequestedOutput(argv: string[]): OutputFormat {
  for (let i = 2; i < argv.length; i++) {
    const token = argv[i];
    let value: string | undefined;
    if (token === '--output') {
      value = argv[i + 1];
    } else if (token.startsWith('--output=')) {
      value = token.slice('--output='.length);
    } else {
      continue;
    }
    return value !== undefined && isOutputFormat(value) ? value : 'text';
  }
  return 'text';
}

/** Switches that also accept `--name=<bool>` on the command line. */
export const BOOLEAN_VALUE_OPTIONS: readonly string[] = ['enabled'];

/**
 * Rewrite `--enabled=<bool>` into the `--enabled` / `--no-enabled` switches
 * Commander declares. Values that are not boolean words are left for Commander
 * to reject, and nothing after `--` is touched.
 */
export function normalizeBooleanOptions(
  args: readonly string[],
  names: readonly string[] = BOOLEAN_VALUE_OPTIONS
): string[] {
  const normalized: string[] = [];
  let literal = false;
  for (const arg of args) {
    if (arg === '--') literal = true;
    const match = literal ? null : /^--([^=]+)=(.*)$/.exec(arg);
    const value = match !== null && names.includes(match[1]) ? parseBooleanWord(match[2]) : undefined;
    if (match === null || value === undefined) {
      normalized.push(arg);
      continue;
    }
    normalized.push(value ? `--${match[1]}` : `--no-${match[1]}`);
  }
  return normalized;
}
