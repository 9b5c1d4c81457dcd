import { createInterface } from 'readline/promises';
import { type ProcessEnv, type ResolvedConnection, resolveConnection } from './config/resolve';
import { ConfigStore } from './config/store';
import { FlagClient, type FlagService } from './flags/client';
import type { InvocationOptions } from './utils/options';

/**
 * Collaborators the commands reach through. `defaultContext()` wires the real
 * ones; tests pass fakes to `createProgram`.
 */
export interface CommandContext {
  configStore(): ConfigStore;
  createClient(connection: ResolvedConnection, options: InvocationOptions): FlagService;
  processEnv: ProcessEnv;
  isInteractive(): boolean;
  confirm(question: string): Promise<boolean>;
}

async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} (y/N): `);
    const normalized = answer.trim().toLowerCase();
    return normalized === 'y' || normalized === 'yes';
  } finally {
    rl.close();
  }
}

export function defaultContext(): CommandContext {
  return {
    configStore: () => new ConfigStore(),
    createClient: (connection, options) => new FlagClient(connection, { verbose: options.verbose }),
    processEnv: process.env,
    isInteractive: () => process.stdin.isTTY === true,
    confirm: confirmOnTerminal,
  };
}

export interface Session {
  connection: ResolvedConnection;
  client: FlagService;
}

/**
 * Resolve the connection for this invocation and build a client for it.
 */
export function openSession(context: CommandContext, options: InvocationOptions): Session {
  const connection = resolveConnection(options.connection, context.configStore(), context.processEnv);
  if (options.verbose) {
    process.stderr.write(
      `using environment '${connection.environment}' at ${connection.baseUrl} (from ${describeSource(connection)})\n`
    );
  }
  return { connection, client: context.createClient(connection, options) };
}

function describeSource(connection: ResolvedConnection): string {
  switch (connection.source) {
    case 'flags':
      return '--base-url/--api-key';
    case 'env':
      return 'environment variables';
    case 'config':
      return 'config file';
  }
}
