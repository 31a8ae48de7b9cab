/**
 * Shared command plumbing: client creation, output, cleanup and exit codes
 */

import type { Command } from 'commander';
import { DEFAULT_ADDRESS, PaperClient } from '@paper-cache/client';
import type { ClientConfigInput } from '@paper-cache/client';
import { formatError, getExitCode } from './formatting.js';

export const CLI_TIMEOUT_MS = 5000;

/**
 * Options every command inherits from the program
 */
export type GlobalOptions = {
  address?: string;
};

/**
 * Everything a command touches outside its own arguments.
 * Tests swap in a context that records output instead of exiting.
 */
export interface CliContext {
  createClient(config: ClientConfigInput): PaperClient;
  readonly env: NodeJS.ProcessEnv;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly exit: (code: number) => void;
}

export function defaultContext(): CliContext {
  return {
    createClient: (config) => new PaperClient(config),
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    exit: (code) => process.exit(code),
  };
}

/**
 * Global options as seen from inside a subcommand's action
 */
export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * --address wins, then PAPER_ADDRESS, then the local default
 */
export function resolveAddress(options: GlobalOptions, env: NodeJS.ProcessEnv): string {
  if (options.address !== undefined && options.address.length > 0) {
    return options.address;
  }

  const fromEnv = env.PAPER_ADDRESS;
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return fromEnv;
  }

  return DEFAULT_ADDRESS;
}

/**
 * Run one operation against a fresh client and exit.
 * The operation returns the text to print on success.
 */
export async function runWithClient(
  context: CliContext,
  options: GlobalOptions,
  operation: (client: PaperClient) => Promise<string>
): Promise<void> {
  let client: PaperClient | null = null;

  try {
    client = context.createClient({
      address: resolveAddress(options, context.env),
      connectionTimeout: CLI_TIMEOUT_MS,
      requestTimeout: CLI_TIMEOUT_MS,
    });

    const output = await operation(client);
    context.stdout(`${output}\n`);

    await client.disconnect();
    context.exit(0);
  } catch (error) {
    context.stderr(`${formatError(error)}\n`);

    // Ensure cleanup
    await client?.disconnect();

    context.exit(getExitCode(error));
  }
}
