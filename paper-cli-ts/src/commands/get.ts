/**
 * Get command implementation
 */

import { Command } from 'commander';
import { formatValue } from '../formatting.js';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { validateKey } from '../validation.js';

/**
 * Create the get command
 */
export function createGetCommand(context: CliContext): Command {
  const cmd = new Command('get');

  cmd
    .description('Get a value by key')
    .argument('<key>', 'Key to get')
    .option('--peek', 'Read without updating the eviction policy or stats')
    .action(async (key: string, options: { peek?: boolean }, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        validateKey(key);

        const value = options.peek === true ? await client.peek(key) : await client.get(key);
        return formatValue(key, value);
      });
    });

  return cmd;
}
