/**
 * Set command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { parseTtl, validateKey, validateValue } from '../validation.js';

/**
 * Create the set command
 */
export function createSetCommand(context: CliContext): Command {
  const cmd = new Command('set');

  cmd
    .description('Set a key-value pair')
    .argument('<key>', 'Key to set')
    .argument('<value>', 'Value to set')
    .option('-t, --ttl <seconds>', 'Expire the key after this many seconds (0 = never)')
    .action(async (key: string, value: string, options: { ttl?: string }, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        // Validate inputs (fast-fail)
        validateKey(key);
        validateValue(value);
        const ttl = options.ttl === undefined ? 0 : parseTtl(options.ttl);

        await client.set(key, value, ttl);
        return 'OK';
      });
    });

  return cmd;
}
