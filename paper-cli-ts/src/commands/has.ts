/**
 * Has command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { validateKey } from '../validation.js';

export function createHasCommand(context: CliContext): Command {
  const cmd = new Command('has');

  cmd
    .description('Check whether a key exists')
    .argument('<key>', 'Key to check')
    .action(async (key: string, _options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        validateKey(key);
        return String(await client.has(key));
      });
    });

  return cmd;
}
