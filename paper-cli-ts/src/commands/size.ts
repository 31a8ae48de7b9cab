/**
 * Size command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { validateKey } from '../validation.js';

export function createSizeCommand(context: CliContext): Command {
  const cmd = new Command('size');

  cmd
    .description('Show the stored size of a key in bytes')
    .argument('<key>', 'Key to measure')
    .action(async (key: string, _options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        validateKey(key);
        return `${key} size = ${await client.size(key)} bytes`;
      });
    });

  return cmd;
}
