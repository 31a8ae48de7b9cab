/**
 * Resize command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { parseCapacity } from '../validation.js';

export function createResizeCommand(context: CliContext): Command {
  const cmd = new Command('resize');

  cmd
    .description('Change the cache capacity')
    .argument('<capacity>', 'New capacity in bytes')
    .action(async (capacity: string, _options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        await client.resize(parseCapacity(capacity));
        return 'OK';
      });
    });

  return cmd;
}
