/**
 * Wipe command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';

export function createWipeCommand(context: CliContext): Command {
  const cmd = new Command('wipe');

  cmd
    .description('Remove every key from the cache')
    .action(async (_options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        await client.wipe();
        return 'OK';
      });
    });

  return cmd;
}
