/**
 * Status command implementation
 */

import { Command } from 'commander';
import { formatStatus } from '../formatting.js';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';

export function createStatusCommand(context: CliContext): Command {
  const cmd = new Command('status');

  cmd
    .description('Show cache statistics')
    .action(async (_options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => formatStatus(await client.status()));
    });

  return cmd;
}
