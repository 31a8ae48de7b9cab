/**
 * Version command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';

export function createVersionCommand(context: CliContext): Command {
  const cmd = new Command('version');

  cmd
    .description('Print the server version')
    .action(async (_options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), (client) => client.version());
    });

  return cmd;
}
