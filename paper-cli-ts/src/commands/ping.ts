/**
 * Ping command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';

export function createPingCommand(context: CliContext): Command {
  const cmd = new Command('ping');

  cmd
    .description('Check that the server is reachable')
    .action(async (_options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), (client) => client.ping());
    });

  return cmd;
}
