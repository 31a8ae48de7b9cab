/**
 * Del command implementation
 */

import { Command } from 'commander';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { validateKey } from '../validation.js';

export function createDelCommand(context: CliContext): Command {
  const cmd = new Command('del');

  cmd
    .description('Delete a key')
    .argument('<key>', 'Key to delete')
    .action(async (key: string, _options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        validateKey(key);

        const removed = await client.delete(key);
        return removed ? 'OK' : `${key} = <none>`;
      });
    });

  return cmd;
}
