/**
 * TTL command implementation
 *
 * `ttl <key>` prints the remaining TTL; `ttl <key> <seconds>` replaces it.
 */

import { Command } from 'commander';
import { formatTtl } from '../formatting.js';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { parseTtl, validateKey } from '../validation.js';

export function createTtlCommand(context: CliContext): Command {
  const cmd = new Command('ttl');

  cmd
    .description('Show or change the TTL of a key')
    .argument('<key>', 'Key to inspect')
    .argument('[seconds]', 'New TTL in seconds (0 = never expire)')
    .action(async (key: string, seconds: string | undefined, _options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        validateKey(key);

        if (seconds === undefined) {
          return formatTtl(key, await client.ttl(key));
        }

        await client.setTtl(key, parseTtl(seconds));
        return 'OK';
      });
    });

  return cmd;
}
