/**
 * Policy command implementation
 *
 * `policy` prints the active and configured policies; `policy <name>` switches.
 */

import { Command } from 'commander';
import { formatPolicyInfo } from '../formatting.js';
import { globalOptions, runWithClient } from '../runner.js';
import type { CliContext } from '../runner.js';
import { parsePolicyArg } from '../validation.js';

export function createPolicyCommand(context: CliContext): Command {
  const cmd = new Command('policy');

  cmd
    .description('Show or change the eviction policy')
    .argument('[policy]', 'Policy to switch to, e.g. lfu, lru, 2q-0.25-0.5')
    .action(async (policy: string | undefined, _options: object, command: Command) => {
      await runWithClient(context, globalOptions(command), async (client) => {
        if (policy === undefined) {
          return formatPolicyInfo(await client.getPolicy());
        }

        await client.setPolicy(parsePolicyArg(policy));
        return 'OK';
      });
    });

  return cmd;
}
