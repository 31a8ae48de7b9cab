/**
 * Command tree for the paper CLI
 */

import { Command } from 'commander';
import { createDelCommand } from './commands/del.js';
import { createGetCommand } from './commands/get.js';
import { createHasCommand } from './commands/has.js';
import { createPingCommand } from './commands/ping.js';
import { createPolicyCommand } from './commands/policy.js';
import { createResizeCommand } from './commands/resize.js';
import { createSetCommand } from './commands/set.js';
import { createSizeCommand } from './commands/size.js';
import { createStatusCommand } from './commands/status.js';
import { createTtlCommand } from './commands/ttl.js';
import { createVersionCommand } from './commands/version.js';
import { createWipeCommand } from './commands/wipe.js';
import type { CliContext } from './runner.js';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('paper')
    .version('0.1.0')
    .description('Paper CLI - interact with a PaperCache server')
    .option('-a, --address <address>', 'Server address (default: $PAPER_ADDRESS or paper://127.0.0.1:3145)');

  // Register commands
  program.addCommand(createPingCommand(context));
  program.addCommand(createVersionCommand(context));
  program.addCommand(createGetCommand(context));
  program.addCommand(createSetCommand(context));
  program.addCommand(createDelCommand(context));
  program.addCommand(createHasCommand(context));
  program.addCommand(createTtlCommand(context));
  program.addCommand(createSizeCommand(context));
  program.addCommand(createStatusCommand(context));
  program.addCommand(createPolicyCommand(context));
  program.addCommand(createResizeCommand(context));
  program.addCommand(createWipeCommand(context));

  // addCommand() does not pass output settings down
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      writeOut: (text) => context.stdout(text),
      writeErr: (text) => context.stderr(text),
    });
  }

  return program;
}
