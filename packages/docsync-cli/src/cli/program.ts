/**
 * Command tree of the docsync CLI
 */

import { Command, CommanderError, type OptionValues } from 'commander';
import { run as runAssistants } from './commands/assistants.js';
import { run as runChat } from './commands/chat.js';
import { run as runSchedule } from './commands/schedule.js';
import { run as runSync } from './commands/sync.js';
import type { CommandContext, CommandFlags, CommandModule } from './types.js';

export const VERSION = '0.1.0';

function toFlags(options: OptionValues): CommandFlags {
  return {
    ...(typeof options.config === 'string' ? { config: options.config } : {}),
    ...(options.json === true ? { json: true } : {}),
    ...(options.quiet === true ? { quiet: true } : {}),
    ...(options.keepScratch === true ? { keepScratch: true } : {}),
  };
}

export function createProgram(ctx: CommandContext, onExit: (code: number) => void): Command {
  const program = new Command();

  const bind = (handler: CommandModule['run']) =>
    async (...args: unknown[]): Promise<void> => {
      const command = args[args.length - 1];
      if (!(command instanceof Command)) {
        return;
      }
      onExit(await handler(ctx, command.args, toFlags(command.optsWithGlobals())));
    };

  program
    .name('docsync')
    .description('Sync knowledge-base documents into hosted assistants and chat with them')
    .version(VERSION)
    .option('-c, --config <path>', 'path to docsync.config.json')
    .option('--json', 'machine-readable output')
    .option('-q, --quiet', 'only print failures')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.presenter.write(text),
      writeErr: (text) => ctx.presenter.write(text),
    });

  program
    .command('assistants')
    .description('List configured assistants')
    .action(bind(runAssistants));

  program
    .command('sync')
    .description('Replace the indexed documents of an assistant with the ones its manifest lists')
    .argument('<key>', 'assistant key from the config file')
    .option('--keep-scratch', 'leave the downloaded documents on disk')
    .action(bind(runSync));

  program
    .command('chat')
    .description('Chat with an assistant in the terminal')
    .argument('<key>', 'assistant key from the config file')
    .action(bind(runChat));

  program
    .command('schedule')
    .description('Sync assistants every day at schedule.dailyAt until interrupted')
    .argument('[keys...]', 'assistant keys (default: all)')
    .option('--keep-scratch', 'leave the downloaded documents on disk')
    .action(bind(runSchedule));

  return program;
}

/**
 * Parse and run one command line; resolves to the exit code
 */
export async function runCli(argv: string[], ctx: CommandContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(ctx, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
