/**
 * Argument parsing and command dispatch for the `botkeeper` binary.
 *
 *   botkeeper [run] [--config <path>]   supervise the bot (default)
 *   botkeeper check [--config <path>]   probe the bot identity once
 *   botkeeper help                      print usage
 */

import { run } from './commands/run.js';
import { check } from './commands/check.js';
import { RESET, BOLD, DIM, RED, type CliOptions } from './commands/shared.js';

export type CommandName = 'run' | 'check' | 'help';

export interface ParsedArgs {
  command: CommandName;
  options: CliOptions;
}

const COMMANDS: readonly CommandName[] = ['run', 'check', 'help'];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  let command: CommandName | undefined;
  const options: CliOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      return { command: 'help', options };
    }
    if (arg === '--config' || arg === '-c') {
      const value = argv[i + 1];
      if (!value || value.startsWith('-')) {
        throw new UsageError(`${arg} needs a file path`);
      }
      options.configPath = value;
      i++;
      continue;
    }
    if (arg.startsWith('--config=')) {
      const value = arg.slice('--config='.length);
      if (!value) throw new UsageError('--config needs a file path');
      options.configPath = value;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    const name = COMMANDS.find((c) => c === arg);
    if (!name) throw new UsageError(`Unknown command: ${arg}`);
    if (command) throw new UsageError(`Unexpected argument: ${arg}`);
    command = name;
  }

  return { command: command ?? 'run', options };
}

export function usage(): string {
  return [
    '',
    `  ${BOLD}botkeeper${RESET} -- keep a Telegram bot process running`,
    '',
    `  ${BOLD}Usage${RESET}`,
    '    botkeeper [run] [--config <path>]   supervise the bot and serve /health',
    '    botkeeper check [--config <path>]   check the bot identity once',
    '    botkeeper help                      show this message',
    '',
    `  ${BOLD}Environment${RESET}`,
    `    BOT_TOKEN      bot token ${DIM}(required)${RESET}`,
    `    PORT           health server port ${DIM}(default 8080)${RESET}`,
    `    ADMIN_ID       numeric admin user id, passed to the bot`,
    `    DATABASE_URL   database connection string, passed to the bot`,
    `    LOG_LEVEL      debug | info | warn | error`,
    `    BOT_COMMAND    command line of the bot ${DIM}(default "node bot.js")${RESET}`,
    '',
  ].join('\n');
}

export async function main(argv: string[]): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`\n  ${RED}${err.message}${RESET}`);
    console.error(usage());
    process.exitCode = 1;
    return;
  }

  switch (parsed.command) {
    case 'help':
      console.log(usage());
      return;
    case 'check':
      await check(parsed.options);
      return;
    case 'run':
      await run(parsed.options);
      return;
  }
}
