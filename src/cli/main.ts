/**
 * @fileoverview dna-synth command dispatcher
 *
 * Kept apart from the executable entry so that tests can drive it with an
 * argument list and read back the exit code.
 */

import { parseArgs } from 'node:util';
import { logDebug } from '../telemetry/logger.js';
import { configCommand } from './commands/config.js';
import { historyCommand } from './commands/history.js';
import { synthesizeCommand } from './commands/synthesize.js';
import { EXIT_CODES, formatError, getExitCode, toCliError } from './errors.js';
import { showHelp } from './help.js';

type Command = 'synthesize' | 'config' | 'history' | 'help';

export const COMMANDS: Record<Command, { description: string; usage: string }> = {
  synthesize: {
    description: 'Replay captured worker outputs and score them',
    usage: 'dna-synth synthesize <pattern...> [--config <file>] [--json] [--store <db>] [--timeout <ms>]',
  },
  config: {
    description: 'Print the effective synthesis configuration',
    usage: 'dna-synth config [--config <file>]',
  },
  history: {
    description: 'List archived run reports',
    usage: 'dna-synth history --store <db> [--limit <n>] [--status complete|failed] [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'dna-synth help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

export interface RunCliOptions {
  cwd?: string;
}

/**
 * Run one CLI invocation.
 *
 * @returns the exit code; nothing here calls process.exit
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const command = argv[0];
  const commandArgs = argv.slice(1);

  if (command === undefined || command === '--help' || command === '-h') {
    showHelp();
    return EXIT_CODES.ok;
  }
  if (command === '--version' || command === '-v') {
    const { VERSION } = await import('../index.js');
    console.log(`dna-synth ${VERSION}`);
    return EXIT_CODES.ok;
  }
  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}\nAvailable commands: ${Object.keys(COMMANDS).join(', ')}`);
    return EXIT_CODES.usage;
  }

  // `dna-synth <command> --help` anywhere in the arguments
  const { values } = parseArgs({
    args: commandArgs,
    options: { help: { type: 'boolean', short: 'h', default: false } },
    allowPositionals: true,
    strict: false,
  });
  if (command === 'help' || values.help) {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return EXIT_CODES.ok;
  }

  const handlers: Record<Exclude<Command, 'help'>, () => Promise<number>> = {
    synthesize: () => synthesizeCommand({ args: commandArgs, cwd: options.cwd }),
    config: () => configCommand({ args: commandArgs }),
    history: () => historyCommand({ args: commandArgs }),
  };

  logDebug('CLI: dispatching', { command });
  try {
    return await handlers[command]();
  } catch (error) {
    const cliError = toCliError(error);
    console.error(formatError(cliError));
    return getExitCode(cliError);
  }
}
