/**
 * Command-line program definition
 *
 * Built by a factory so the process entry point and the tests share it; every
 * process-level dependency can be swapped through ProgramDeps.
 */

import { Command, InvalidArgumentError } from 'commander';
import { configureLogger, HonestySession, type ClientMode } from '@groundcheck/core';
import { loadConfig, type Config } from '@repo/shared-config';
import {
  configCommand,
  promptLineSource,
  queryCommand,
  replCommand,
  statusCommand,
  streamLineSource,
  type CommandContext,
  type GlobalOptions,
  type LineSource,
  type SessionOpener,
} from './commands/index.js';
import { isVerbose, shouldPrompt, shouldUseColors } from './lib/environment.js';
import { wrapError, type ExitCode } from './lib/errors.js';
import { createLogger, type Logger } from './lib/logger.js';
import { CLI_VERSION } from './lib/version.js';

export interface ProgramDeps {
  loadConfig?: () => Config;
  openSession?: SessionOpener;
  /** Called with the exit code of a failed command */
  exit?: (code: ExitCode) => void;
  lineSource?: () => LineSource;
  logger?: (options: GlobalOptions) => Logger;
}

const CLIENT_MODES: readonly ClientMode[] = ['concurrent', 'serial'];

/**
 * Parse positive integer with validation
 */
function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function parseServerUrl(value: string): string {
  try {
    new URL(value);
  } catch {
    throw new InvalidArgumentError('must be an absolute URL such as http://localhost:8080');
  }
  return value;
}

function parseMode(value: string): ClientMode {
  const mode = CLIENT_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new InvalidArgumentError(`must be one of: ${CLIENT_MODES.join(', ')}`);
  }
  return mode;
}

function defaultLineSource(): LineSource {
  return shouldPrompt() ? promptLineSource() : streamLineSource(process.stdin);
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name('groundcheck')
    .description('Check claims against the Core graph before stating them')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .option('-s, --server <url>', 'Core URL (overrides GROUNDCHECK_CORE_URL)', parseServerUrl)
    .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInteger)
    .option('-m, --mode <mode>', 'Client mode: concurrent or serial', parseMode)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose output');

  const run = (action: (options: GlobalOptions, context: CommandContext) => Promise<void>) => {
    return async (): Promise<void> => {
      const options = program.opts<GlobalOptions>();
      const verbose = options.verbose === true || isVerbose();
      const logger = deps.logger
        ? deps.logger(options)
        : createLogger({ json: options.json, level: verbose ? 'debug' : 'info' });

      try {
        const config = (deps.loadConfig ?? (() => loadConfig()))();

        configureLogger({
          level: verbose ? 'debug' : options.json ? 'error' : config.LOG_LEVEL,
          component: 'groundcheck',
          enableConsole: false,
          enableStructured: false,
          onLog: logger.forward,
        });

        const context: CommandContext = {
          config,
          logger,
          colors: !options.json && !config.GROUNDCHECK_NO_COLOR && shouldUseColors(),
          openSession: deps.openSession ?? ((sessionOptions) => HonestySession.open(sessionOptions)),
        };

        await action(options, context);
      } catch (error) {
        const wrapped = wrapError(error);
        logger.logError(wrapped, { verbose });
        (deps.exit ?? ((code) => { process.exitCode = code; }))(wrapped.exitCode);
      }
    };
  };

  program
    .command('repl', { isDefault: true })
    .description('Start an interactive session')
    .action(run((options, context) => replCommand(options, context, deps.lineSource ?? defaultLineSource)));

  program
    .command('query')
    .description('Run a single command, e.g. `groundcheck query lookup 1`')
    .argument('<command...>', 'Command and its arguments')
    .action((words: string[]) => run((options, context) => queryCommand(words, options, context))());

  program
    .command('status')
    .description('Show graph status and developmental stage')
    .action(run((options, context) => statusCommand(options, context)));

  program
    .command('config')
    .description('Show the resolved configuration with secrets redacted')
    .action(run((options, context) => configCommand(options, context)));

  return program;
}
