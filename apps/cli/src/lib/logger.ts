/**
 * Logger wrapper with level-based filtering and structured output
 *
 * User-facing lines go straight to the console; diagnostics forwarded from the
 * core library go through consola, tagged with the emitting component.
 */

import { createConsola, type ConsolaInstance, type ConsolaReporter } from 'consola';
import chalk from 'chalk';
import type { LogEntry as CoreLogEntry } from '@groundcheck/core';
import { getSymbols, shouldUseColors } from './environment.js';
import { isCliError, type CliError } from './errors.js';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

// Numbers follow consola's scale
const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
};

/** Structured log entry, written one per line in JSON mode */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  data?: unknown;
  error?: {
    code?: string;
    message: string;
    suggestions?: string[];
  };
}

export interface LoggerOptions {
  /** Minimum log level */
  level?: LogLevel;
  /** Output as JSON */
  json?: boolean;
  /** Overrides terminal color detection */
  colors?: boolean;
  /** Replace consola's reporters for forwarded diagnostics */
  reporters?: ConsolaReporter[];
}

export interface Logger {
  success: (message: string) => void;
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
  /** Plain line, never filtered */
  log: (message: string) => void;
  logError: (error: CliError | Error, options?: { verbose?: boolean }) => void;
  newline: () => void;
  dim: (message: string) => void;
  json: (data: unknown) => void;
  /** Forward a core library log entry through consola */
  forward: (entry: CoreLogEntry) => void;
  setLevel: (level: LogLevel) => void;
  readonly consola: ConsolaInstance;
}

type Paint = (s: string) => string;

const plain: Paint = (s) => s;

export function createLogger(options: LoggerOptions = {}): Logger {
  const symbols = getSymbols();
  const useJson = options.json ?? false;
  const useColors = (options.colors ?? shouldUseColors()) && !useJson;
  let level = options.level ?? 'info';

  const c = {
    green: useColors ? chalk.green : plain,
    red: useColors ? chalk.red : plain,
    yellow: useColors ? chalk.yellow : plain,
    cyan: useColors ? chalk.cyan : plain,
    dim: useColors ? chalk.dim : plain,
  };

  const consola = createConsola({
    level: LOG_LEVEL_MAP[level],
    formatOptions: { colors: useColors, date: false },
    ...(options.reporters ? { reporters: options.reporters } : {}),
  });

  function enabled(levelNum: number): boolean {
    return levelNum <= LOG_LEVEL_MAP[level];
  }

  function output(levelNum: number, symbol: string, paint: Paint, levelName: string, message: string): void {
    if (!enabled(levelNum)) return;

    if (useJson) {
      const entry: LogEntry = { timestamp: new Date().toISOString(), level: levelName, message };
      console.log(JSON.stringify(entry));
      return;
    }

    const formatted = `${paint(symbol)} ${message}`;
    if (levelNum === LOG_LEVEL_MAP.error) {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  const logger: Logger = {
    success: (message) => output(LOG_LEVEL_MAP.info, symbols.tick, c.green, 'SUCCESS', message),
    error: (message) => output(LOG_LEVEL_MAP.error, symbols.cross, c.red, 'ERROR', message),
    warn: (message) => output(LOG_LEVEL_MAP.warn, symbols.warning, c.yellow, 'WARN', message),
    info: (message) => output(LOG_LEVEL_MAP.info, symbols.info, c.cyan, 'INFO', message),
    debug: (message) => output(LOG_LEVEL_MAP.debug, symbols.bullet, c.dim, 'DEBUG', message),

    log: (message) => {
      console.log(message);
    },

    logError: (error, errorOptions = {}) => {
      if (useJson) {
        const entry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: 'ERROR',
          message: error.message,
          error: isCliError(error)
            ? { code: error.code, message: error.message, suggestions: error.suggestions }
            : { message: error.message },
        };
        console.error(JSON.stringify(entry));
        return;
      }

      logger.error(error.message);

      if (isCliError(error)) {
        for (const suggestion of error.suggestions) {
          console.error(`  ${c.cyan(symbols.arrow)} ${suggestion}`);
        }
        if (errorOptions.verbose && error.cause) {
          console.error(c.dim(`  Caused by: ${error.cause.message}`));
        }
      }
    },

    newline: () => {
      if (!useJson) {
        console.log('');
      }
    },

    dim: (message) => {
      if (!useJson) {
        console.log(c.dim(message));
      }
    },

    json: (data) => {
      console.log(JSON.stringify(data, null, 2));
    },

    forward: (entry) => {
      const tagged = consola.withTag(entry.component);
      const extra: unknown[] = entry.context ? [entry.context] : [];
      switch (entry.level) {
        case 'error':
          tagged.error(entry.error ? `${entry.message}: ${entry.error.message}` : entry.message, ...extra);
          break;
        case 'warn':
          tagged.warn(entry.message, ...extra);
          break;
        case 'info':
          tagged.info(entry.message, ...extra);
          break;
        case 'debug':
          tagged.debug(entry.message, ...extra);
          break;
      }
    },

    setLevel: (newLevel) => {
      level = newLevel;
      consola.level = LOG_LEVEL_MAP[newLevel];
    },

    consola,
  };

  return logger;
}
