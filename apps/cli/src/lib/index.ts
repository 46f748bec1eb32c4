/**
 * Library exports for CLI utilities
 */

// Environment detection and capabilities
export {
  getEnvironment,
  refreshEnvironment,
  getSymbols,
  shouldPrompt,
  shouldUseColors,
  isVerbose,
  registerShutdownHandlers,
  type Environment,
  type TerminalCapabilities,
  type SymbolSet,
} from './environment.js';

// Error handling
export {
  CliError,
  isCliError,
  wrapError,
  EXIT_CODES,
  type ErrorCode,
  type ExitCode,
} from './errors.js';

// Logging
export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Version info (injected at build time)
export { CLI_VERSION } from './version.js';
