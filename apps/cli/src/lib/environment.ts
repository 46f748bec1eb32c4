/**
 * Environment detection for CI/TTY and graceful degradation
 */

import ci from 'ci-info';

/** Terminal capabilities */
export interface TerminalCapabilities {
  /** Supports ANSI colors */
  colors: boolean;
  /** Supports Unicode characters */
  unicode: boolean;
  /** Terminal width in columns */
  width: number;
}

/** Environment information */
export interface Environment {
  /** Running in CI environment */
  isCI: boolean;
  /** CI provider name (if detected) */
  ciName: string | null;
  /** Interactive terminal (TTY + not CI) */
  isInteractive: boolean;
  /** stdout is a TTY */
  isTTY: boolean;
  /** stdin is a TTY */
  isStdinTTY: boolean;
  /** Running in debug mode */
  isDebug: boolean;
  /** Node.js version info */
  nodeVersion: { major: number; minor: number; patch: number };
  terminal: TerminalCapabilities;
}

/** Symbol sets for different terminal capabilities */
export interface SymbolSet {
  tick: string;
  cross: string;
  warning: string;
  info: string;
  arrow: string;
  bullet: string;
  pointerSmall: string;
}

const UNICODE_SYMBOLS: SymbolSet = {
  tick: '✓',
  cross: '✖',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→',
  bullet: '•',
  pointerSmall: '›',
};

const ASCII_SYMBOLS: SymbolSet = {
  tick: '√',
  cross: 'x',
  warning: '!',
  info: 'i',
  arrow: '->',
  bullet: '*',
  pointerSmall: '>',
};

const ON_VALUES = ['1', 'true', 'yes'];

// Cache for environment detection
let envCache: Environment | null = null;

function isOn(value: string | undefined): boolean {
  return value !== undefined && ON_VALUES.includes(value.trim().toLowerCase());
}

/**
 * Detect Unicode support
 */
function detectUnicodeSupport(): boolean {
  if (isOn(process.env['GROUNDCHECK_NO_UNICODE'])) {
    return false;
  }

  if (process.platform === 'win32') {
    // Windows Terminal and the VS Code terminal render Unicode; cmd.exe does not
    return Boolean(process.env['WT_SESSION']) || process.env['TERM_PROGRAM'] === 'vscode';
  }

  return true;
}

/**
 * Detect color support
 */
function detectColorSupport(): boolean {
  // Explicit no color
  if (process.env['NO_COLOR'] !== undefined || isOn(process.env['GROUNDCHECK_NO_COLOR'])) {
    return false;
  }

  const forceColor = process.env['FORCE_COLOR'];
  if (forceColor !== undefined) {
    return forceColor !== '0' && forceColor !== 'false';
  }

  if (!process.stdout.isTTY) {
    // GitHub Actions and GitLab CI render colors in their logs
    return ci.isCI && Boolean(process.env['GITHUB_ACTIONS'] || process.env['GITLAB_CI']);
  }

  return process.env['TERM'] !== 'dumb';
}

/**
 * Parse Node.js version
 */
function parseNodeVersion(): { major: number; minor: number; patch: number } {
  const match = process.version.match(/^v(\d+)\.(\d+)\.(\d+)/);
  if (match && match[1] && match[2] && match[3]) {
    return {
      major: parseInt(match[1], 10),
      minor: parseInt(match[2], 10),
      patch: parseInt(match[3], 10),
    };
  }
  return { major: 0, minor: 0, patch: 0 };
}

function buildEnvironment(): Environment {
  const isTTY = Boolean(process.stdout.isTTY);

  return {
    isCI: ci.isCI,
    ciName: ci.name,
    isTTY,
    isStdinTTY: Boolean(process.stdin.isTTY),
    isInteractive: isTTY && !ci.isCI,
    isDebug: process.env['DEBUG'] === '1' || isOn(process.env['GROUNDCHECK_DEBUG']),
    nodeVersion: parseNodeVersion(),
    terminal: {
      colors: detectColorSupport(),
      unicode: detectUnicodeSupport(),
      width: process.stdout.columns || 80,
    },
  };
}

/**
 * Get current environment (cached)
 */
export function getEnvironment(): Environment {
  if (!envCache) {
    envCache = buildEnvironment();
  }
  return envCache;
}

/**
 * Drop the cached detection so the next read sees the current process state
 */
export function refreshEnvironment(): Environment {
  envCache = null;
  return getEnvironment();
}

/**
 * Get symbols based on environment capabilities
 */
export function getSymbols(): SymbolSet {
  return getEnvironment().terminal.unicode ? UNICODE_SYMBOLS : ASCII_SYMBOLS;
}

export function shouldUseColors(): boolean {
  return getEnvironment().terminal.colors;
}

/**
 * Check if we should use interactive prompts
 */
export function shouldPrompt(): boolean {
  const environment = getEnvironment();
  return environment.isInteractive && environment.isStdinTTY;
}

/**
 * Check if running in verbose mode (via env or debug)
 */
export function isVerbose(): boolean {
  return isOn(process.env['GROUNDCHECK_VERBOSE']) || getEnvironment().isDebug;
}

/**
 * Run `handler` once on the first SIGINT or SIGTERM
 */
export function registerShutdownHandlers(handler: (signal: NodeJS.Signals) => void | Promise<void>): () => void {
  let handled = false;

  const listener = (signal: NodeJS.Signals): void => {
    if (handled) return;
    handled = true;
    Promise.resolve(handler(signal)).catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
  };

  process.on('SIGINT', listener);
  process.on('SIGTERM', listener);

  return () => {
    process.off('SIGINT', listener);
    process.off('SIGTERM', listener);
  };
}
