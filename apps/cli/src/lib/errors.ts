/**
 * CLI error class with actionable suggestions
 */

import { isGroundCheckError } from '@groundcheck/core';

/** Error codes the CLI reports */
export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CORE_UNREACHABLE'
  | 'INVALID_INPUT'
  | 'INTERRUPTED'
  | 'UNKNOWN_ERROR';

/** Process exit codes */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

interface ErrorDefaults {
  message: string;
  suggestions: string[];
}

const ERROR_DEFAULTS: Record<ErrorCode, ErrorDefaults> = {
  CONFIG_INVALID: {
    message: 'Configuration is invalid',
    suggestions: [
      'Check the GROUNDCHECK_* variables in your environment and .env file',
      'Run with --verbose to see the resolved configuration',
    ],
  },
  CORE_UNREACHABLE: {
    message: 'Could not connect to the Core',
    suggestions: [
      'Check that the Core is running',
      'Point the CLI at it with --server <url> or GROUNDCHECK_CORE_URL',
    ],
  },
  INVALID_INPUT: {
    message: 'Invalid input',
    suggestions: ['Run `groundcheck --help` to see the accepted options'],
  },
  INTERRUPTED: {
    message: 'Operation was interrupted',
    suggestions: ['Run the command again to retry'],
  },
  UNKNOWN_ERROR: {
    message: 'An unexpected error occurred',
    suggestions: ['Run with --verbose for more details'],
  },
};

export class CliError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly cause?: Error;
  public readonly exitCode: ExitCode;

  constructor(
    message: string,
    code: ErrorCode,
    options?: { suggestions?: string[]; cause?: Error; exitCode?: ExitCode }
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.suggestions = options?.suggestions ?? [];
    this.cause = options?.cause;
    this.exitCode = options?.exitCode ?? (code === 'INTERRUPTED' ? EXIT_CODES.INTERRUPTED : EXIT_CODES.FAILURE);
  }

  /**
   * Create error with the default message and suggestions for its code
   */
  static fromCode(code: ErrorCode, message?: string, options?: { cause?: Error }): CliError {
    const defaults = ERROR_DEFAULTS[code];
    return new CliError(message ?? defaults.message, code, {
      suggestions: defaults.suggestions,
      cause: options?.cause,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestions: this.suggestions,
      cause: this.cause?.message,
    };
  }

  /**
   * Format error for display
   */
  format(options?: { verbose?: boolean; arrow?: string }): string {
    const arrow = options?.arrow ?? '→';
    const lines: string[] = [`[${this.code}] ${this.message}`];

    if (this.suggestions.length > 0) {
      lines.push('  Suggestions:');
      this.suggestions.forEach((s) => lines.push(`    ${arrow} ${s}`));
    }

    if (options?.verbose && this.cause) {
      lines.push(`  Caused by: ${this.cause.message}`);
    }

    return lines.join('\n');
  }
}

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * Normalize anything thrown into a CliError
 */
export function wrapError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (isGroundCheckError(error)) {
    const code: ErrorCode = error.code === 'VALIDATION_ERROR' ? 'INVALID_INPUT' : 'UNKNOWN_ERROR';
    return new CliError(error.message, code, {
      suggestions: error.recoveryHint ? [error.recoveryHint] : ERROR_DEFAULTS[code].suggestions,
      cause: error,
    });
  }

  if (error instanceof Error) {
    if (error.message.startsWith('Invalid configuration:') || error.message.startsWith('Production requires HTTPS')) {
      return CliError.fromCode('CONFIG_INVALID', error.message, { cause: error });
    }
    return CliError.fromCode('UNKNOWN_ERROR', error.message, { cause: error });
  }

  return CliError.fromCode('UNKNOWN_ERROR', String(error));
}
