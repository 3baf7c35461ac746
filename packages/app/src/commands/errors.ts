/**
 * Error handling for commands
 *
 * Provides friendly error messages, structured error codes and the process
 * exit code each failure maps to.
 */

import { isCrossoverError } from '@crossover/contracts';

/**
 * Command error codes
 */
export enum CommandErrorCode {
  /** Invalid command arguments */
  INVALID_ARGS = 'INVALID_ARGS',
  /** Configuration could not be loaded or validated */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Market data provider error */
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  /** Output formatting error */
  FORMAT_ERROR = 'FORMAT_ERROR',
  /** Internal command error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Friendly error messages for each error code
 */
export const ERROR_MESSAGES: Record<CommandErrorCode, string> = {
  [CommandErrorCode.INVALID_ARGS]: 'Invalid command arguments provided',
  [CommandErrorCode.CONFIG_ERROR]: 'Failed to load configuration',
  [CommandErrorCode.PROVIDER_ERROR]: 'Failed to fetch market data from provider',
  [CommandErrorCode.FORMAT_ERROR]: 'Failed to format output',
  [CommandErrorCode.INTERNAL_ERROR]: 'Internal command error',
};

/**
 * Process exit codes. Usage and configuration mistakes exit 2, every other
 * failure exits 1.
 */
export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export function exitCodeFor(code: CommandErrorCode): number {
  return code === CommandErrorCode.INVALID_ARGS || code === CommandErrorCode.CONFIG_ERROR
    ? EXIT_CODES.USAGE
    : EXIT_CODES.FAILURE;
}

/**
 * Command error class
 *
 * Extends Error with structured error codes and context.
 */
export class CommandError extends Error {
  readonly code: CommandErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: CommandErrorCode,
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message || ERROR_MESSAGES[code], cause ? { cause } : undefined);

    this.name = 'CommandError';
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, CommandError);
  }

  get exitCode(): number {
    return exitCodeFor(this.code);
  }

  /**
   * Format error for display
   */
  format(verbose: boolean = false): string {
    const lines: string[] = [];

    lines.push(`Error: ${this.message}`);
    lines.push(`Code: ${this.code}`);

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (verbose && this.cause instanceof Error) {
      lines.push('Caused by:');
      lines.push(`  ${this.cause.message}`);
      if (this.cause.stack) {
        lines.push(`  ${this.cause.stack}`);
      }
    }

    if (verbose && this.stack) {
      lines.push('Stack trace:');
      lines.push(this.stack);
    }

    return lines.join('\n');
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause:
        this.cause instanceof Error
          ? {
              name: this.cause.name,
              message: this.cause.message,
            }
          : undefined,
    };
  }
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (error instanceof CommandError) {
    return error.format(verbose);
  }

  if (error instanceof Error) {
    const lines: string[] = [];
    lines.push(`Error: ${error.message}`);

    if (verbose && error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }

    return lines.join('\n');
  }

  return `Error: ${String(error)}`;
}

/**
 * Wrap an error with command error context
 */
export function wrapError(
  error: unknown,
  code: CommandErrorCode,
  context?: Record<string, unknown>
): CommandError {
  if (error instanceof CommandError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CommandError(code, `${ERROR_MESSAGES[code]}: ${cause.message}`, context, cause);
}

/**
 * Fields describing `error` on a log line. Command context and the data of
 * crossover errors (ticker, provider, reason) are kept; the stack only when
 * asked for.
 */
export function errorLogFields(error: unknown, includeStack: boolean = false): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { name: 'Unknown', message: String(error) };
  }

  const fields: Record<string, unknown> = { name: error.name, message: error.message };

  if (error instanceof CommandError) {
    fields['code'] = error.code;
    if (error.context) {
      fields['context'] = error.context;
    }
    if (error.cause instanceof Error) {
      fields['cause'] = errorLogFields(error.cause);
    }
  } else if (isCrossoverError(error)) {
    fields['code'] = error.code;
    if (error.data) {
      fields['data'] = error.data;
    }
  } else if ('code' in error && typeof error.code === 'string') {
    fields['code'] = error.code;
  }

  if (includeStack && error.stack) {
    fields['stack'] = error.stack;
  }

  return fields;
}
