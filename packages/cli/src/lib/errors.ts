/**
 * Deterministic Error Codes for the sqltrail CLI
 *
 * Format: SQT_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Configuration errors
 * - EXTRACT: Extraction errors
 * - IO: File system errors
 * - CLI: Command line argument errors
 */

import { ConfigError } from '../../../collector/src/index.js';

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_INVALID: 'SQT_CONFIG_001',

  // EXTRACT errors (200-299)
  EXTRACT_FAILED: 'SQT_EXTRACT_201',

  // IO errors (300-399)
  IO_READ_ERROR: 'SQT_IO_301',
  IO_WRITE_ERROR: 'SQT_IO_302',
  IO_PATH_NOT_FOUND: 'SQT_IO_304',

  // CLI errors (400-499)
  CLI_INVALID_ARGUMENT: 'SQT_CLI_401',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file is invalid',

  [ErrorCodes.EXTRACT_FAILED]: 'Failed to extract database operations',

  [ErrorCodes.IO_READ_ERROR]: 'Failed to read file',
  [ErrorCodes.IO_WRITE_ERROR]: 'Failed to write file',
  [ErrorCodes.IO_PATH_NOT_FOUND]: 'Path not found',

  [ErrorCodes.CLI_INVALID_ARGUMENT]: 'Invalid argument provided',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: `
Check sqltrail.config.yaml (or .sqltrailrc, .sqltrail/config.yaml) for errors.

Common issues:
- 'include' and 'exclude' must be lists of glob patterns
- 'extraction.dynamicSql' must be template or sentinel
- 'extraction.bodyMatching' must be block-stack or begin-count

Show the configuration in effect:
  sqltrail config
`.trim(),

  [ErrorCodes.EXTRACT_FAILED]: `
Extraction stopped on an unexpected error.

Run again with --verbose and SQLTRAIL_COLLECTOR_DEBUG=1 to see which unit
was being processed, then narrow 'include' or add the unit to 'exclude'.
`.trim(),

  [ErrorCodes.IO_READ_ERROR]: `
Failed to read a file. Check:

1. The file exists and is readable
2. The configured encoding matches the file (utf8 or latin1)

Try: cat <file> to verify readability.
`.trim(),

  [ErrorCodes.IO_WRITE_ERROR]: `
Failed to write the output file. Check:

1. You have write permission
2. There's enough disk space

Or write to stdout instead:
  sqltrail collect --out -
`.trim(),

  [ErrorCodes.IO_PATH_NOT_FOUND]: `
The specified path doesn't exist.

Check:
1. You're in the correct directory
2. The path is spelled correctly

Run: pwd && ls to verify your location.
`.trim(),

  [ErrorCodes.CLI_INVALID_ARGUMENT]: `
Invalid command-line argument.

Run: sqltrail --help

Common commands:
  sqltrail collect -t <dir> -o trail.json   # Collect a project
  sqltrail unit <file.pas>                  # Inspect one unit
  sqltrail config                           # Show resolved configuration
`.trim(),
};

/**
 * Structured CLI Error with deterministic error code
 */
export class CLIError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    const baseMessage = message ?? ErrorMessages[code];
    super(baseMessage, { cause: options?.cause });

    this.name = 'CLIError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, CLIError);
  }

  /**
   * Get remediation guidance for this error
   */
  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  /**
   * Format error with remediation for user display
   */
  toUserStringWithRemediation(verbose = false): string {
    const parts: string[] = [this.toUserString(verbose)];
    const remediation = this.getRemediation();

    if (remediation) {
      parts.push('\n\nHow to fix:\n');
      // Indent each line of remediation
      const indented = remediation
        .split('\n')
        .map((line) => `  ${line}`)
        .join('\n');
      parts.push(indented);
    }

    return parts.join('');
  }

  /**
   * Format error for JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

/**
 * Check if an error is a CLIError
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Wrap an unknown error in a CLIError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CLIError(code, message, { cause });
}

/**
 * Map a config loading failure to CONFIG_INVALID, keeping the file path
 */
export function wrapConfigError(error: unknown): CLIError {
  if (error instanceof ConfigError) {
    return new CLIError(ErrorCodes.CONFIG_INVALID, `${error.configPath}: ${error.message}`, {
      cause: error,
      details: { configPath: error.configPath },
    });
  }
  return wrapError(error, ErrorCodes.CONFIG_INVALID);
}
