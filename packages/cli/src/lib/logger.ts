/**
 * Structured Logger for the sqltrail CLI
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Verbose mode support
 * - Silent mode for machine-readable output
 * - Redaction of secrets, including passwords inside connection strings
 *
 * Everything goes to stderr so stdout stays free for artifacts.
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

/**
 * Patterns that indicate sensitive data to redact
 */
const SENSITIVE_PATTERNS = [/password/i, /passwd/i, /secret/i, /token/i, /credential/i];

/**
 * `Password=...;` and `pwd=...` pairs in ADO / FireDAC / BDE connection strings
 */
const CONNECTION_PASSWORD_PATTERN = /\b(password|pwd)(\s*=\s*)("[^"]*"|'[^']*'|[^;'"\s]*)/gi;

/**
 * `user:password@host` in database URLs
 */
const URL_CREDENTIAL_PATTERN = /(\/\/[^:/@\s]+:)([^@\s]+)(@)/g;

/**
 * Mask credentials embedded in free text
 */
export function redactConnectionSecrets(text: string): string {
  return text
    .replace(CONNECTION_PASSWORD_PATTERN, (_match: string, key: string, separator: string) => {
      return `${key}${separator}[REDACTED]`;
    })
    .replace(URL_CREDENTIAL_PATTERN, '$1[REDACTED]$3');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Logger {
  private verbose = false;
  private silent = false;
  private json = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.json = options.json ?? false;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /**
   * Log a step in a process (for progress indication)
   */
  step(step: number, total: number, message: string): void {
    if (this.silent || this.json) return;
    console.error(pc.dim(`[${step}/${total}]`), message);
  }

  /**
   * Log a success message
   */
  success(message: string): void {
    if (this.silent || this.json) return;
    console.error(pc.green('✓'), message);
  }

  /**
   * Log a failure message
   */
  fail(message: string): void {
    console.error(pc.red('✗'), redactConnectionSecrets(message));
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const redactedMessage = redactConnectionSecrets(message);
    const redactedData = data ? this.redact(data) : undefined;

    if (this.json) {
      console.error(
        JSON.stringify({
          timestamp,
          level,
          message: redactedMessage,
          ...(redactedData && { data: redactedData }),
        })
      );
      return;
    }

    console.error(`${this.getPrefix(level)} ${redactedMessage}`);

    if (this.verbose && redactedData) {
      console.error(pc.dim(JSON.stringify(redactedData, null, 2)));
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return pc.dim('[DEBUG]');
      case 'info':
        return pc.blue('[INFO]');
      case 'warn':
        return pc.yellow('[WARN]');
      case 'error':
        return pc.red('[ERROR]');
    }
  }

  /**
   * Redact sensitive data from log output
   */
  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.isSensitiveKey(key)) {
        redacted[key] = '[REDACTED]';
      } else if (typeof value === 'string') {
        redacted[key] = redactConnectionSecrets(value);
      } else if (isRecord(value)) {
        redacted[key] = this.redact(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }

  private isSensitiveKey(key: string): boolean {
    return SENSITIVE_PATTERNS.some((pattern) => pattern.test(key));
  }
}

// Singleton logger instance
export const logger = new Logger();

// Convenience exports
export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const step = logger.step.bind(logger);
export const success = logger.success.bind(logger);
export const fail = logger.fail.bind(logger);
