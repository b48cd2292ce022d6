/**
 * Error codes used throughout release-stager.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'IoError'
  | 'ArchiveError'
  | 'VcsError'
  | 'TemplateError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all release-stager errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IoError', 'Unable to remove directory', {
 *   cause: originalError,
 *   details: { path: '/tmp/work/binaries' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a directory reset or file copy fails.
 * Always carries the offending path(s) in `details`.
 */
export class IoError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('IoError', message, options);
  }
}

/**
 * Error thrown when the site directory is missing or the site archive cannot be written.
 */
export class ArchiveError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ArchiveError', message, options);
  }
}

/**
 * Error thrown when a checkout, add, or commit fails.
 * Includes the raw output of the version-control command when available.
 */
export class VcsError extends AppError {
  /** Output of the failed command, with credentials redacted */
  public readonly commandOutput?: string;

  constructor(message: string, options: AppErrorOptions & { commandOutput?: string } = {}) {
    super('VcsError', message, options);
    this.commandOutput = options.commandOutput;
  }
}

/**
 * Error thrown when a document template cannot be loaded or rendered.
 */
export class TemplateError extends AppError {
  /** Identifier of the template that failed */
  public readonly templateId: string;

  constructor(templateId: string, message: string, options: AppErrorOptions = {}) {
    super('TemplateError', `Template "${templateId}": ${message}`, options);
    this.templateId = templateId;
  }
}

/**
 * Returns true when the error is user-correctable and should exit with code 2.
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}
