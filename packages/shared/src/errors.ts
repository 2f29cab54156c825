/**
 * Error codes used throughout tokentally.
 * Invalid option values exit with code 2, a missing root path with code 3,
 * everything else with code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  // Missing root path (exit code 3)
  | 'PathNotFoundError'
  // Structural runtime errors (exit code 1)
  | 'ScanError'
  // Per-file errors, caught by the counter and never fatal
  | 'FileReadError'
  | 'DecodeError'
  | 'TokenizeError'
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
 * Base error class for all tokentally errors.
 *
 * @example
 * ```typescript
 * throw new AppError('ScanError', 'Cannot read directory', {
 *   cause: originalError,
 *   details: { path: 'src/' },
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
 * Error thrown when option values fail validation.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when the path given to scan does not exist.
 */
export class PathNotFoundError extends AppError {
  /** The path that could not be found */
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('PathNotFoundError', `Path does not exist: ${path}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when a directory in the tree cannot be listed.
 * Aborts the whole run.
 */
export class ScanError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ScanError', message, options);
  }
}

/**
 * Error thrown when a single file cannot be stat'ed or read.
 */
export class FileReadError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FileReadError', message, options);
  }
}

/**
 * Error thrown when file content is not valid UTF-8.
 */
export class DecodeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DecodeError', message, options);
  }
}

/**
 * Error thrown when the tokenizer rejects the text.
 */
export class TokenizeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TokenizeError', message, options);
  }
}

/**
 * Maps an error to the process exit code the CLI should use.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return 2;
  }
  if (error instanceof PathNotFoundError) {
    return 3;
  }
  return 1;
}

/**
 * Extracts a printable message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
