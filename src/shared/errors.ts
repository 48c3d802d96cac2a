/**
 * Error codes used throughout lgrep.
 * Usage errors end the run before any file is read (exit code 2).
 * Path errors are reported per path and the run continues (exit code 1).
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'UsageError'
  // Per-path errors (exit code 1)
  | 'NotFoundError'
  | 'NotAFileError'
  | 'OpenError'
  | 'ReadError';

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
 * Base error class for all lgrep errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('OpenError', 'notes.txt: Permission denied', {
 *   cause: originalError,
 *   details: { path: 'notes.txt' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable; `details` carries the usage text when available.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Base class for failures tied to a single input path.
 * The message always starts with the offending path.
 */
export abstract class PathError extends AppError {
  /** The path as the user supplied it, or as the directory walk produced it */
  public readonly path: string;

  protected constructor(code: ErrorCode, path: string, reason: string, options: AppErrorOptions) {
    super(code, `${path}: ${reason}`, options);
    this.path = path;
  }
}

/**
 * Error reported when a path does not exist.
 */
export class NotFoundError extends PathError {
  constructor(path: string, options: AppErrorOptions = {}) {
    super('NotFoundError', path, 'No such file or directory', options);
  }
}

/**
 * Error reported when a path is not a regular file, most often a directory
 * given without `-r`.
 */
export class NotAFileError extends PathError {
  constructor(path: string, reason = 'Is a directory', options: AppErrorOptions = {}) {
    super('NotAFileError', path, reason, options);
  }
}

/**
 * Error reported when a path exists but cannot be inspected, listed or opened.
 */
export class OpenError extends PathError {
  constructor(path: string, options: AppErrorOptions = {}) {
    super('OpenError', path, describeSystemError(options.cause), options);
  }
}

/**
 * Error reported when a file fails part way through reading.
 */
export class ReadError extends PathError {
  constructor(path: string, options: AppErrorOptions = {}) {
    super('ReadError', path, describeSystemError(options.cause), options);
  }
}

const SYSTEM_ERROR_MESSAGES: Record<string, string> = {
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EISDIR: 'Is a directory',
  ENOTDIR: 'Not a directory',
  ENOENT: 'No such file or directory',
  EIO: 'Input/output error',
  ELOOP: 'Too many levels of symbolic links',
  EMFILE: 'Too many open files',
  ENAMETOOLONG: 'File name too long',
};

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Turns a filesystem failure into a short reason such as
 * `Permission denied (EACCES)`.
 */
export function describeSystemError(error: unknown): string {
  if (isNodeError(error) && typeof error.code === 'string') {
    const known = SYSTEM_ERROR_MESSAGES[error.code];
    return known ? `${known} (${error.code})` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? 'Unknown error' : String(error);
}
