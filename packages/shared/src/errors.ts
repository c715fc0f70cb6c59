/**
 * Error codes used throughout gitsift.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'NotFound'
  | 'InvalidRepository'
  | 'DirectoryNotFound'
  | 'CloneError'
  | 'ParseFailure'
  | 'ProcessError'
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
 * Base error class for all gitsift errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('CloneError', 'Failed to clone repository', {
 *   cause: originalError,
 *   details: { source: 'https://example.com/repo.git' }
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
 * User-correctable - suggests fixing configuration files or flags.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when an operation receives an argument it cannot honour,
 * such as an unknown tree style or a directory outside the repository.
 */
export class InvalidArgumentError extends ConfigError {
  /** Name of the offending argument */
  public readonly argument: string;

  constructor(argument: string, message: string, options: AppErrorOptions = {}) {
    super(message, options);
    this.argument = argument;
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a repository source path does not exist.
 */
export class RepositoryNotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFound', message, options);
  }
}

/**
 * Error thrown when a source exists but cannot be used as a repository root.
 */
export class InvalidRepositoryError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidRepository', message, options);
  }
}

/**
 * Error thrown when a subdirectory argument does not exist in the repository.
 */
export class DirectoryNotFoundError extends AppError {
  /** The directory as requested, relative to the repository root */
  public readonly directory: string;

  constructor(directory: string, options: AppErrorOptions = {}) {
    super('DirectoryNotFound', `Directory not found: ${directory}`, options);
    this.directory = directory;
  }
}

/**
 * Error thrown when cloning or updating a remote source fails.
 */
export class CloneError extends AppError {
  /** The remote source that failed */
  public readonly source: string;

  constructor(source: string, options: AppErrorOptions = {}) {
    super('CloneError', `Failed to clone repository: ${source}`, options);
    this.source = source;
  }
}

/**
 * Error thrown when a manifest file cannot be read or decoded as a whole.
 * Caught by the dependency layer and turned into a failed result.
 */
export class ManifestParseError extends AppError {
  /** Manifest path relative to the repository root */
  public readonly manifest: string;

  constructor(manifest: string, message: string, options: AppErrorOptions = {}) {
    super('ParseFailure', `${manifest}: ${message}`, options);
    this.manifest = manifest;
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Returns the `code` of a Node.js system error (`ENOENT`, `EBUSY`, ...), if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
