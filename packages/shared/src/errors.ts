/**
 * Error codes used throughout moonfmt.
 * Configuration and usage errors abort a run before any file is touched.
 * The remaining codes describe per-entry or per-job failures that are folded into the exit status.
 */
export type ErrorCode =
  // Fatal, raised before dispatch
  | 'ConfigError'
  | 'UsageError'
  // Per-entry / per-job
  | 'FormatError'
  | 'IoError'
  | 'DiffError'
  | 'WalkError'
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
 * Base error class for all moonfmt errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new IoError(`Failed to read ${path}`, {
 *   cause: originalError,
 *   details: { path },
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
 * Error thrown when configuration is invalid or missing, including unparsable glob overrides.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
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
 * Error thrown by a formatting engine that cannot format its input.
 */
export class FormatError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FormatError', message, options);
  }
}

/**
 * Error thrown when reading or writing a file or standard stream fails.
 */
export class IoError extends AppError {
  /** Path involved, when the failure concerns a file */
  public readonly path?: string;

  constructor(message: string, options: AppErrorOptions & { path?: string } = {}) {
    super('IoError', message, options);
    this.path = options.path;
  }
}

/**
 * Error thrown when a diff cannot be rendered.
 */
export class DiffError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DiffError', message, options);
  }
}

/**
 * Error reported for a single entry that could not be traversed.
 * Never fatal to discovery.
 */
export class WalkError extends AppError {
  /** Path whose traversal failed */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('WalkError', message, options);
    this.path = path;
  }
}

function messageOf(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}

/**
 * Renders an error and every `cause` below it on a single line,
 * outermost context first: `Could not format file a.lua: input is not a text file`.
 */
export function formatErrorChain(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const message = messageOf(current);
    if (message) parts.push(message);
    current = current instanceof Error ? current.cause : undefined;
  }

  return parts.join(': ');
}

/**
 * The `code` of a Node.js system error (`ENOENT`, `EACCES`, ...), if there is one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Wraps a thrown non-Error value so it can travel through error-typed channels.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
