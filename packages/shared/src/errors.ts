/**
 * Error codes surfaced in the `error` field of every failed command result.
 * Usage and configuration errors exit with code 2, plan write failures and
 * internal errors with code 1; every other code is an expected answer and
 * exits with 0.
 */
export type ErrorCode =
  // Plan document loading
  | 'not_found'
  | 'invalid_json'
  | 'bad_schema'
  | 'empty_tasks'
  | 'malformed_plan'
  // Graph and state rules
  | 'validation_failed'
  | 'cycle_detected'
  | 'invalid_transition'
  | 'invalid_input'
  // Learning stores
  | 'quality_gate'
  | 'duplicate'
  // Storage
  | 'read_failed'
  | 'write_failed'
  // User-correctable (exit code 2)
  | 'usage_error'
  | 'config_error'
  | 'internal_error';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Structured context merged into the JSON error result */
  details?: Record<string, unknown>;
}

/**
 * Base error class for every failure raised below the CLI facade.
 *
 * @example
 * ```typescript
 * throw new AppError('invalid_input', 'index 7 is out of range', {
 *   details: { index: 7, nodeCount: 3 },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown>;
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
 * Raised when a plan file does not exist.
 */
export class PlanNotFoundError extends AppError {
  constructor(path: string, options: AppErrorOptions = {}) {
    super('not_found', `No plan found at ${path}`, options);
  }
}

/**
 * Raised when a plan file cannot be parsed or does not match the document
 * schema. The code tells "plan too old" apart from "plan is garbage".
 */
export class PlanSchemaError extends AppError {
  constructor(
    code: Extract<ErrorCode, 'invalid_json' | 'bad_schema' | 'empty_tasks' | 'malformed_plan'>,
    message: string,
    options: AppErrorOptions = {},
  ) {
    super(code, message, options);
  }
}

/**
 * Raised when the dependency graph contains a cycle.
 */
export class CycleError extends AppError {
  /** Node indices forming the cycle, in traversal order */
  public readonly cycle: number[];

  constructor(cycle: number[], options: AppErrorOptions = {}) {
    super('cycle_detected', `Dependency cycle between nodes ${cycle.join(' -> ')}`, {
      ...options,
      details: { ...options.details, cycle },
    });
    this.cycle = cycle;
  }
}

/**
 * Raised when a status update is not allowed from the node's current status.
 */
export class InvalidTransitionError extends AppError {
  constructor(index: number, from: string, to: string, options: AppErrorOptions = {}) {
    super('invalid_transition', `Node ${index} cannot move from ${from} to ${to}`, {
      ...options,
      details: { ...options.details, index, from, to },
    });
  }
}

/**
 * Raised when command input (stdin payloads, flags) is structurally wrong.
 */
export class InvalidInputError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('invalid_input', message, options);
  }
}

/**
 * A deliberate rejection by a memory or reflection quality gate.
 */
export class QualityGateError extends AppError {
  constructor(
    message: string,
    options: AppErrorOptions & { code?: Extract<ErrorCode, 'quality_gate' | 'duplicate'> } = {},
  ) {
    super(options.code ?? 'quality_gate', message, options);
  }
}

/**
 * Raised when a file cannot be read or written.
 */
export class StorageError extends AppError {
  /** Path of the file involved */
  public readonly path: string;

  constructor(
    code: Extract<ErrorCode, 'read_failed' | 'write_failed'>,
    path: string,
    options: AppErrorOptions = {},
  ) {
    const reason = options.cause instanceof Error ? `: ${options.cause.message}` : '';
    const verb = code === 'read_failed' ? 'read' : 'write';
    super(code, `Failed to ${verb} ${path}${reason}`, {
      ...options,
      details: { ...options.details, path },
    });
    this.path = path;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('config_error', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('usage_error', message, options);
  }
}

/**
 * Exit code for a failure. Expected domain answers exit 0 so callers can
 * always parse stdout.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  if (error instanceof AppError && error.code !== 'internal_error' && error.code !== 'write_failed') {
    return 0;
  }
  return 1;
}

/**
 * Normalises anything thrown into an AppError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AppError('internal_error', message, { cause: error });
}
