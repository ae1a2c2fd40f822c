/**
 * Error codes used throughout the harness.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'CorpusError'
  // Runtime errors (exit code 1)
  | 'AgentError'
  | 'SandboxError'
  | 'VerificationError'
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
 * Base error class for all harness errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('AgentError', 'Agent process crashed', {
 *   cause: originalError,
 *   details: { strategy: 'react', exitCode: 3 }
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
 * Error thrown when a corpus manifest is malformed, incomplete, or collides with
 * another entry. Fatal to the whole run: raised before any scenario executes.
 */
export class CorpusError extends AppError {
  /** Id of the offending scenario, when one could be determined */
  public readonly scenarioId?: string;
  /** Name of the missing or invalid field */
  public readonly field?: string;

  constructor(
    message: string,
    options: AppErrorOptions & { scenarioId?: string; field?: string } = {},
  ) {
    super('CorpusError', message, options);
    this.scenarioId = options.scenarioId;
    this.field = options.field;
  }

  /** Builds the canonical "missing field" error for a scenario. */
  static missingField(scenarioId: string, field: string): CorpusError {
    return new CorpusError(`scenario ${scenarioId}: missing field '${field}'`, {
      scenarioId,
      field,
    });
  }
}

/**
 * Error thrown when the external repair agent fails (crash, malformed output).
 * Recorded as an AgentError verdict; never retried.
 */
export class AgentError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('AgentError', message, options);
  }
}

/** Where in the sandbox lifecycle a SandboxError was raised. */
export type SandboxPhase = 'workspace' | 'materialize' | 'patch' | 'spawn' | 'cancelled';

/**
 * Error thrown when a workspace cannot be prepared, a patch cannot be applied,
 * or the verification command cannot be started.
 * Transient failures may be retried by the orchestrator.
 */
export class SandboxError extends AppError {
  public readonly phase: SandboxPhase;
  public readonly transient: boolean;

  constructor(
    message: string,
    options: AppErrorOptions & { phase: SandboxPhase; transient?: boolean },
  ) {
    super('SandboxError', message, options);
    this.phase = options.phase;
    this.transient = options.transient ?? false;
  }
}

/**
 * Error raised when an expected-fix descriptor is ambiguous or cannot be evaluated.
 * Surfaced as a warning on the verdict rather than thrown out of a run.
 */
export class VerificationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('VerificationError', message, options);
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
 * Errors the user can fix by correcting input: bad flags, config or corpus.
 */
export function isUserCorrectable(error: unknown): boolean {
  return (
    error instanceof ConfigError || error instanceof UsageError || error instanceof CorpusError
  );
}
