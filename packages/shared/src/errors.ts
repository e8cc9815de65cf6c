/**
 * Error codes used throughout cyforge.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'PatternError'
  // Runtime errors (exit code 1)
  | 'ScanError'
  | 'CompileError'
  | 'MissingModuleError'
  | 'CacheError'
  | 'ProcessError'
  | 'StateError'
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
 * Base error class for all cyforge errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('CacheError', 'Fingerprint store is unreadable', {
 *   cause: originalError,
 *   details: { path: '.cyforge/fingerprints.json' }
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
 * Error thrown when an exclusion rule cannot be compiled.
 * Fatal at startup: a build never begins with a broken rule set.
 */
export class PatternError extends AppError {
  /** Zero-based position of the rule in the rule set */
  public readonly ruleIndex: number;
  /** The rule exactly as it was written */
  public readonly rawText: string;

  constructor(ruleIndex: number, rawText: string, reason: string, options: AppErrorOptions = {}) {
    super('PatternError', `Invalid exclusion rule #${ruleIndex} "${rawText}": ${reason}`, {
      ...options,
      details: { ruleIndex, rawText, reason },
    });
    this.ruleIndex = ruleIndex;
    this.rawText = rawText;
  }
}

/**
 * Error raised while walking the target tree.
 * Non-fatal errors skip the affected subtree; a fatal one means the root itself is unusable.
 */
export class ScanError extends AppError {
  /** Directory (relative to the scan root) that could not be read */
  public readonly relativePath: string;
  public readonly fatal: boolean;

  constructor(
    relativePath: string,
    message: string,
    options: AppErrorOptions & { fatal?: boolean } = {},
  ) {
    super('ScanError', message, options);
    this.relativePath = relativePath;
    this.fatal = options.fatal ?? false;
  }
}

/**
 * Error thrown when the external compiler rejects a unit.
 */
export class CompileError extends AppError {
  /** Exit code of the compiler process, when it ran at all */
  public readonly exitCode?: number;
  /** Captured compiler output */
  public readonly diagnostics: string;

  constructor(
    message: string,
    options: AppErrorOptions & { exitCode?: number; diagnostics?: string } = {},
    code: ErrorCode = 'CompileError',
  ) {
    super(code, message, options);
    this.exitCode = options.exitCode;
    this.diagnostics = options.diagnostics ?? '';
  }
}

/**
 * Compile failure caused by an import the toolchain could not resolve.
 * Surfaced separately so callers can install the modules and retry.
 */
export class MissingModuleError extends CompileError {
  public readonly moduleNames: string[];

  constructor(
    moduleNames: string[],
    options: AppErrorOptions & { exitCode?: number; diagnostics?: string } = {},
  ) {
    super(`Unresolved modules: ${moduleNames.join(', ')}`, options, 'MissingModuleError');
    this.moduleNames = moduleNames;
  }
}

/**
 * Error thrown when the fingerprint store is corrupt or unreadable.
 * Never fatal: callers fall back to an empty store.
 */
export class CacheError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CacheError', message, options);
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
 * Error thrown when the lifecycle is driven through a transition it does not allow.
 */
export class StateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super('StateError', `Illegal lifecycle transition: ${from} -> ${to}`, {
      details: { from, to },
    });
  }
}

/**
 * Errors the user can fix by changing input; the CLI exits with code 2 for these.
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError || error instanceof PatternError;
}
