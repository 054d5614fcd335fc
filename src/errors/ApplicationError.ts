/**
 * Unified Error Hierarchy for reel-shuffle
 *
 * Every failure the pipeline can raise is one of these classes. They carry:
 * - Machine-readable error codes
 * - Context metadata for structured logging
 * - The wrapped cause, when there is one
 *
 * None of them is retried: the run aborts and the operator fixes the
 * environment before running again.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // File System Errors
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_DIRECTORY_UNAVAILABLE = 'FS_DIRECTORY_UNAVAILABLE',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',

  // Configuration Errors
  CONFIG_MISSING = 'CONFIG_MISSING',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors
  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'findMovies', 'writePlaylist') */
  operation?: string;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in reel-shuffle extend this class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  public readonly context: ErrorContext;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    // The wrapped error lands on the standard `cause` property
    super(message, options.cause ? { cause: options.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// FILE SYSTEM ERRORS
// ============================================

export class FileSystemError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      context: { ...context, metadata: { ...context?.metadata, path } },
      ...(cause && { cause }),
    });
  }
}

export class FileNotFoundError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext) {
    super(
      message || `File not found: ${path}`,
      ErrorCode.FS_FILE_NOT_FOUND,
      path,
      context
    );
  }
}

/**
 * A configured directory does not exist, usually an unmounted network share
 */
export class DirectoryUnavailableError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Directory '${path}' not found`,
      ErrorCode.FS_DIRECTORY_UNAVAILABLE,
      path,
      context,
      cause
    );
  }
}

/**
 * Playback was requested before a playlist file was written
 */
export class PlaylistMissingError extends FileNotFoundError {
  constructor(path: string, context?: ErrorContext) {
    super(path, `Playlist not found: ${path}`, { ...context, service: 'playerLauncher' });
  }
}

/**
 * Exclusion mode is on but the category's known-bad list is absent
 */
export class ExclusionListMissingError extends FileNotFoundError {
  constructor(
    path: string,
    public readonly category: string,
    context?: ErrorContext
  ) {
    super(
      path,
      `Known-bad list for category '${category}' not found: ${path}`,
      { ...context, service: 'movieLocator', metadata: { ...context?.metadata, category } }
    );
  }
}

export class FileWriteError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Failed to write file: ${path}`,
      ErrorCode.FS_WRITE_FAILED,
      path,
      context,
      cause
    );
  }
}

// ============================================
// CONFIGURATION ERRORS
// ============================================

export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext,
    code: ErrorCode = ErrorCode.CONFIG_INVALID
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      code,
      { context: { ...context, metadata: { ...context?.metadata, configKey } } }
    );
  }
}

// ============================================
// SYSTEM ERRORS
// ============================================

export class SystemError extends ApplicationError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, {
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ProcessError extends SystemError {
  constructor(
    public readonly processName: string,
    public readonly exitCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Process '${processName}' failed with exit code ${exitCode}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      { ...context, metadata: { ...context?.metadata, processName, exitCode } },
      cause
    );
  }
}

export class DependencyError extends SystemError {
  constructor(
    public readonly dependency: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Missing or invalid dependency: ${dependency}`,
      ErrorCode.SYSTEM_DEPENDENCY_MISSING,
      { ...context, metadata: { ...context?.metadata, dependency } }
    );
  }
}

/**
 * A required program does not resolve on the executable search path
 */
export class MissingProgramError extends DependencyError {
  constructor(program: string, context?: ErrorContext) {
    super(program, `Error: ${program} is not installed.`, { ...context, service: 'environment' });
  }
}
