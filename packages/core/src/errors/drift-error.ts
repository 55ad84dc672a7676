/**
 * DriftError - structured error class shared by every driftsync package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a DriftError
 */
export interface DriftErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a DriftError
 */
export interface SerializedDriftError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedDriftError | { name: string; message: string; stack?: string };
}

/**
 * Error class for driftsync with structured error information.
 *
 * Every failure the engine raises is a DriftError, so callers can branch on
 * {@link DriftError.category} to pick a recovery path:
 *
 * - `integrity`: the bytes are corrupted, replace the local copy
 * - `causality`: the local copy drifted, request a full resync
 * - `resolution`: not a failure; a conflict is waiting for outside input
 * - `validation`: the caller passed something the engine cannot encode
 *
 * @example
 * ```typescript
 * try {
 *   engine.applyPatch(patch, local);
 * } catch (error) {
 *   if (DriftError.isCategory(error, 'causality')) {
 *     await manager.requestFullSync();
 *   } else if (DriftError.isCategory(error, 'integrity')) {
 *     replaceFromSnapshot();
 *   } else {
 *     throw error;
 *   }
 * }
 * ```
 */
export class DriftError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: DriftErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'DriftError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DriftError);
    }
  }

  /**
   * Create a DriftError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): DriftError {
    return new DriftError({ code, context });
  }

  /**
   * Wrap an existing error with a DriftError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): DriftError {
    return new DriftError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a DriftError
   */
  static isDriftError(error: unknown): error is DriftError {
    return error instanceof DriftError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return DriftError.isDriftError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return DriftError.isDriftError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedDriftError {
    const result: SerializedDriftError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (DriftError.isDriftError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Data failed a checksum after transmission or transformation.
 *
 * Never retried with the same bytes: the sender has to regenerate the
 * message or the receiver has to fetch a full replacement.
 */
export class IntegrityError extends DriftError {
  constructor(
    code: 'DRIFT_I100' | 'DRIFT_I101',
    context: Record<string, unknown> = {},
    message?: string
  ) {
    super({ code, context, message });
    this.name = 'IntegrityError';
  }
}

/**
 * The local copy no longer matches what a patch was generated against.
 */
export class CausalityError extends DriftError {
  constructor(
    code: 'DRIFT_C200' | 'DRIFT_C201',
    context: Record<string, unknown> = {},
    message?: string
  ) {
    super({ code, context, message });
    this.name = 'CausalityError';
  }

  /** Causality errors are always recovered by a full resync */
  get needsFullResync(): true {
    return true;
  }
}

/**
 * Convert an unknown thrown value into a DriftError
 */
export function ensureDriftError(error: unknown, code: ErrorCode = 'DRIFT_X900'): DriftError {
  if (DriftError.isDriftError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return DriftError.wrap(error, code);
  }
  return new DriftError({ code, message: String(error) });
}
