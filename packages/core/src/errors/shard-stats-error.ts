/**
 * ShardStatsError - structured error with code, category and context
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a ShardStatsError
 */
export interface ShardStatsErrorOptions {
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
 * Serialized format of a ShardStatsError
 */
export interface SerializedShardStatsError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedShardStatsError | { name: string; message: string; stack?: string };
}

/**
 * Base error for every structural failure raised by the shardstats packages.
 *
 * Partial shard failures are never raised: they travel as `ShardFailure` data
 * inside the response. This class covers decode failures, invalid configuration
 * and the per-shard errors the dispatcher converts into failure records.
 *
 * @example
 * ```typescript
 * try {
 *   IndicesStatsResponse.fromBytes(bytes, commonStatsKind);
 * } catch (error) {
 *   if (ShardStatsError.isCode(error, 'SHARDSTATS_W100')) {
 *     console.log('Truncated response');
 *   } else if (ShardStatsError.isCategory(error, 'document')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class ShardStatsError extends Error {
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

  constructor(options: ShardStatsErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'ShardStatsError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create an error from a code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): ShardStatsError {
    return new ShardStatsError({ code, context });
  }

  /**
   * Wrap an existing error
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): ShardStatsError {
    return new ShardStatsError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isShardStatsError(error: unknown): error is ShardStatsError {
    return error instanceof ShardStatsError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return ShardStatsError.isShardStatsError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return ShardStatsError.isShardStatsError(error) && error.category === category;
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
  toJSON(): SerializedShardStatsError {
    const result: SerializedShardStatsError = {
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
      if (ShardStatsError.isShardStatsError(this.cause)) {
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
 * A binary stream could not be decoded: it is truncated, carries an invalid
 * flag or varint, or has bytes left over after the last field.
 */
export class StreamDecodeError extends ShardStatsError {
  /** Stream offset at which decoding stopped */
  readonly offset: number;

  constructor(code: 'SHARDSTATS_W100' | 'SHARDSTATS_W101', message: string, offset: number) {
    super({ code, message, context: { offset } });
    this.name = 'StreamDecodeError';
    this.offset = offset;
  }
}

/**
 * Field-level issue found while decoding a document
 */
export interface DocumentFieldIssue {
  /** Field path (e.g. 'indices.logs.primaries.docs.count') */
  path: string;
  /** Human-readable issue */
  message: string;
}

/**
 * A document could not be decoded
 */
export class DocumentDecodeError extends ShardStatsError {
  readonly issues: DocumentFieldIssue[];

  constructor(
    code: 'SHARDSTATS_D200' | 'SHARDSTATS_D201',
    message: string,
    issues: DocumentFieldIssue[] = [],
    cause?: Error
  ) {
    super({ code, message, context: issues.length > 0 ? { issues } : {}, cause });
    this.name = 'DocumentDecodeError';
    this.issues = issues;
  }
}

/**
 * A single shard request failed or timed out
 */
export class DispatchError extends ShardStatsError {
  constructor(
    code: 'SHARDSTATS_B300' | 'SHARDSTATS_B301',
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'DispatchError';
  }
}

/**
 * Configuration failed validation
 */
export class ConfigError extends ShardStatsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'SHARDSTATS_C400', message, context });
    this.name = 'ConfigError';
  }
}

/**
 * Normalise any thrown value into a ShardStatsError
 */
export function ensureShardStatsError(
  error: unknown,
  defaultCode: ErrorCode = 'SHARDSTATS_X900'
): ShardStatsError {
  if (ShardStatsError.isShardStatsError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return ShardStatsError.wrap(error, defaultCode);
  }

  return new ShardStatsError({
    code: defaultCode,
    message: String(error),
  });
}
