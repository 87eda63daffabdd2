/**
 * Error system
 *
 * - Unique error codes (SHARDSTATS_W100, SHARDSTATS_D201, ...)
 * - Suggestions for resolution
 * - Error categorization
 * - Error chaining through `cause`
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConfigError,
  DispatchError,
  DocumentDecodeError,
  ShardStatsError,
  StreamDecodeError,
  ensureShardStatsError,
  type DocumentFieldIssue,
  type SerializedShardStatsError,
  type ShardStatsErrorOptions,
} from './shard-stats-error.js';
