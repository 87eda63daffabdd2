/**
 * @shardstats/broadcast - broadcast requests and responses over many shards
 *
 * @example
 * ```typescript
 * import { PayloadCarrier, SuggestQueryBuilder, createBroadcastDispatcher } from '@shardstats/broadcast';
 *
 * const request = new PayloadCarrier('logs', 'metrics')
 *   .setRouting('user-1')
 *   .setPayloadFromStructuredQuery(new SuggestQueryBuilder().text('shrd').term('fix', { field: 'title' }));
 *
 * const results = await dispatcher.execute(request);
 * ```
 *
 * @module @shardstats/broadcast
 */

export { BROADCAST_REQUEST_FIELDS, BroadcastRequest } from './broadcast-request.js';
export { BroadcastResponse, SHARDS_FIELD, type ShardsHeader } from './broadcast-response.js';
export {
  BroadcastDispatcher,
  createBroadcastDispatcher,
  type BroadcastDispatcherOptions,
} from './broadcast-dispatcher.js';
export { PayloadCarrier } from './payload-carrier.js';
export {
  INTERNAL_SERVER_ERROR,
  REQUEST_TIMEOUT,
  SHARD_FAILURE_FIELDS,
  UNKNOWN_SHARD_ID,
  emptyShardFailure,
  shardFailure,
  shardFailureFromError,
  type ShardFailure,
} from './shard-failure.js';
export { ShardResultSet } from './shard-result-set.js';
export {
  NO_STATS_FIELD,
  ShardRoutingMap,
  ShardStats,
  describeRouting,
  routingKey,
  shardRouting,
  type ShardRouting,
} from './shard-routing.js';
export {
  SuggestQueryBuilder,
  type DocumentWritable,
  type SuggestionOptions,
  type SuggestionType,
} from './suggest-query-builder.js';
export {
  DEFAULT_DISPATCH_CONFIG,
  dispatchConfigSchema,
  type DispatchConfig,
  type DispatchEvent,
  type ShardOutcome,
  type ShardRoutingResolver,
  type ShardTransport,
  type StatsKind,
} from './types.js';
