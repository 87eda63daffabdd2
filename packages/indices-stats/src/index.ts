/**
 * @shardstats/indices-stats - index and cluster statistics over shard results
 *
 * @example
 * ```typescript
 * import { createIndicesStatsResponse } from '@shardstats/indices-stats';
 *
 * const response = createIndicesStatsResponse(await dispatcher.execute(request));
 *
 * response.getTotal().docs?.count;
 * response.toDocument({ level: 'shards' });
 * ```
 *
 * @module @shardstats/indices-stats
 */

export { AggregationEngine, foldStats, type AggregateSeed } from './aggregation-engine.js';
export {
  CommonStats,
  DocsStats,
  IndexingStats,
  SearchStats,
  StoreStats,
  commonStatsKind,
} from './common-stats.js';
export { IndexShardStats, IndexStats } from './index-stats.js';
export {
  IndicesStatsResponse,
  createIndicesStatsResponse,
  type IndicesStatsResponseOptions,
} from './indices-stats-response.js';
export {
  DEFAULT_STATS_LEVEL,
  STATS_LEVELS,
  parseStatsLevel,
  type RenderOptions,
  type StatsLevel,
} from './levels.js';
