/**
 * Compute-once rollups over a settled set of shard records.
 *
 * `indices()`, `total()` and `primaries()` each fold at most once per engine.
 * Records are immutable, so a cached value is never recomputed; an engine
 * decoded from a rendered document starts with its caches seeded instead.
 */

import type { ShardStats, StatsKind } from '@shardstats/broadcast';
import { IndexStats } from './index-stats.js';

/** Pre-computed rollups, taken as-is instead of folding */
export interface AggregateSeed<S> {
  total?: S;
  primaries?: S;
  indices?: ReadonlyMap<string, IndexStats<S>>;
}

/**
 * Fold `merge` over the records that match, starting from the identity.
 * Records with null stats count as the identity.
 */
export function foldStats<S>(
  kind: StatsKind<S>,
  records: readonly ShardStats<S>[],
  include: (record: ShardStats<S>) => boolean = () => true
): S {
  let result = kind.empty();
  for (const record of records) {
    if (record.stats !== null && include(record)) {
      result = kind.merge(result, record.stats);
    }
  }
  return result;
}

export class AggregationEngine<S> {
  private byIndex?: ReadonlyMap<string, IndexStats<S>>;
  private totalStats?: S;
  private primaryStats?: S;

  constructor(
    readonly kind: StatsKind<S>,
    readonly records: readonly ShardStats<S>[],
    seed: AggregateSeed<S> = {}
  ) {
    this.byIndex = seed.indices;
    this.totalStats = seed.total;
    this.primaryStats = seed.primaries;
  }

  /** Records grouped by index name, in order of first appearance */
  indices(): ReadonlyMap<string, IndexStats<S>> {
    if (this.byIndex === undefined) {
      const groups = new Map<string, ShardStats<S>[]>();
      for (const record of this.records) {
        const group = groups.get(record.index);
        if (group) {
          group.push(record);
        } else {
          groups.set(record.index, [record]);
        }
      }

      const byIndex = new Map<string, IndexStats<S>>();
      for (const [index, shards] of groups) {
        byIndex.set(index, new IndexStats(index, shards, this.kind));
      }
      this.byIndex = byIndex;
    }
    return this.byIndex;
  }

  /** Merge of every record */
  total(): S {
    if (this.totalStats === undefined) {
      this.totalStats = foldStats(this.kind, this.records);
    }
    return this.totalStats;
  }

  /** Merge of the primary copies only */
  primaries(): S {
    if (this.primaryStats === undefined) {
      this.primaryStats = foldStats(this.kind, this.records, (record) => record.primary);
    }
    return this.primaryStats;
  }
}
