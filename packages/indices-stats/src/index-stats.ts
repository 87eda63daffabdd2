/**
 * Per-index and per-shard views over shard records.
 */

import type { ShardStats, StatsKind } from '@shardstats/broadcast';
import { AggregationEngine, type AggregateSeed } from './aggregation-engine.js';

/**
 * Every copy (primary and replicas) of one shard
 */
export class IndexShardStats<S> {
  private readonly engine: AggregationEngine<S>;

  constructor(
    readonly index: string,
    readonly shardId: number,
    readonly shards: readonly ShardStats<S>[],
    kind: StatsKind<S>
  ) {
    this.engine = new AggregationEngine(kind, shards);
  }

  getAt(position: number): ShardStats<S> | undefined {
    return this.shards[position];
  }

  primaries(): S {
    return this.engine.primaries();
  }

  total(): S {
    return this.engine.total();
  }
}

/**
 * Every shard copy of one index
 */
export class IndexStats<S> {
  private readonly engine: AggregationEngine<S>;
  private byShard?: ReadonlyMap<number, IndexShardStats<S>>;

  constructor(
    readonly index: string,
    readonly shards: readonly ShardStats<S>[],
    private readonly kind: StatsKind<S>,
    seed: Pick<AggregateSeed<S>, 'primaries' | 'total'> = {}
  ) {
    this.engine = new AggregationEngine(kind, shards, seed);
  }

  primaries(): S {
    return this.engine.primaries();
  }

  total(): S {
    return this.engine.total();
  }

  /** Copies grouped by shard id, ascending */
  indexShards(): ReadonlyMap<number, IndexShardStats<S>> {
    if (this.byShard === undefined) {
      const groups = new Map<number, ShardStats<S>[]>();
      for (const shard of this.shards) {
        const group = groups.get(shard.shardId);
        if (group) {
          group.push(shard);
        } else {
          groups.set(shard.shardId, [shard]);
        }
      }

      const byShard = new Map<number, IndexShardStats<S>>();
      for (const shardId of [...groups.keys()].sort((a, b) => a - b)) {
        byShard.set(shardId, new IndexShardStats(this.index, shardId, groups.get(shardId) ?? [], this.kind));
      }
      this.byShard = byShard;
    }
    return this.byShard;
  }
}
