import { ShardStats, shardRouting } from '@shardstats/broadcast';
import { CommonStats, DocsStats, StoreStats } from '../common-stats.js';

export function docs(count: number, deleted = 0): CommonStats {
  const stats = new CommonStats();
  stats.docs = Object.assign(new DocsStats(), { count, deleted });
  return stats;
}

export function store(sizeInBytes: number): CommonStats {
  const stats = new CommonStats();
  stats.store = Object.assign(new StoreStats(), { sizeInBytes });
  return stats;
}

export function record(
  index: string,
  shardId: number,
  primary: boolean,
  stats: CommonStats | null
): ShardStats<CommonStats> {
  return new ShardStats(shardRouting(index, shardId, primary), stats);
}

/**
 * logs: shard 0 (primary + replica, 10 docs each), shard 1 (primary, 5 docs)
 * metrics: shard 0 (primary 7 docs, replica with no stats)
 */
export function sampleRecords(): ShardStats<CommonStats>[] {
  return [
    record('logs', 0, true, docs(10)),
    record('logs', 0, false, docs(10)),
    record('logs', 1, true, docs(5)),
    record('metrics', 0, true, docs(7)),
    record('metrics', 0, false, null),
  ];
}
