/**
 * The settled outcome of a broadcast: one record per answering shard plus
 * one failure per shard that did not answer.
 */

import type { ShardsHeader } from './broadcast-response.js';
import type { ShardFailure } from './shard-failure.js';
import type { ShardStats } from './shard-routing.js';
import type { ShardOutcome } from './types.js';

export class ShardResultSet<S> {
  readonly totalShards: number;
  readonly records: readonly ShardStats<S>[];
  readonly failures: readonly ShardFailure[];

  constructor(records: readonly ShardStats<S>[], failures: readonly ShardFailure[] = [], totalShards?: number) {
    this.records = [...records];
    this.failures = [...failures];
    this.totalShards = totalShards ?? records.length + failures.length;
  }

  static fromOutcomes<S>(totalShards: number, outcomes: readonly ShardOutcome<S>[]): ShardResultSet<S> {
    const records: ShardStats<S>[] = [];
    const failures: ShardFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.type === 'success') {
        records.push(outcome.record);
      } else {
        failures.push(outcome.failure);
      }
    }
    return new ShardResultSet(records, failures, totalShards);
  }

  get successfulShards(): number {
    return this.records.length;
  }

  get failedShards(): number {
    return this.failures.length;
  }

  toHeader(): ShardsHeader {
    return {
      total: this.totalShards,
      successful: this.successfulShards,
      failed: this.failedShards,
      failures: this.failures,
    };
  }
}
