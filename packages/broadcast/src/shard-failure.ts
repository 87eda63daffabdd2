/**
 * Per-shard failures, kept as data next to the successful results.
 */

import { DispatchError, ensureShardStatsError } from '@shardstats/core';
import { FieldTable, intField, optionalStringField, stringField, vintField } from '@shardstats/wire';
import { z } from 'zod';
import type { ShardRouting } from './shard-routing.js';

/**
 * A shard that did not answer successfully
 */
export interface ShardFailure {
  /** Index, when known */
  readonly index?: string;
  /** Shard number, -1 when unknown */
  readonly shardId: number;
  readonly reason: string;
  /** HTTP-style status code */
  readonly status: number;
}

type ShardFailureDraft = { -readonly [K in keyof ShardFailure]: ShardFailure[K] };

export const UNKNOWN_SHARD_ID = -1;
export const INTERNAL_SERVER_ERROR = 500;
export const REQUEST_TIMEOUT = 408;

export const SHARD_FAILURE_FIELDS = new FieldTable<ShardFailureDraft>([
  optionalStringField(
    'index',
    (f) => f.index,
    (f, v) => {
      f.index = v;
    }
  ),
  intField(
    'shard',
    (f) => f.shardId,
    (f, v) => {
      f.shardId = v;
    }
  ),
  stringField(
    'reason',
    (f) => f.reason,
    (f, v) => {
      f.reason = v;
    }
  ),
  vintField(
    'status',
    (f) => f.status,
    (f, v) => {
      f.status = v;
    }
  ),
]);

/** Statuses the binary form can carry */
const statusSchema = z.number().int().min(0).max(0xffffffff);

export function emptyShardFailure(): ShardFailureDraft {
  return { shardId: UNKNOWN_SHARD_ID, reason: '', status: INTERNAL_SERVER_ERROR };
}

export function shardFailure(
  index: string | undefined,
  shardId: number,
  reason: string,
  status = INTERNAL_SERVER_ERROR
): ShardFailure {
  return index === undefined ? { shardId, reason, status } : { index, shardId, reason, status };
}

/**
 * Record a thrown error against the shard it came from. A `status` on the
 * error is kept when it is an unsigned 32-bit integer; timeouts map to 408,
 * anything else to 500.
 */
export function shardFailureFromError(routing: ShardRouting, error: unknown): ShardFailure {
  const normalized = ensureShardStatsError(error, 'SHARDSTATS_B300');
  return shardFailure(routing.index, routing.shardId, normalized.message, statusOf(error));
}

function statusOf(error: unknown): number {
  if (error instanceof DispatchError && error.code === 'SHARDSTATS_B301') {
    return REQUEST_TIMEOUT;
  }
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = statusSchema.safeParse(error.status);
    if (status.success) return status.data;
  }
  return INTERNAL_SERVER_ERROR;
}
