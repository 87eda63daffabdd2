/**
 * Types for broadcast dispatch and shard results
 */

import type { DocumentObject, StreamInput, StreamOutput } from '@shardstats/wire';
import type { ObservableInput } from 'rxjs';
import { z } from 'zod';
import type { BroadcastRequest } from './broadcast-request.js';
import type { ShardFailure } from './shard-failure.js';
import type { ShardRouting, ShardStats } from './shard-routing.js';

/**
 * Contract for a mergeable per-shard statistics value.
 *
 * `merge` must be associative and commutative, must treat `empty()` as its
 * identity and must not modify either operand.
 */
export interface StatsKind<S> {
  /** Name used in log context */
  readonly name: string;
  /** Identity value for merge */
  empty(): S;
  merge(a: S, b: S): S;
  writeTo(out: StreamOutput, stats: S): void;
  readFrom(input: StreamInput): S;
  /** Stats sections as document fields, spread into the enclosing object */
  toDocument(stats: S): DocumentObject;
  fromDocument(document: DocumentObject, path: string): S;
}

/**
 * Settled result of one shard request
 */
export type ShardOutcome<S> =
  | { readonly type: 'success'; readonly record: ShardStats<S> }
  | { readonly type: 'failure'; readonly failure: ShardFailure };

/**
 * Turns a request's indices, routing and preference into concrete shard copies
 */
export interface ShardRoutingResolver<R extends BroadcastRequest = BroadcastRequest> {
  resolve(request: R): readonly ShardRouting[];
}

/**
 * Sends encoded request bytes to one shard copy and yields its stats
 */
export interface ShardTransport<S> {
  execute(target: ShardRouting, request: Uint8Array): ObservableInput<S | null>;
}

/**
 * Dispatch configuration
 */
export interface DispatchConfig {
  /** Shard requests in flight at once */
  maxConcurrency: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Retries after the first attempt fails */
  retryAttempts: number;
  /** Delay between attempts in milliseconds (0 = retry immediately) */
  retryDelayMs: number;
}

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  maxConcurrency: 10,
  timeoutMs: 30_000,
  retryAttempts: 2,
  retryDelayMs: 0,
};

export const dispatchConfigSchema: z.ZodType<DispatchConfig, z.ZodTypeDef, unknown> = z.object({
  maxConcurrency: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
  retryAttempts: z.number().int().nonnegative(),
  retryDelayMs: z.number().int().nonnegative(),
});

/**
 * Dispatcher lifecycle events
 */
export type DispatchEvent =
  | { readonly type: 'dispatch-started'; readonly shards: number }
  | { readonly type: 'shard-succeeded'; readonly routing: ShardRouting; readonly attempts: number }
  | { readonly type: 'shard-retrying'; readonly routing: ShardRouting; readonly attempt: number }
  | { readonly type: 'shard-failed'; readonly failure: ShardFailure; readonly attempts: number }
  | {
      readonly type: 'dispatch-completed';
      readonly total: number;
      readonly successful: number;
      readonly failed: number;
    };
