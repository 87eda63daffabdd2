/**
 * BroadcastDispatcher - fans a request out to every resolved shard copy and
 * collects the settled outcomes into one ShardResultSet.
 *
 * Each shard attempt re-runs `prepareForDispatch()` before encoding, so a
 * borrowed payload is owned before the first byte is read and never copied
 * twice. Errors and timeouts become ShardFailure entries; the returned
 * observable itself only errors when routing resolution throws.
 *
 * @module broadcast-dispatcher
 */

import { DispatchError, createLogger, mergeConfig, type ShardStatsLogger } from '@shardstats/core';
import {
  Subject,
  catchError,
  defer,
  first,
  firstValueFrom,
  from,
  map,
  mergeMap,
  of,
  retry,
  tap,
  throwError,
  timeout,
  toArray,
  type Observable,
} from 'rxjs';
import type { BroadcastRequest } from './broadcast-request.js';
import { shardFailureFromError } from './shard-failure.js';
import { ShardResultSet } from './shard-result-set.js';
import { ShardStats, describeRouting, type ShardRouting } from './shard-routing.js';
import {
  DEFAULT_DISPATCH_CONFIG,
  dispatchConfigSchema,
  type DispatchConfig,
  type DispatchEvent,
  type ShardOutcome,
  type ShardRoutingResolver,
  type ShardTransport,
} from './types.js';

export interface BroadcastDispatcherOptions<S, R extends BroadcastRequest> {
  resolver: ShardRoutingResolver<R>;
  transport: ShardTransport<S>;
  config?: Partial<DispatchConfig>;
  logger?: ShardStatsLogger;
}

/**
 * @example
 * ```typescript
 * const dispatcher = createBroadcastDispatcher({
 *   resolver: { resolve: (request) => routingTable.shardsOf(request.indices) },
 *   transport: { execute: (target, bytes) => client.send(target.nodeId, bytes) },
 *   config: { maxConcurrency: 4, timeoutMs: 5_000 },
 * });
 *
 * const results = await dispatcher.execute(new PayloadCarrier('logs'));
 * console.log(results.successfulShards, results.failedShards);
 * ```
 */
export class BroadcastDispatcher<S, R extends BroadcastRequest = BroadcastRequest> {
  private readonly config: DispatchConfig;
  private readonly resolver: ShardRoutingResolver<R>;
  private readonly transport: ShardTransport<S>;
  private readonly logger: ShardStatsLogger;
  private readonly events$$ = new Subject<DispatchEvent>();

  constructor(options: BroadcastDispatcherOptions<S, R>) {
    this.config = mergeConfig(dispatchConfigSchema, DEFAULT_DISPATCH_CONFIG, options.config, 'dispatch');
    this.resolver = options.resolver;
    this.transport = options.transport;
    this.logger = options.logger ?? createLogger({ module: 'dispatcher' });
  }

  /** Resolved configuration */
  getConfig(): Readonly<DispatchConfig> {
    return this.config;
  }

  /** Lifecycle events of every dispatch */
  get events$(): Observable<DispatchEvent> {
    return this.events$$.asObservable();
  }

  /**
   * Cold observable: resolution and fan-out start on subscribe. Emits one
   * ShardResultSet once every target has settled, then completes.
   */
  dispatch(request: R): Observable<ShardResultSet<S>> {
    return defer(() => {
      request.prepareForDispatch();
      const targets = this.resolver.resolve(request);
      this.logger.debug('Broadcast started', {
        event: 'dispatch-started',
        indices: [...request.indices],
        shards: targets.length,
      });
      this.events$$.next({ type: 'dispatch-started', shards: targets.length });
      const end = this.logger.time('broadcast');

      return from(targets).pipe(
        mergeMap((target) => this.executeOnShard(request, target), this.config.maxConcurrency),
        toArray(),
        map((outcomes) => ShardResultSet.fromOutcomes(targets.length, outcomes)),
        tap((results) => {
          const summary = {
            total: results.totalShards,
            successful: results.successfulShards,
            failed: results.failedShards,
          };
          end({ event: 'dispatch-completed', ...summary });
          this.events$$.next({ type: 'dispatch-completed', ...summary });
        })
      );
    });
  }

  /** Promise form of `dispatch` */
  execute(request: R): Promise<ShardResultSet<S>> {
    return firstValueFrom(this.dispatch(request));
  }

  destroy(): void {
    this.events$$.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private executeOnShard(request: R, target: ShardRouting): Observable<ShardOutcome<S>> {
    const log = this.logger.forShard(describeRouting(target));
    let attempts = 0;

    const attempt$ = defer(() => {
      attempts++;
      if (attempts > 1) {
        log.debug('Retrying shard request', { event: 'shard-retrying', attempt: attempts });
        this.events$$.next({ type: 'shard-retrying', routing: target, attempt: attempts });
      }
      request.prepareForDispatch();
      return from(this.transport.execute(target, request.toBytes())).pipe(
        timeout({
          first: this.config.timeoutMs,
          with: () =>
            throwError(
              () =>
                new DispatchError(
                  'SHARDSTATS_B301',
                  `Shard ${describeRouting(target)} timed out after ${this.config.timeoutMs}ms`,
                  { index: target.index, shardId: target.shardId, timeoutMs: this.config.timeoutMs }
                )
            ),
        }),
        first()
      );
    });

    const delay = this.config.retryDelayMs;
    return attempt$.pipe(
      retry(delay > 0 ? { count: this.config.retryAttempts, delay } : { count: this.config.retryAttempts }),
      map((stats): ShardOutcome<S> => {
        this.events$$.next({ type: 'shard-succeeded', routing: target, attempts });
        return { type: 'success', record: new ShardStats(target, stats) };
      }),
      catchError((error: unknown) => {
        const failure = shardFailureFromError(target, error);
        log.warn('Shard request failed', {
          event: 'shard-failed',
          attempts,
          status: failure.status,
          reason: failure.reason,
        });
        this.events$$.next({ type: 'shard-failed', failure, attempts });
        return of<ShardOutcome<S>>({ type: 'failure', failure });
      })
    );
  }
}

export function createBroadcastDispatcher<S, R extends BroadcastRequest = BroadcastRequest>(
  options: BroadcastDispatcherOptions<S, R>
): BroadcastDispatcher<S, R> {
  return new BroadcastDispatcher(options);
}
