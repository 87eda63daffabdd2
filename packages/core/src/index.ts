/**
 * @shardstats/core - errors, logging and configuration shared by every package
 *
 * @example
 * ```typescript
 * import { createLogger, ShardStatsError } from '@shardstats/core';
 *
 * const log = createLogger({ module: 'stats', handler: (entry) => sink.push(entry) });
 *
 * try {
 *   decode(bytes);
 * } catch (error) {
 *   if (error instanceof ShardStatsError && error.category === 'wire') {
 *     log.warn('Response could not be decoded', { code: error.code });
 *   }
 * }
 * ```
 */

export * from './errors/index.js';
export * from './observability/index.js';
export * from './config/index.js';
