/**
 * Structured logging for broadcasts and response rendering.
 *
 * Entries carry the shard they concern (`[index][shard][p|r]`) and the
 * dispatch event they belong to as first-class fields, so a handler can
 * group a broadcast's entries per shard without parsing messages.
 * Nothing is written unless a handler is configured.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'warn';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  /** Dispatch event name, e.g. `shard-failed` */
  readonly event?: string;
  /** Shard description, e.g. `[logs][0][p]` */
  readonly shard?: string;
  readonly context?: Record<string, unknown>;
}

/** Fields of one log call: `event` and `shard` are lifted out, the rest is context */
export interface LogFields {
  readonly event?: string;
  readonly shard?: string;
  readonly [field: string]: unknown;
}

/** Logger configuration */
export interface ShardStatsLoggerConfig {
  /** Minimum log level (default: 'warn') */
  readonly level?: LogLevel;
  /** Module the entries come from */
  readonly module?: string;
  /** Shard every entry concerns, unless a call names another */
  readonly shard?: string;
  /** Receives every entry at or above the level */
  readonly handler?: (entry: LogEntry) => void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
};

/**
 * @example
 * ```typescript
 * const log = createLogger({ module: 'dispatcher', level: 'debug', handler: (entry) => sink.push(entry) });
 *
 * const end = log.time('broadcast');
 * log.forShard('[logs][0][p]').warn('Shard request failed', { event: 'shard-failed', status: 500 });
 * end({ event: 'dispatch-completed', failed: 1 }); // "broadcast completed" with durationMs
 * ```
 */
export class ShardStatsLogger {
  private readonly config: ShardStatsLoggerConfig;
  private readonly level: LogLevel;

  constructor(config: ShardStatsLoggerConfig = {}) {
    this.config = config;
    this.level = config.level ?? 'warn';
  }

  get module(): string {
    return this.config.module ?? 'shardstats';
  }

  /** Logger whose entries concern the given shard */
  forShard(shard: string): ShardStatsLogger {
    return new ShardStatsLogger({ ...this.config, shard });
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  /**
   * Start a timer. The returned function logs `<operation> completed` at
   * debug level with `durationMs` added to its fields.
   */
  time(operation: string): (fields?: LogFields) => void {
    const start = performance.now();
    return (fields?: LogFields) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...fields, durationMs });
    };
  }

  private log(level: LogLevel, message: string, fields: LogFields = {}): void {
    const handler = this.config.handler;
    if (handler === undefined || LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;

    const { event, shard = this.config.shard, ...context } = fields;
    handler({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(event === undefined ? {} : { event }),
      ...(shard === undefined ? {} : { shard }),
      ...(Object.keys(context).length > 0 ? { context } : {}),
    });
  }
}

export function createLogger(config?: ShardStatsLoggerConfig): ShardStatsLogger {
  return new ShardStatsLogger(config);
}
