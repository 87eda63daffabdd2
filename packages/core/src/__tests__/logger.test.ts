import { afterEach, describe, expect, it, vi } from 'vitest';
import { ShardStatsLogger, createLogger, type LogEntry } from '../observability/logger.js';

function collect(level?: 'debug' | 'warn'): { entries: LogEntry[]; logger: ShardStatsLogger } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ module: 'test', level, handler: (e) => entries.push(e) });
  return { entries, logger };
}

describe('ShardStatsLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create via factory', () => {
    expect(createLogger({ module: 'test' })).toBeInstanceOf(ShardStatsLogger);
  });

  it('should drop debug entries at the default level', () => {
    const { entries, logger } = collect();
    logger.debug('debug msg');
    logger.warn('warn msg');
    expect(entries.map((e) => e.level)).toEqual(['warn']);
  });

  it('should lift event and shard out of the context', () => {
    const { entries, logger } = collect();
    logger.warn('Shard request failed', { event: 'shard-failed', shard: '[logs][0][p]', status: 500 });

    expect(entries).toEqual([
      {
        level: 'warn',
        message: 'Shard request failed',
        timestamp: expect.any(Number),
        module: 'test',
        event: 'shard-failed',
        shard: '[logs][0][p]',
        context: { status: 500 },
      },
    ]);
  });

  it('should omit an empty context', () => {
    const { entries, logger } = collect();
    logger.warn('plain', { event: 'dispatch-started' });
    expect(entries[0]).not.toHaveProperty('context');
    expect(entries[0]).not.toHaveProperty('shard');
  });

  it('should tag every entry of a shard logger with its shard', () => {
    const { entries, logger } = collect('debug');
    const shardLog = logger.forShard('[logs][1][r]');

    shardLog.debug('Retrying shard request', { attempt: 2 });
    shardLog.warn('moved', { shard: '[logs][2][r]' });
    logger.warn('unscoped');

    expect(entries.map((e) => e.shard)).toEqual(['[logs][1][r]', '[logs][2][r]', undefined]);
    expect(entries[0]!.module).toBe('test');
  });

  it('should log timer completion with a duration', () => {
    const { entries, logger } = collect('debug');
    const end = logger.time('fold');
    end({ event: 'dispatch-completed', records: 3 });

    expect(entries[0]!.message).toBe('fold completed');
    expect(entries[0]!.event).toBe('dispatch-completed');
    expect(entries[0]!.context).toHaveProperty('durationMs');
    expect(entries[0]!.context).toHaveProperty('records', 3);
  });

  it('should stay silent without a handler', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger({ module: 'test' }).warn('quiet');
    expect(spy).not.toHaveBeenCalled();
  });
});
