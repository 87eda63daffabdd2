import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  DocumentDecodeError,
  ShardStatsError,
  StreamDecodeError,
  ensureShardStatsError,
  getErrorCategory,
} from '../errors/index.js';

describe('ShardStatsError', () => {
  it('should fill message and suggestion from the code table', () => {
    const error = ShardStatsError.fromCode('SHARDSTATS_W100', { offset: 4 });

    expect(error.message).toBe('Binary stream truncated');
    expect(error.category).toBe('wire');
    expect(error.context).toEqual({ offset: 4 });
    expect(error.suggestion).toContain('full message');
  });

  it('should map every code prefix to a category', () => {
    expect(getErrorCategory('SHARDSTATS_W101')).toBe('wire');
    expect(getErrorCategory('SHARDSTATS_D200')).toBe('document');
    expect(getErrorCategory('SHARDSTATS_B301')).toBe('dispatch');
    expect(getErrorCategory('SHARDSTATS_C400')).toBe('config');
    expect(getErrorCategory('SHARDSTATS_X900')).toBe('internal');
  });

  it('should match codes and categories through the static guards', () => {
    const error = new StreamDecodeError('SHARDSTATS_W101', 'Trailing bytes', 12);

    expect(ShardStatsError.isCode(error, 'SHARDSTATS_W101')).toBe(true);
    expect(ShardStatsError.isCode(error, 'SHARDSTATS_W100')).toBe(false);
    expect(ShardStatsError.isCategory(error, 'wire')).toBe(true);
    expect(ShardStatsError.isShardStatsError(new Error('plain'))).toBe(false);
    expect(error.offset).toBe(12);
    expect(error.name).toBe('StreamDecodeError');
  });

  it('should format code, context and suggestion on separate lines', () => {
    const error = new ConfigError('Invalid dispatch configuration', { config: 'dispatch' });

    expect(error.format().split('\n')).toEqual([
      '[SHARDSTATS_C400] Invalid dispatch configuration',
      'Context: {"config":"dispatch"}',
      'Suggestion: Check the configuration values against the documented ranges.',
    ]);
  });

  it('should serialize nested causes', () => {
    const cause = new Error('socket closed');
    const error = ShardStatsError.wrap(cause, 'SHARDSTATS_B300', { shard: 2 });
    const json = error.toJSON();

    expect(json.code).toBe('SHARDSTATS_B300');
    expect(json.message).toBe('socket closed');
    expect(json.cause).toMatchObject({ name: 'Error', message: 'socket closed' });
  });

  it('should record document issues in the context', () => {
    const error = new DocumentDecodeError('SHARDSTATS_D201', 'Invalid field', [
      { path: 'docs.count', message: 'Expected number, received string' },
    ]);

    expect(error.issues).toHaveLength(1);
    expect(error.context).toEqual({
      issues: [{ path: 'docs.count', message: 'Expected number, received string' }],
    });
  });
});

describe('ensureShardStatsError', () => {
  it('should return ShardStatsError instances unchanged', () => {
    const error = ShardStatsError.fromCode('SHARDSTATS_D200');
    expect(ensureShardStatsError(error)).toBe(error);
  });

  it('should wrap plain errors with the default code', () => {
    const wrapped = ensureShardStatsError(new Error('boom'));
    expect(wrapped.code).toBe('SHARDSTATS_X900');
    expect(wrapped.message).toBe('boom');
  });

  it('should stringify non-error values', () => {
    const wrapped = ensureShardStatsError('bad state', 'SHARDSTATS_B300');
    expect(wrapped.code).toBe('SHARDSTATS_B300');
    expect(wrapped.message).toBe('bad state');
  });
});
