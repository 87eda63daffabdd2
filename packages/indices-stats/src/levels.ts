/**
 * Rendering levels for the document form of a stats response.
 */

import { z } from 'zod';

export const STATS_LEVELS = ['cluster', 'indices', 'shards'] as const;

/**
 * - `cluster`: `_all` only
 * - `indices`: plus one summary per index
 * - `shards`: plus every shard copy under its index
 */
export type StatsLevel = (typeof STATS_LEVELS)[number];

export const DEFAULT_STATS_LEVEL: StatsLevel = 'indices';

const statsLevelSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(STATS_LEVELS));

/** Document rendering options */
export interface RenderOptions {
  /** `cluster`, `indices` or `shards`, case-insensitive (default: `indices`) */
  level?: string;
}

/**
 * Case-insensitive level lookup. Undefined selects the default level; any
 * other unrecognised value yields null.
 */
export function parseStatsLevel(level: string | undefined): StatsLevel | null {
  if (level === undefined) return DEFAULT_STATS_LEVEL;
  const result = statsLevelSchema.safeParse(level);
  return result.success ? result.data : null;
}
