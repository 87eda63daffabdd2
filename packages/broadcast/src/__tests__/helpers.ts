import {
  FieldTable,
  counterField,
  expectDocumentObject,
  joinPath,
  type DocumentObject,
} from '@shardstats/wire';
import type { StatsKind } from '../types.js';

export interface HitStats {
  hits: number;
}

const HIT_FIELDS = new FieldTable<HitStats>([
  counterField(
    'hits',
    (s) => s.hits,
    (s, v) => {
      s.hits = v;
    }
  ),
]);

/** Minimal stats kind: one counter under a `hit_stats` section */
export const hitStatsKind: StatsKind<HitStats> = {
  name: 'hits',
  empty: () => ({ hits: 0 }),
  merge: (a, b) => ({ hits: a.hits + b.hits }),
  writeTo: (out, stats) => HIT_FIELDS.writeTo(out, stats),
  readFrom: (input) => HIT_FIELDS.readFrom(input, { hits: 0 }),
  toDocument: (stats): DocumentObject => ({ hit_stats: HIT_FIELDS.toDocument(stats) }),
  fromDocument: (document, path) => {
    const value = document['hit_stats'];
    if (value === undefined || value === null) return { hits: 0 };
    const sectionPath = joinPath(path, 'hit_stats');
    return HIT_FIELDS.fromDocument(expectDocumentObject(value, sectionPath), { hits: 0 }, sectionPath);
  },
};
