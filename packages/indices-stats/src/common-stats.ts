/**
 * Statistics reported by every shard: document counts, store size, indexing
 * and search activity. Each section is optional; a missing section merges as
 * zero and stays missing until some shard reports it.
 */

import type { StatsKind } from '@shardstats/broadcast';
import {
  FieldTable,
  counterField,
  objectField,
  type DocumentObject,
  type StreamInput,
  type StreamOutput,
} from '@shardstats/wire';

export class DocsStats {
  count = 0;
  deleted = 0;
}

export class StoreStats {
  sizeInBytes = 0;
}

export class IndexingStats {
  indexTotal = 0;
  indexTimeInMillis = 0;
  deleteTotal = 0;
}

export class SearchStats {
  queryTotal = 0;
  queryTimeInMillis = 0;
  fetchTotal = 0;
}

const DOCS_FIELDS = new FieldTable<DocsStats>([
  counterField(
    'count',
    (s) => s.count,
    (s, v) => {
      s.count = v;
    }
  ),
  counterField(
    'deleted',
    (s) => s.deleted,
    (s, v) => {
      s.deleted = v;
    }
  ),
]);

const STORE_FIELDS = new FieldTable<StoreStats>([
  counterField(
    'size_in_bytes',
    (s) => s.sizeInBytes,
    (s, v) => {
      s.sizeInBytes = v;
    }
  ),
]);

const INDEXING_FIELDS = new FieldTable<IndexingStats>([
  counterField(
    'index_total',
    (s) => s.indexTotal,
    (s, v) => {
      s.indexTotal = v;
    }
  ),
  counterField(
    'index_time_in_millis',
    (s) => s.indexTimeInMillis,
    (s, v) => {
      s.indexTimeInMillis = v;
    }
  ),
  counterField(
    'delete_total',
    (s) => s.deleteTotal,
    (s, v) => {
      s.deleteTotal = v;
    }
  ),
]);

const SEARCH_FIELDS = new FieldTable<SearchStats>([
  counterField(
    'query_total',
    (s) => s.queryTotal,
    (s, v) => {
      s.queryTotal = v;
    }
  ),
  counterField(
    'query_time_in_millis',
    (s) => s.queryTimeInMillis,
    (s, v) => {
      s.queryTimeInMillis = v;
    }
  ),
  counterField(
    'fetch_total',
    (s) => s.fetchTotal,
    (s, v) => {
      s.fetchTotal = v;
    }
  ),
]);

export class CommonStats {
  docs?: DocsStats;
  store?: StoreStats;
  indexing?: IndexingStats;
  search?: SearchStats;

  /** Fold `other` into this value. Null is ignored. */
  add(other: CommonStats | null): this {
    if (other !== null) {
      COMMON_STATS_FIELDS.combine(this, other);
    }
    return this;
  }

  /** Deep copy */
  copy(): CommonStats {
    return new CommonStats().add(this);
  }

  writeTo(out: StreamOutput): void {
    COMMON_STATS_FIELDS.writeTo(out, this);
  }

  static readFrom(input: StreamInput): CommonStats {
    return COMMON_STATS_FIELDS.readFrom(input, new CommonStats());
  }

  /** One object per present section */
  toDocument(): DocumentObject {
    return COMMON_STATS_FIELDS.toDocument(this);
  }

  static fromDocument(document: DocumentObject, path = ''): CommonStats {
    return COMMON_STATS_FIELDS.fromDocument(document, new CommonStats(), path);
  }
}

const COMMON_STATS_FIELDS = new FieldTable<CommonStats>([
  objectField(
    'docs',
    (s) => s.docs,
    (s, v) => {
      s.docs = v;
    },
    DOCS_FIELDS,
    () => new DocsStats()
  ),
  objectField(
    'store',
    (s) => s.store,
    (s, v) => {
      s.store = v;
    },
    STORE_FIELDS,
    () => new StoreStats()
  ),
  objectField(
    'indexing',
    (s) => s.indexing,
    (s, v) => {
      s.indexing = v;
    },
    INDEXING_FIELDS,
    () => new IndexingStats()
  ),
  objectField(
    'search',
    (s) => s.search,
    (s, v) => {
      s.search = v;
    },
    SEARCH_FIELDS,
    () => new SearchStats()
  ),
]);

/** Merge contract for CommonStats; merge copies and never touches its operands */
export const commonStatsKind: StatsKind<CommonStats> = {
  name: 'common',
  empty: () => new CommonStats(),
  merge: (a, b) => a.copy().add(b),
  writeTo: (out, stats) => stats.writeTo(out),
  readFrom: (input) => CommonStats.readFrom(input),
  toDocument: (stats) => stats.toDocument(),
  fromDocument: (document, path) => CommonStats.fromDocument(document, path),
};
