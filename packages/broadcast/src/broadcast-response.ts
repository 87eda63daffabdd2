/**
 * Base class for responses collected from every shard of a broadcast:
 * shard counts plus the failures, rendered under `_shards`.
 */

import {
  FieldTable,
  expectDocumentObject,
  objectArrayField,
  vintField,
  type DocumentObject,
  type StreamInput,
  type StreamOutput,
} from '@shardstats/wire';
import { SHARD_FAILURE_FIELDS, emptyShardFailure, type ShardFailure } from './shard-failure.js';

/**
 * Shard counts of a broadcast
 */
export interface ShardsHeader {
  readonly total: number;
  readonly successful: number;
  readonly failed: number;
  readonly failures: readonly ShardFailure[];
}

interface ShardsHeaderDraft {
  total: number;
  successful: number;
  failed: number;
  failures: readonly ShardFailure[];
}

const SHARDS_HEADER_FIELDS = new FieldTable<ShardsHeaderDraft>([
  vintField(
    'total',
    (h) => h.total,
    (h, v) => {
      h.total = v;
    }
  ),
  vintField(
    'successful',
    (h) => h.successful,
    (h, v) => {
      h.successful = v;
    }
  ),
  vintField(
    'failed',
    (h) => h.failed,
    (h, v) => {
      h.failed = v;
    }
  ),
  objectArrayField(
    'failures',
    (h) => h.failures,
    (h, v) => {
      h.failures = v;
    },
    SHARD_FAILURE_FIELDS,
    emptyShardFailure,
    { omitEmpty: true }
  ),
]);

export const SHARDS_FIELD = '_shards';

function emptyHeader(): ShardsHeaderDraft {
  return { total: 0, successful: 0, failed: 0, failures: [] };
}

export class BroadcastResponse {
  readonly totalShards: number;
  readonly successfulShards: number;
  readonly failedShards: number;
  readonly shardFailures: readonly ShardFailure[];

  constructor(header: ShardsHeader) {
    this.totalShards = header.total;
    this.successfulShards = header.successful;
    this.failedShards = header.failed;
    this.shardFailures = [...header.failures];
  }

  get header(): ShardsHeader {
    return {
      total: this.totalShards,
      successful: this.successfulShards,
      failed: this.failedShards,
      failures: this.shardFailures,
    };
  }

  /** `[vint total][vint successful][vint failed][vint failure count][failures…]` */
  protected writeHeader(out: StreamOutput): void {
    SHARDS_HEADER_FIELDS.writeTo(out, this.header);
  }

  protected static readHeader(input: StreamInput): ShardsHeader {
    return SHARDS_HEADER_FIELDS.readFrom(input, emptyHeader());
  }

  /** `{ _shards: { total, successful, failed, failures? } }` */
  protected headerToDocument(): DocumentObject {
    return { [SHARDS_FIELD]: SHARDS_HEADER_FIELDS.toDocument(this.header) };
  }

  /** A missing `_shards` object decodes as zero counts */
  protected static headerFromDocument(document: DocumentObject): ShardsHeader {
    const value = document[SHARDS_FIELD];
    if (value === undefined || value === null) {
      return emptyHeader();
    }
    return SHARDS_HEADER_FIELDS.fromDocument(expectDocumentObject(value, SHARDS_FIELD), emptyHeader(), SHARDS_FIELD);
  }
}
