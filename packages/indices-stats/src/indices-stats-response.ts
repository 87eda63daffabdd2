/**
 * IndicesStatsResponse - statistics collected from every shard of a set of
 * indices, with cluster, per-index and per-shard rollups.
 *
 * The binary form always carries every shard record. The document form is
 * shaped by a level: `_all` always, `indices` from level `indices` on, and
 * shard entries under each index at level `shards`.
 *
 * @module indices-stats-response
 */

import {
  BroadcastResponse,
  ShardResultSet,
  ShardRoutingMap,
  ShardStats,
  type ShardRouting,
  type ShardsHeader,
  type StatsKind,
} from '@shardstats/broadcast';
import { createLogger, type ShardStatsLogger } from '@shardstats/core';
import {
  decodeField,
  expectDocumentArray,
  expectDocumentObject,
  joinPath,
  readFully,
  stringifyDocument,
  writeToBytes,
  type DocumentObject,
  type DocumentValue,
  type StreamInput,
  type StreamOutput,
} from '@shardstats/wire';
import { z } from 'zod';
import { AggregationEngine, type AggregateSeed } from './aggregation-engine.js';
import { CommonStats, commonStatsKind } from './common-stats.js';
import { IndexStats } from './index-stats.js';
import { parseStatsLevel, type RenderOptions } from './levels.js';

const ALL_FIELD = '_all';
const INDICES_FIELD = 'indices';
const PRIMARIES_FIELD = 'primaries';
const TOTAL_FIELD = 'total';
const SHARDS_FIELD = 'shards';

const shardKeySchema = z
  .string()
  .regex(/^-?\d+$/, 'Shard key must be an integer')
  .transform(Number);

export interface IndicesStatsResponseOptions<S> {
  kind: StatsKind<S>;
  header: ShardsHeader;
  records: readonly ShardStats<S>[];
  /** Rollups decoded from a rendered document */
  seed?: AggregateSeed<S>;
  logger?: ShardStatsLogger;
}

export class IndicesStatsResponse<S = CommonStats> extends BroadcastResponse {
  readonly kind: StatsKind<S>;
  private readonly records: readonly ShardStats<S>[];
  private readonly engine: AggregationEngine<S>;
  private readonly logger: ShardStatsLogger;
  private shardMap?: ShardRoutingMap<S | null>;

  constructor(options: IndicesStatsResponseOptions<S>) {
    super(options.header);
    this.kind = options.kind;
    this.records = [...options.records];
    this.engine = new AggregationEngine(this.kind, this.records, options.seed);
    this.logger = options.logger ?? createLogger({ module: 'indices-stats' });
  }

  /** Build a response from the settled outcome of a broadcast */
  static fromResultSet<S>(
    kind: StatsKind<S>,
    results: ShardResultSet<S>,
    logger?: ShardStatsLogger
  ): IndicesStatsResponse<S> {
    return new IndicesStatsResponse({ kind, header: results.toHeader(), records: results.records, logger });
  }

  // ── Accessors ────────────────────────────────────────────────────────

  getShards(): readonly ShardStats<S>[] {
    return this.records;
  }

  getAt(position: number): ShardStats<S> | undefined {
    return this.records[position];
  }

  getIndices(): ReadonlyMap<string, IndexStats<S>> {
    return this.engine.indices();
  }

  getIndex(name: string): IndexStats<S> | undefined {
    return this.engine.indices().get(name);
  }

  getTotal(): S {
    return this.engine.total();
  }

  getPrimaries(): S {
    return this.engine.primaries();
  }

  /** Shard routing → that shard's stats, looked up by routing value */
  asMap(): ReadonlyMap<ShardRouting, S | null> {
    if (this.shardMap === undefined) {
      this.shardMap = new ShardRoutingMap(this.records.map((record) => [record.routing, record.stats] as const));
    }
    return this.shardMap;
  }

  // ── Document form ────────────────────────────────────────────────────

  /**
   * Level-gated rollups. An unrecognised level renders an empty document
   * rather than failing the response.
   */
  render(level?: string): DocumentObject {
    const parsed = parseStatsLevel(level);
    if (parsed === null) {
      this.logger.debug('Unrecognised stats level, rendering nothing', { level });
      return {};
    }

    const document: DocumentObject = {
      [ALL_FIELD]: this.summarize(this.engine.primaries(), this.engine.total()),
    };
    if (parsed === 'cluster') {
      return document;
    }

    const indices: DocumentObject = {};
    for (const [name, index] of this.engine.indices()) {
      const entry = this.summarize(index.primaries(), index.total());
      if (parsed === 'shards') {
        const shards: DocumentObject = {};
        for (const [shardId, copies] of index.indexShards()) {
          shards[String(shardId)] = copies.shards.map((shard) => shard.toDocument(this.kind));
        }
        entry[SHARDS_FIELD] = shards;
      }
      indices[name] = entry;
    }
    document[INDICES_FIELD] = indices;
    return document;
  }

  /** `_shards` header followed by the rollups at the requested level */
  toDocument(options: RenderOptions = {}): DocumentObject {
    return { ...this.headerToDocument(), ...this.render(options.level) };
  }

  /**
   * Decode a rendered response. `_all` and `indices` seed the rollup caches;
   * shard entries, when present, become the record list.
   */
  static fromDocument<S>(
    document: DocumentObject,
    kind: StatsKind<S>,
    logger?: ShardStatsLogger
  ): IndicesStatsResponse<S> {
    const header = IndicesStatsResponse.headerFromDocument(document);
    const seed: AggregateSeed<S> = {};
    const records: ShardStats<S>[] = [];

    const all = document[ALL_FIELD];
    if (all !== undefined && all !== null) {
      Object.assign(seed, decodeSummary(kind, expectDocumentObject(all, ALL_FIELD), ALL_FIELD));
    }

    const indicesValue = document[INDICES_FIELD];
    if (indicesValue !== undefined && indicesValue !== null) {
      const indices = new Map<string, IndexStats<S>>();
      for (const [name, value] of Object.entries(expectDocumentObject(indicesValue, INDICES_FIELD))) {
        const path = joinPath(INDICES_FIELD, name);
        const entry = expectDocumentObject(value, path);
        const shards = decodeShards(kind, name, entry[SHARDS_FIELD], joinPath(path, SHARDS_FIELD));
        indices.set(name, new IndexStats(name, shards, kind, decodeSummary(kind, entry, path)));
        records.push(...shards);
      }
      seed.indices = indices;
    }

    return new IndicesStatsResponse({ kind, header, records, seed, logger });
  }

  /** Pretty JSON at the default level; never throws */
  override toString(): string {
    try {
      return stringifyDocument(this.toDocument(), true);
    } catch (error) {
      return stringifyDocument({ error: error instanceof Error ? error.message : String(error) }, true);
    }
  }

  // ── Binary form ──────────────────────────────────────────────────────

  /** `[header][vint shard count][per shard: routing fields, optional stats]` */
  writeTo(out: StreamOutput): void {
    this.writeHeader(out);
    out.writeVInt(this.records.length);
    for (const record of this.records) {
      record.writeTo(out, this.kind);
    }
  }

  toBytes(): Uint8Array {
    return writeToBytes((out) => this.writeTo(out));
  }

  static readFrom<S>(input: StreamInput, kind: StatsKind<S>, logger?: ShardStatsLogger): IndicesStatsResponse<S> {
    const header = IndicesStatsResponse.readHeader(input);
    const count = input.readVInt();
    const records: ShardStats<S>[] = [];
    for (let i = 0; i < count; i++) {
      records.push(ShardStats.readFrom(input, kind));
    }
    return new IndicesStatsResponse({ kind, header, records, logger });
  }

  static fromBytes<S>(bytes: Uint8Array, kind: StatsKind<S>, logger?: ShardStatsLogger): IndicesStatsResponse<S> {
    return readFully(bytes, (input) => IndicesStatsResponse.readFrom(input, kind, logger));
  }

  // ── Private ──────────────────────────────────────────────────────────

  private summarize(primaries: S, total: S): DocumentObject {
    return {
      [PRIMARIES_FIELD]: this.kind.toDocument(primaries),
      [TOTAL_FIELD]: this.kind.toDocument(total),
    };
  }
}

/** Response over the built-in CommonStats */
export function createIndicesStatsResponse(
  results: ShardResultSet<CommonStats>,
  logger?: ShardStatsLogger
): IndicesStatsResponse<CommonStats> {
  return IndicesStatsResponse.fromResultSet(commonStatsKind, results, logger);
}

function decodeSummary<S>(
  kind: StatsKind<S>,
  document: DocumentObject,
  path: string
): Pick<AggregateSeed<S>, 'primaries' | 'total'> {
  const summary: Pick<AggregateSeed<S>, 'primaries' | 'total'> = {};
  const primaries = document[PRIMARIES_FIELD];
  if (primaries !== undefined && primaries !== null) {
    const primariesPath = joinPath(path, PRIMARIES_FIELD);
    summary.primaries = kind.fromDocument(expectDocumentObject(primaries, primariesPath), primariesPath);
  }
  const total = document[TOTAL_FIELD];
  if (total !== undefined && total !== null) {
    const totalPath = joinPath(path, TOTAL_FIELD);
    summary.total = kind.fromDocument(expectDocumentObject(total, totalPath), totalPath);
  }
  return summary;
}

function decodeShards<S>(
  kind: StatsKind<S>,
  index: string,
  value: DocumentValue | undefined,
  path: string
): ShardStats<S>[] {
  if (value === undefined || value === null) return [];

  const shards: ShardStats<S>[] = [];
  for (const [key, copies] of Object.entries(expectDocumentObject(value, path))) {
    const shardPath = joinPath(path, key);
    const shardId = decodeField(shardKeySchema, key, shardPath);
    expectDocumentArray(copies, shardPath).forEach((copy, i) => {
      const copyPath = `${shardPath}[${i}]`;
      shards.push(ShardStats.fromDocument(expectDocumentObject(copy, copyPath), index, shardId, kind, copyPath));
    });
  }
  return shards;
}
