/**
 * Shard identity and the per-shard result record.
 */

import {
  FieldTable,
  binaryOnly,
  expectDocumentObject,
  joinPath,
  booleanField,
  intField,
  optionalStringField,
  stringField,
  type DocumentObject,
  type StreamInput,
  type StreamOutput,
} from '@shardstats/wire';
import type { StatsKind } from './types.js';

/**
 * One copy of one shard of an index
 */
export interface ShardRouting {
  /** Index the shard belongs to */
  readonly index: string;
  /** Shard number within the index */
  readonly shardId: number;
  /** Whether this copy is the primary */
  readonly primary: boolean;
  /** Node holding the copy */
  readonly nodeId?: string;
}

type ShardRoutingDraft = { -readonly [K in keyof ShardRouting]: ShardRouting[K] };

/**
 * Index and shard id travel in the binary form only; documents carry them
 * as the enclosing object keys.
 */
const ROUTING_FIELDS = new FieldTable<ShardRoutingDraft>([
  binaryOnly(
    stringField(
      'index',
      (r) => r.index,
      (r, v) => {
        r.index = v;
      }
    )
  ),
  binaryOnly(
    intField(
      'shard',
      (r) => r.shardId,
      (r, v) => {
        r.shardId = v;
      }
    )
  ),
  booleanField(
    'primary',
    (r) => r.primary,
    (r, v) => {
      r.primary = v;
    }
  ),
  optionalStringField(
    'node',
    (r) => r.nodeId,
    (r, v) => {
      r.nodeId = v;
    }
  ),
]);

function emptyRouting(): ShardRoutingDraft {
  return { index: '', shardId: -1, primary: false };
}

export function shardRouting(index: string, shardId: number, primary: boolean, nodeId?: string): ShardRouting {
  return nodeId === undefined ? { index, shardId, primary } : { index, shardId, primary, nodeId };
}

/** `[index][shard][p|r]` */
export function describeRouting(routing: ShardRouting): string {
  return `[${routing.index}][${routing.shardId}][${routing.primary ? 'p' : 'r'}]`;
}

/** Marks a shard entry whose copy reported no stats */
export const NO_STATS_FIELD = 'stats';

/**
 * Result of one shard copy: its identity plus the stats it reported.
 * A null `stats` folds as the identity value during aggregation.
 */
export class ShardStats<S> {
  readonly routing: ShardRouting;
  readonly stats: S | null;

  constructor(routing: ShardRouting, stats: S | null) {
    this.routing = routing;
    this.stats = stats;
  }

  get index(): string {
    return this.routing.index;
  }

  get shardId(): number {
    return this.routing.shardId;
  }

  get primary(): boolean {
    return this.routing.primary;
  }

  /** `[routing fields][stats presence flag][stats]` */
  writeTo(out: StreamOutput, kind: StatsKind<S>): void {
    ROUTING_FIELDS.writeTo(out, this.routing);
    out.writeBoolean(this.stats !== null);
    if (this.stats !== null) {
      kind.writeTo(out, this.stats);
    }
  }

  static readFrom<S>(input: StreamInput, kind: StatsKind<S>): ShardStats<S> {
    const routing = ROUTING_FIELDS.readFrom(input, emptyRouting());
    const stats = input.readBoolean() ? kind.readFrom(input) : null;
    return new ShardStats(routing, stats);
  }

  /** `{ routing: { primary, node? }, ...stats }`, or `{ routing, stats: null }` without stats */
  toDocument(kind: StatsKind<S>): DocumentObject {
    const routing = ROUTING_FIELDS.toDocument(this.routing);
    if (this.stats === null) {
      return { routing, [NO_STATS_FIELD]: null };
    }
    return { routing, ...kind.toDocument(this.stats) };
  }

  /**
   * Rebuild a record from its document entry. Index and shard id come from
   * the keys the entry was found under. Only an explicit `stats: null`
   * decodes to null stats; an entry without sections decodes to empty stats.
   */
  static fromDocument<S>(
    document: DocumentObject,
    index: string,
    shardId: number,
    kind: StatsKind<S>,
    path = ''
  ): ShardStats<S> {
    const routing = emptyRouting();
    routing.index = index;
    routing.shardId = shardId;

    const sections: DocumentObject = {};
    for (const [name, value] of Object.entries(document)) {
      if (name === 'routing') {
        if (value !== null) {
          const routingPath = joinPath(path, name);
          ROUTING_FIELDS.fromDocument(expectDocumentObject(value, routingPath), routing, routingPath);
        }
      } else if (name !== NO_STATS_FIELD || value !== null) {
        sections[name] = value;
      }
    }

    const stats = document[NO_STATS_FIELD] === null ? null : kind.fromDocument(sections, path);
    return new ShardStats(routing, stats);
  }
}

/** Value key of a routing: equal routings share a key */
export function routingKey(routing: ShardRouting): string {
  const key = describeRouting(routing);
  return routing.nodeId === undefined ? key : `${key}[${routing.nodeId}]`;
}

/**
 * Read-only map keyed by routing value rather than object identity, so a
 * freshly built routing finds the entry of an equal one. An equal routing
 * seen again keeps the first key and replaces its value.
 */
export class ShardRoutingMap<V> implements ReadonlyMap<ShardRouting, V> {
  private readonly keysByValue = new Map<string, ShardRouting>();
  private readonly entriesInOrder = new Map<ShardRouting, V>();

  constructor(entries: Iterable<readonly [ShardRouting, V]> = []) {
    for (const [routing, value] of entries) {
      const key = routingKey(routing);
      const existing = this.keysByValue.get(key);
      if (existing === undefined) {
        this.keysByValue.set(key, routing);
        this.entriesInOrder.set(routing, value);
      } else {
        this.entriesInOrder.set(existing, value);
      }
    }
  }

  get size(): number {
    return this.entriesInOrder.size;
  }

  get(routing: ShardRouting): V | undefined {
    const key = this.keysByValue.get(routingKey(routing));
    return key === undefined ? undefined : this.entriesInOrder.get(key);
  }

  has(routing: ShardRouting): boolean {
    return this.keysByValue.has(routingKey(routing));
  }

  forEach(callbackfn: (value: V, key: ShardRouting, map: ReadonlyMap<ShardRouting, V>) => void): void {
    this.entriesInOrder.forEach((value, routing) => callbackfn(value, routing, this));
  }

  entries() {
    return this.entriesInOrder.entries();
  }

  keys() {
    return this.entriesInOrder.keys();
  }

  values() {
    return this.entriesInOrder.values();
  }

  [Symbol.iterator]() {
    return this.entriesInOrder.entries();
  }
}
