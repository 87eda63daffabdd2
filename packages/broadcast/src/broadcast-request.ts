/**
 * Base class for requests fanned out to every shard of a set of indices.
 */

import { stringArrayField, writeToBytes, type FieldDefinition, type StreamOutput } from '@shardstats/wire';

export abstract class BroadcastRequest {
  private targetIndices: string[];

  constructor(indices: readonly string[] = []) {
    this.targetIndices = [...indices];
  }

  /** Target index names; empty means every index */
  get indices(): readonly string[] {
    return this.targetIndices;
  }

  setIndices(...indices: string[]): this {
    this.targetIndices = [...indices];
    return this;
  }

  /**
   * Called before every dispatch attempt, retries included. Subclasses that
   * hold borrowed buffers take ownership of them here.
   */
  prepareForDispatch(): void {
    // Nothing to own by default
  }

  abstract writeTo(out: StreamOutput): void;

  toBytes(): Uint8Array {
    return writeToBytes((out) => this.writeTo(out));
  }
}

/** Leading fields shared by every broadcast request */
export const BROADCAST_REQUEST_FIELDS: readonly FieldDefinition<BroadcastRequest>[] = [
  stringArrayField(
    'indices',
    (r) => r.indices,
    (r, v) => {
      r.setIndices(...v);
    }
  ),
];
