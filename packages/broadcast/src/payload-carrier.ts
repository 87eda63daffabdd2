/**
 * Broadcast request carrying an opaque query payload to every shard.
 *
 * A payload read from a received buffer may still be backed by memory the
 * caller does not own. Such a payload is flagged unsafe and copied exactly
 * once, in `prepareForDispatch()`, before any shard request reads it.
 */

import {
  FieldTable,
  decodeDocument,
  decodeField,
  encodeDocument,
  optionalStringField,
  readFully,
  stringifyDocument,
  type DocumentObject,
  type FieldDefinition,
  type StreamInput,
  type StreamOutput,
} from '@shardstats/wire';
import { z } from 'zod';
import { BROADCAST_REQUEST_FIELDS, BroadcastRequest } from './broadcast-request.js';
import type { DocumentWritable } from './suggest-query-builder.js';

const EMPTY_PAYLOAD = new Uint8Array(0);
const NOT_AVAILABLE = '_na_';

const base64Schema = z.string().base64();

export class PayloadCarrier extends BroadcastRequest {
  private currentPayload: Uint8Array = EMPTY_PAYLOAD;
  private sharedUnsafe = false;
  private routingValue?: string;
  private preferenceValue?: string;

  constructor(...indices: string[]) {
    super(indices);
  }

  /** Query bytes. Do not read from more than one consumer while unsafe. */
  get payload(): Uint8Array {
    return this.currentPayload;
  }

  /** True while the payload may be backed by a buffer this request does not own */
  get payloadIsSharedUnsafe(): boolean {
    return this.sharedUnsafe;
  }

  get routing(): string | undefined {
    return this.routingValue;
  }

  get preference(): string | undefined {
    return this.preferenceValue;
  }

  setPayload(bytes: Uint8Array, unsafe = false): this {
    this.currentPayload = bytes;
    this.sharedUnsafe = unsafe;
    return this;
  }

  /** Encode a structured query as JSON bytes. The result is owned and not flagged unsafe. */
  setPayloadFromStructuredQuery(builder: DocumentWritable): this {
    return this.setPayload(encodeDocument(builder.toDocument()), false);
  }

  /** Raw JSON query text */
  setPayloadFromText(source: string): this {
    return this.setPayload(new TextEncoder().encode(source), false);
  }

  /** Several routing values are joined with commas; none clears the routing */
  setRouting(...routings: string[]): this {
    this.routingValue = routings.length > 0 ? routings.join(',') : undefined;
    return this;
  }

  setPreference(preference: string | undefined): this {
    this.preferenceValue = preference;
    return this;
  }

  /**
   * Take ownership of an unsafe payload by copying it. Idempotent: once the
   * flag is cleared further calls do nothing.
   */
  override prepareForDispatch(): void {
    if (!this.sharedUnsafe) return;
    this.currentPayload = this.currentPayload.slice();
    this.sharedUnsafe = false;
  }

  /** `[indices][optional routing][optional preference][bytes payload]` */
  writeTo(out: StreamOutput): void {
    PAYLOAD_CARRIER_FIELDS.writeTo(out, this);
  }

  /** The decoded payload is a view into `input` and is marked unsafe. */
  static readFrom(input: StreamInput): PayloadCarrier {
    return PAYLOAD_CARRIER_FIELDS.readFrom(input, new PayloadCarrier());
  }

  static fromBytes(bytes: Uint8Array): PayloadCarrier {
    return readFully(bytes, (input) => PayloadCarrier.readFrom(input));
  }

  /** `{ indices, routing?, preference?, source? }` with the payload as base64 */
  toDocument(): DocumentObject {
    return PAYLOAD_CARRIER_FIELDS.toDocument(this);
  }

  static fromDocument(document: DocumentObject): PayloadCarrier {
    return PAYLOAD_CARRIER_FIELDS.fromDocument(document, new PayloadCarrier());
  }

  /** `[logs,metrics], source[{...}]`; a payload that is not a JSON object shows as `_na_` */
  override toString(): string {
    return `[${this.indices.join(',')}], source[${this.describePayload()}]`;
  }

  private describePayload(): string {
    if (this.currentPayload.length === 0) return NOT_AVAILABLE;
    try {
      return stringifyDocument(decodeDocument(this.currentPayload));
    } catch {
      return NOT_AVAILABLE;
    }
  }
}

const sourceField: FieldDefinition<PayloadCarrier> = {
  name: 'source',
  write: (out, request) => out.writeBytesReference(request.payload),
  read: (input, request) => {
    request.setPayload(input.readBytesReference(), true);
  },
  toDocument: (request) =>
    request.payload.length > 0 ? Buffer.from(request.payload).toString('base64') : undefined,
  fromDocument: (value, request, path) => {
    const encoded = decodeField(base64Schema, value, path);
    request.setPayload(new Uint8Array(Buffer.from(encoded, 'base64')), false);
  },
};

const PAYLOAD_CARRIER_FIELDS = new FieldTable<PayloadCarrier>([
  ...BROADCAST_REQUEST_FIELDS,
  optionalStringField(
    'routing',
    (r) => r.routing,
    (r, v) => {
      r.setRouting(...(v === undefined ? [] : [v]));
    }
  ),
  optionalStringField(
    'preference',
    (r) => r.preference,
    (r, v) => {
      r.setPreference(v);
    }
  ),
  sourceField,
]);
