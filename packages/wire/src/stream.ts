/**
 * Length-prefixed binary streams for node-to-node transfer.
 *
 * Fields are written in a fixed order with no tags: the reader must consume
 * them in exactly the order they were written. Integers use base-128 varints,
 * strings and byte references carry a varint length prefix and optional values
 * a one-byte presence flag.
 */

import { StreamDecodeError } from '@shardstats/core';

const MAX_VINT = 0xffffffff;
const MAX_VINT_BYTES = 5;
const MAX_VLONG_BYTES = 8;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

// ─── Output ─────────────────────────────────────────────────────

/** Growable output buffer. */
export class StreamOutput {
  private buffer: Uint8Array;
  private position = 0;

  constructor(initialCapacity = 256) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
  }

  /** Number of bytes written so far */
  get size(): number {
    return this.position;
  }

  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.position++] = value & 0xff;
  }

  writeBoolean(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /** Unsigned 32-bit varint */
  writeVInt(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VINT) {
      throw new RangeError(`VInt out of range: ${value}`);
    }
    this.writeVarint(value);
  }

  /** Unsigned varint up to Number.MAX_SAFE_INTEGER */
  writeVLong(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`VLong out of range: ${value}`);
    }
    this.writeVarint(value);
  }

  /** Signed 32-bit big-endian integer */
  writeInt(value: number): void {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new RangeError(`Int out of range: ${value}`);
    }
    this.ensureCapacity(4);
    new DataView(this.buffer.buffer, this.buffer.byteOffset + this.position, 4).setInt32(0, value);
    this.position += 4;
  }

  writeString(value: string): void {
    this.writeBytesReference(textEncoder.encode(value));
  }

  writeOptionalString(value: string | null | undefined): void {
    if (value === null || value === undefined) {
      this.writeBoolean(false);
      return;
    }
    this.writeBoolean(true);
    this.writeString(value);
  }

  writeStringArray(values: readonly string[]): void {
    this.writeVInt(values.length);
    for (const value of values) {
      this.writeString(value);
    }
  }

  /** Length-prefixed raw bytes */
  writeBytesReference(bytes: Uint8Array): void {
    this.writeVInt(bytes.length);
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.position);
    this.position += bytes.length;
  }

  /** Copy of the bytes written so far */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.position);
  }

  private writeVarint(value: number): void {
    let v = value;
    while (v >= 0x80) {
      this.writeByte((v % 0x80) | 0x80);
      v = Math.floor(v / 0x80);
    }
    this.writeByte(v);
  }

  private ensureCapacity(extra: number): void {
    const required = this.position + extra;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.position));
    this.buffer = grown;
  }
}

// ─── Input ──────────────────────────────────────────────────────

/** Sequential reader over a received buffer. */
export class StreamInput {
  private position = 0;

  constructor(private readonly data: Uint8Array) {}

  /** Current read offset */
  get offset(): number {
    return this.position;
  }

  /** Bytes left to read */
  get remaining(): number {
    return this.data.length - this.position;
  }

  readByte(): number {
    if (this.position >= this.data.length) {
      throw this.truncated(1);
    }
    return this.data[this.position++] ?? 0;
  }

  readBoolean(): boolean {
    const start = this.position;
    const value = this.readByte();
    if (value > 1) {
      throw new StreamDecodeError('SHARDSTATS_W101', `Invalid boolean flag ${value}`, start);
    }
    return value === 1;
  }

  readVInt(): number {
    const start = this.position;
    const value = this.readVarint(MAX_VINT_BYTES);
    if (value > MAX_VINT) {
      throw new StreamDecodeError('SHARDSTATS_W101', 'VInt exceeds 32 bits', start);
    }
    return value;
  }

  readVLong(): number {
    const start = this.position;
    const value = this.readVarint(MAX_VLONG_BYTES);
    if (value > Number.MAX_SAFE_INTEGER) {
      throw new StreamDecodeError('SHARDSTATS_W101', 'VLong exceeds Number.MAX_SAFE_INTEGER', start);
    }
    return value;
  }

  readInt(): number {
    this.require(4);
    const value = new DataView(this.data.buffer, this.data.byteOffset + this.position, 4).getInt32(0);
    this.position += 4;
    return value;
  }

  readString(): string {
    const start = this.position;
    const bytes = this.readBytesReference();
    try {
      return textDecoder.decode(bytes);
    } catch (error) {
      throw new StreamDecodeError(
        'SHARDSTATS_W101',
        `Invalid UTF-8 string: ${error instanceof Error ? error.message : String(error)}`,
        start
      );
    }
  }

  readOptionalString(): string | undefined {
    return this.readBoolean() ? this.readString() : undefined;
  }

  readStringArray(): string[] {
    const count = this.readVInt();
    const values: string[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.readString());
    }
    return values;
  }

  /**
   * Length-prefixed raw bytes. The result is a view into the received buffer,
   * not a copy.
   */
  readBytesReference(): Uint8Array {
    const length = this.readVInt();
    this.require(length);
    const bytes = this.data.subarray(this.position, this.position + length);
    this.position += length;
    return bytes;
  }

  /** Throw when bytes are left after the last field */
  ensureFullyConsumed(): void {
    if (this.remaining > 0) {
      throw new StreamDecodeError(
        'SHARDSTATS_W101',
        `${this.remaining} trailing byte(s) after the last field`,
        this.position
      );
    }
  }

  private readVarint(maxBytes: number): number {
    const start = this.position;
    let result = 0;
    let multiplier = 1;
    for (let i = 0; i < maxBytes; i++) {
      const byte = this.readByte();
      result += (byte & 0x7f) * multiplier;
      if ((byte & 0x80) === 0) {
        return result;
      }
      multiplier *= 0x80;
    }
    throw new StreamDecodeError('SHARDSTATS_W101', `Varint longer than ${maxBytes} bytes`, start);
  }

  private require(length: number): void {
    if (this.position + length > this.data.length) {
      throw this.truncated(length);
    }
  }

  private truncated(wanted: number): StreamDecodeError {
    return new StreamDecodeError(
      'SHARDSTATS_W100',
      `Binary stream truncated: wanted ${wanted} byte(s) at offset ${this.position}, ${this.remaining} left`,
      this.position
    );
  }
}

// ─── Helpers ────────────────────────────────────────────────────

/** Run a writer against a fresh stream and return the bytes. */
export function writeToBytes(write: (out: StreamOutput) => void, initialCapacity?: number): Uint8Array {
  const out = new StreamOutput(initialCapacity);
  write(out);
  return out.toBytes();
}

/**
 * Run a reader over the whole buffer. Truncated input and trailing bytes both
 * fail; no partial result is returned.
 */
export function readFully<T>(data: Uint8Array, read: (input: StreamInput) => T): T {
  const input = new StreamInput(data);
  const result = read(input);
  input.ensureFullyConsumed();
  return result;
}
