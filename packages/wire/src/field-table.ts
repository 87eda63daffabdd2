/**
 * Field tables: one ordered list of field definitions drives the binary
 * codec, the document codec and the merge of a value type.
 *
 * Binary encoding walks the table in declaration order and is exhaustive.
 * Document decoding walks the same table and looks each name up in the
 * incoming object, so field order in the document does not matter, unknown
 * fields are ignored and absent (or null) fields keep the target's default.
 */

import { DocumentDecodeError } from '@shardstats/core';
import type { DocumentObject, DocumentValue } from './document.js';
import type { StreamInput, StreamOutput } from './stream.js';

/**
 * One named field of a value of type T
 */
export interface FieldDefinition<T> {
  /** Document field name */
  readonly name: string;
  /** Append the field to a binary stream */
  write(out: StreamOutput, target: T): void;
  /** Read the field from a binary stream into the target */
  read(input: StreamInput, target: T): void;
  /** Document value of the field, or undefined to omit it */
  toDocument(target: T): DocumentValue | undefined;
  /** Apply a present, non-null document value to the target */
  fromDocument(value: DocumentValue, target: T, path: string): void;
  /** Fold the source's value into the target's (counters sum, sections merge) */
  combine?(target: T, source: T): void;
}

export class FieldTable<T> {
  readonly fields: readonly FieldDefinition<T>[];

  constructor(fields: readonly FieldDefinition<T>[]) {
    const seen = new Set<string>();
    for (const field of fields) {
      if (seen.has(field.name)) {
        throw new Error(`Duplicate field "${field.name}" in field table`);
      }
      seen.add(field.name);
    }
    this.fields = fields;
  }

  get names(): string[] {
    return this.fields.map((f) => f.name);
  }

  writeTo(out: StreamOutput, target: T): void {
    for (const field of this.fields) {
      field.write(out, target);
    }
  }

  readFrom(input: StreamInput, target: T): T {
    for (const field of this.fields) {
      field.read(input, target);
    }
    return target;
  }

  toDocument(target: T): DocumentObject {
    const document: DocumentObject = {};
    for (const field of this.fields) {
      const value = field.toDocument(target);
      if (value !== undefined) {
        document[field.name] = value;
      }
    }
    return document;
  }

  fromDocument(document: DocumentObject, target: T, path = ''): T {
    for (const field of this.fields) {
      if (!Object.hasOwn(document, field.name)) continue;
      const value = document[field.name];
      if (value === undefined || value === null) continue;
      field.fromDocument(value, target, joinPath(path, field.name));
    }
    return target;
  }

  combine(target: T, source: T): T {
    for (const field of this.fields) {
      field.combine?.(target, source);
    }
    return target;
  }
}

export function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}

/**
 * Narrow a document value to an object or fail with the field path.
 */
export function expectDocumentObject(value: DocumentValue | undefined, path: string): DocumentObject {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return value;
  }
  throw new DocumentDecodeError('SHARDSTATS_D201', `Field "${path}" must be an object`, [
    { path, message: `Expected object, received ${describeValue(value)}` },
  ]);
}

/**
 * Narrow a document value to an array or fail with the field path.
 */
export function expectDocumentArray(value: DocumentValue | undefined, path: string): DocumentValue[] {
  if (Array.isArray(value)) {
    return value;
  }
  throw new DocumentDecodeError('SHARDSTATS_D201', `Field "${path}" must be an array`, [
    { path, message: `Expected array, received ${describeValue(value)}` },
  ]);
}

function describeValue(value: DocumentValue | undefined): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
