/**
 * Field definition factories for the common value shapes.
 */

import { DocumentDecodeError, ShardStatsError } from '@shardstats/core';
import { z } from 'zod';
import type { DocumentValue } from './document.js';
import {
  type FieldDefinition,
  type FieldTable,
  expectDocumentArray,
  expectDocumentObject,
} from './field-table.js';

type Getter<T, V> = (target: T) => V;
type Setter<T, V> = (target: T, value: V) => void;

const counterSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
const vintSchema = z.number().int().nonnegative().max(0xffffffff);
const intSchema = z.number().int().min(-0x80000000).max(0x7fffffff);
const stringArraySchema = z.array(z.string());

/**
 * Validate a document value against a zod schema, failing with the field path.
 */
export function decodeField<V>(
  schema: z.ZodType<V, z.ZodTypeDef, unknown>,
  value: DocumentValue,
  path: string
): V {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DocumentDecodeError(
      'SHARDSTATS_D201',
      `Invalid value for field "${path}"`,
      result.error.issues.map((issue) => ({
        path: [path, ...issue.path].join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Non-negative counter, summed on combine. A sum past the safe integer range
 * fails the merge with W102.
 */
export function counterField<T>(
  name: string,
  get: Getter<T, number>,
  set: Setter<T, number>
): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeVLong(get(target)),
    read: (input, target) => set(target, input.readVLong()),
    toDocument: (target) => get(target),
    fromDocument: (value, target, path) => set(target, decodeField(counterSchema, value, path)),
    combine: (target, source) => {
      const sum = get(target) + get(source);
      if (!Number.isSafeInteger(sum)) {
        throw ShardStatsError.fromCode('SHARDSTATS_W102', { field: name, sum });
      }
      set(target, sum);
    },
  };
}

/** Unsigned 32-bit integer (counts, identifiers) */
export function vintField<T>(name: string, get: Getter<T, number>, set: Setter<T, number>): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeVInt(get(target)),
    read: (input, target) => set(target, input.readVInt()),
    toDocument: (target) => get(target),
    fromDocument: (value, target, path) => set(target, decodeField(vintSchema, value, path)),
  };
}

/** Signed 32-bit integer */
export function intField<T>(name: string, get: Getter<T, number>, set: Setter<T, number>): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeInt(get(target)),
    read: (input, target) => set(target, input.readInt()),
    toDocument: (target) => get(target),
    fromDocument: (value, target, path) => set(target, decodeField(intSchema, value, path)),
  };
}

export function booleanField<T>(name: string, get: Getter<T, boolean>, set: Setter<T, boolean>): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeBoolean(get(target)),
    read: (input, target) => set(target, input.readBoolean()),
    toDocument: (target) => get(target),
    fromDocument: (value, target, path) => set(target, decodeField(z.boolean(), value, path)),
  };
}

export function stringField<T>(name: string, get: Getter<T, string>, set: Setter<T, string>): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeString(get(target)),
    read: (input, target) => set(target, input.readString()),
    toDocument: (target) => get(target),
    fromDocument: (value, target, path) => set(target, decodeField(z.string(), value, path)),
  };
}

/** Optional string: presence flag in binary, omitted from documents when unset */
export function optionalStringField<T>(
  name: string,
  get: Getter<T, string | undefined>,
  set: Setter<T, string | undefined>
): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeOptionalString(get(target)),
    read: (input, target) => set(target, input.readOptionalString()),
    toDocument: (target) => get(target),
    fromDocument: (value, target, path) => set(target, decodeField(z.string(), value, path)),
  };
}

export function stringArrayField<T>(
  name: string,
  get: Getter<T, readonly string[]>,
  set: Setter<T, string[]>
): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => out.writeStringArray(get(target)),
    read: (input, target) => set(target, input.readStringArray()),
    toDocument: (target) => [...get(target)],
    fromDocument: (value, target, path) => set(target, decodeField(stringArraySchema, value, path)),
  };
}

/**
 * Optional nested value described by its own table. Binary form is a presence
 * flag followed by the nested fields; document form is a nested object.
 * Combining creates the target's value on first use and merges field by field.
 */
export function objectField<T, V>(
  name: string,
  get: Getter<T, V | undefined>,
  set: Setter<T, V>,
  table: FieldTable<V>,
  create: () => V
): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => {
      const value = get(target);
      out.writeBoolean(value !== undefined);
      if (value !== undefined) {
        table.writeTo(out, value);
      }
    },
    read: (input, target) => {
      if (input.readBoolean()) {
        set(target, table.readFrom(input, create()));
      }
    },
    toDocument: (target) => {
      const value = get(target);
      return value === undefined ? undefined : table.toDocument(value);
    },
    fromDocument: (value, target, path) => {
      set(target, table.fromDocument(expectDocumentObject(value, path), create(), path));
    },
    combine: (target, source) => {
      const sourceValue = get(source);
      if (sourceValue === undefined) return;
      let targetValue = get(target);
      if (targetValue === undefined) {
        targetValue = create();
        set(target, targetValue);
      }
      table.combine(targetValue, sourceValue);
    },
  };
}

/**
 * Repeated nested values. Binary form is a vint count followed by each item;
 * document form is an array of objects, omitted when empty if `omitEmpty` is set.
 */
export function objectArrayField<T, V>(
  name: string,
  get: Getter<T, readonly V[]>,
  set: Setter<T, V[]>,
  table: FieldTable<V>,
  create: () => V,
  options: { omitEmpty?: boolean } = {}
): FieldDefinition<T> {
  return {
    name,
    write: (out, target) => {
      const items = get(target);
      out.writeVInt(items.length);
      for (const item of items) {
        table.writeTo(out, item);
      }
    },
    read: (input, target) => {
      const count = input.readVInt();
      const items: V[] = [];
      for (let i = 0; i < count; i++) {
        items.push(table.readFrom(input, create()));
      }
      set(target, items);
    },
    toDocument: (target) => {
      const items = get(target);
      if (options.omitEmpty && items.length === 0) return undefined;
      return items.map((item) => table.toDocument(item));
    },
    fromDocument: (value, target, path) => {
      set(
        target,
        expectDocumentArray(value, path).map((item, i) =>
          table.fromDocument(expectDocumentObject(item, `${path}[${i}]`), create(), `${path}[${i}]`)
        )
      );
    },
  };
}

/**
 * Keep a field in the binary form only. Used for identity fields that the
 * document form carries structurally (as an object key) rather than as a value.
 */
export function binaryOnly<T>(field: FieldDefinition<T>): FieldDefinition<T> {
  return {
    name: field.name,
    write: (out, target) => field.write(out, target),
    read: (input, target) => field.read(input, target),
    toDocument: () => undefined,
    fromDocument: () => undefined,
  };
}
