/**
 * Hierarchical document form: named fields holding scalars, arrays or nested
 * objects, rendered as JSON for the user-facing surface.
 */

import { DocumentDecodeError } from '@shardstats/core';
import { z } from 'zod';

export type DocumentScalar = string | number | boolean | null;

export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentObject;

/** Field name → value. Field order is insertion order. */
export interface DocumentObject {
  [field: string]: DocumentValue;
}

export const documentValueSchema: z.ZodType<DocumentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(documentValueSchema),
    z.record(documentValueSchema),
  ])
);

export const documentObjectSchema = z.record(documentValueSchema);

export function isDocumentObject(value: DocumentValue | undefined): value is DocumentObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse JSON text into a document. The root must be an object.
 */
export function parseDocument(text: string): DocumentObject {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DocumentDecodeError(
      'SHARDSTATS_D200',
      'Document is not valid JSON',
      [],
      error instanceof Error ? error : undefined
    );
  }

  const result = documentObjectSchema.safeParse(raw);
  if (!result.success) {
    throw new DocumentDecodeError('SHARDSTATS_D200', 'Document root must be a JSON object');
  }
  return result.data;
}

export function stringifyDocument(document: DocumentObject, pretty = false): string {
  return pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document);
}

/** Document → UTF-8 JSON bytes */
export function encodeDocument(document: DocumentObject): Uint8Array {
  return textEncoder.encode(stringifyDocument(document));
}

/** UTF-8 JSON bytes → document */
export function decodeDocument(bytes: Uint8Array): DocumentObject {
  let text: string;
  try {
    text = textDecoder.decode(bytes);
  } catch (error) {
    throw new DocumentDecodeError(
      'SHARDSTATS_D200',
      'Document bytes are not valid UTF-8',
      [],
      error instanceof Error ? error : undefined
    );
  }
  return parseDocument(text);
}
