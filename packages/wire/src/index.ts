/**
 * @shardstats/wire - the two wire formats
 *
 * A compact, length-prefixed binary stream for node-to-node transfer and a
 * hierarchical JSON document for the user-facing surface. Value types declare
 * one `FieldTable` that both codecs walk.
 *
 * @example
 * ```typescript
 * import { FieldTable, counterField, readFully, writeToBytes } from '@shardstats/wire';
 *
 * class Docs { count = 0; deleted = 0; }
 *
 * const DOCS = new FieldTable<Docs>([
 *   counterField('count', (d) => d.count, (d, v) => { d.count = v; }),
 *   counterField('deleted', (d) => d.deleted, (d, v) => { d.deleted = v; }),
 * ]);
 *
 * const bytes = writeToBytes((out) => DOCS.writeTo(out, docs));
 * const copy = readFully(bytes, (input) => DOCS.readFrom(input, new Docs()));
 * const json = DOCS.toDocument(copy); // { count: 10, deleted: 1 }
 * ```
 */

// Binary streams
export { StreamInput, StreamOutput, readFully, writeToBytes } from './stream.js';

// Documents
export type { DocumentObject, DocumentScalar, DocumentValue } from './document.js';
export {
  decodeDocument,
  documentObjectSchema,
  documentValueSchema,
  encodeDocument,
  isDocumentObject,
  parseDocument,
  stringifyDocument,
} from './document.js';

// Field tables
export type { FieldDefinition } from './field-table.js';
export { FieldTable, expectDocumentArray, expectDocumentObject, joinPath } from './field-table.js';
export {
  binaryOnly,
  booleanField,
  counterField,
  decodeField,
  intField,
  objectArrayField,
  objectField,
  optionalStringField,
  stringArrayField,
  stringField,
  vintField,
} from './fields.js';
