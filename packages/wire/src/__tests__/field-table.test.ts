import { describe, expect, it } from 'vitest';
import { DocumentDecodeError, ShardStatsError, StreamDecodeError } from '@shardstats/core';
import { FieldTable } from '../field-table.js';
import {
  binaryOnly,
  booleanField,
  counterField,
  intField,
  objectArrayField,
  objectField,
  optionalStringField,
  stringArrayField,
  stringField,
  vintField,
} from '../fields.js';
import { StreamInput, readFully, writeToBytes } from '../stream.js';

/* ------------------------------------------------------------------ */
/*  Fixtures                                                           */
/* ------------------------------------------------------------------ */

class Section {
  hits = 0;
  misses = 0;
}

class Sample {
  name = '';
  label?: string;
  tags: string[] = [];
  shard = 0;
  offset = 0;
  enabled = false;
  section?: Section;
}

const SECTION = new FieldTable<Section>([
  counterField('hits', (s) => s.hits, (s, v) => { s.hits = v; }),
  counterField('misses', (s) => s.misses, (s, v) => { s.misses = v; }),
]);

const SAMPLE = new FieldTable<Sample>([
  stringField('name', (s) => s.name, (s, v) => { s.name = v; }),
  optionalStringField('label', (s) => s.label, (s, v) => { s.label = v; }),
  stringArrayField('tags', (s) => s.tags, (s, v) => { s.tags = v; }),
  vintField('shard', (s) => s.shard, (s, v) => { s.shard = v; }),
  intField('offset', (s) => s.offset, (s, v) => { s.offset = v; }),
  booleanField('enabled', (s) => s.enabled, (s, v) => { s.enabled = v; }),
  objectField('section', (s) => s.section, (s, v) => { s.section = v; }, SECTION, () => new Section()),
]);

function makeSample(): Sample {
  const sample = new Sample();
  sample.name = 'sample';
  sample.label = 'primary';
  sample.tags = ['a', 'b'];
  sample.shard = 3;
  sample.offset = -7;
  sample.enabled = true;
  sample.section = Object.assign(new Section(), { hits: 10, misses: 2 });
  return sample;
}

function documentError(fn: () => unknown): DocumentDecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DocumentDecodeError) return error;
    throw error;
  }
  throw new Error('expected a DocumentDecodeError');
}

/* ================================================================== */
/*  FieldTable                                                         */
/* ================================================================== */

describe('FieldTable', () => {
  it('should list field names in declaration order', () => {
    expect(SAMPLE.names).toEqual(['name', 'label', 'tags', 'shard', 'offset', 'enabled', 'section']);
  });

  it('should refuse duplicate field names', () => {
    expect(
      () =>
        new FieldTable<Section>([
          counterField('hits', (s) => s.hits, (s, v) => { s.hits = v; }),
          counterField('hits', (s) => s.misses, (s, v) => { s.misses = v; }),
        ])
    ).toThrow('Duplicate field "hits" in field table');
  });

  describe('binary form', () => {
    it('should write fields in declaration order without tags', () => {
      const table = new FieldTable<Sample>([
        stringField('name', (s) => s.name, (s, v) => { s.name = v; }),
        vintField('shard', (s) => s.shard, (s, v) => { s.shard = v; }),
      ]);
      const sample = Object.assign(new Sample(), { name: 'ab', shard: 5 });

      expect([...writeToBytes((out) => table.writeTo(out, sample))]).toEqual([2, 0x61, 0x62, 5]);
    });

    it('should round-trip every field, including absent optionals', () => {
      const full = makeSample();
      const empty = new Sample();

      for (const sample of [full, empty]) {
        const bytes = writeToBytes((out) => SAMPLE.writeTo(out, sample));
        expect(readFully(bytes, (input) => SAMPLE.readFrom(input, new Sample()))).toEqual(sample);
      }
    });

    it('should fail on truncated input instead of returning a partial value', () => {
      const bytes = writeToBytes((out) => SAMPLE.writeTo(out, makeSample()));
      const input = new StreamInput(bytes.slice(0, bytes.length - 1));
      expect(() => SAMPLE.readFrom(input, new Sample())).toThrow(StreamDecodeError);
    });
  });

  describe('document form', () => {
    it('should omit unset optional fields', () => {
      expect(SAMPLE.toDocument(new Sample())).toEqual({
        name: '',
        tags: [],
        shard: 0,
        offset: 0,
        enabled: false,
      });
    });

    it('should render nested objects', () => {
      expect(SAMPLE.toDocument(makeSample())).toEqual({
        name: 'sample',
        label: 'primary',
        tags: ['a', 'b'],
        shard: 3,
        offset: -7,
        enabled: true,
        section: { hits: 10, misses: 2 },
      });
    });

    it('should ignore field order and unknown fields, and default absent ones', () => {
      const decoded = SAMPLE.fromDocument(
        { enabled: true, unknown: 1, section: { misses: 2, extra: 'x' }, name: 'n' },
        new Sample()
      );

      expect(decoded.name).toBe('n');
      expect(decoded.enabled).toBe(true);
      expect(decoded.label).toBeUndefined();
      expect(decoded.tags).toEqual([]);
      expect(decoded.section).toEqual(Object.assign(new Section(), { hits: 0, misses: 2 }));
    });

    it('should treat null as absent', () => {
      const decoded = SAMPLE.fromDocument({ label: null, shard: null }, new Sample());
      expect(decoded.label).toBeUndefined();
      expect(decoded.shard).toBe(0);
    });

    it('should round-trip through the document form', () => {
      const sample = makeSample();
      expect(SAMPLE.fromDocument(SAMPLE.toDocument(sample), new Sample())).toEqual(sample);
    });

    it('should reject a wrongly typed known field with its path', () => {
      const error = documentError(() => SAMPLE.fromDocument({ shard: 'one' }, new Sample()));
      expect(error.code).toBe('SHARDSTATS_D201');
      expect(error.message).toBe('Invalid value for field "shard"');
      expect(error.issues[0]!.path).toBe('shard');
    });

    it('should report nested paths', () => {
      const error = documentError(() => SAMPLE.fromDocument({ section: { hits: -1 } }, new Sample(), 'root'));
      expect(error.issues[0]!.path).toBe('root.section.hits');
    });

    it('should require nested fields to be objects', () => {
      const error = documentError(() => SAMPLE.fromDocument({ section: 3 }, new Sample()));
      expect(error.message).toBe('Field "section" must be an object');
    });
  });

  describe('combine', () => {
    it('should sum counters and creates missing sections without sharing them', () => {
      const a = Object.assign(new Sample(), { section: Object.assign(new Section(), { hits: 1, misses: 2 }) });
      const b = Object.assign(new Sample(), { section: Object.assign(new Section(), { hits: 3, misses: 0 }) });
      const target = new Sample();

      SAMPLE.combine(target, a);
      SAMPLE.combine(target, b);

      expect(target.section).toEqual(Object.assign(new Section(), { hits: 4, misses: 2 }));
      expect(target.section).not.toBe(a.section);
      expect(a.section).toEqual(Object.assign(new Section(), { hits: 1, misses: 2 }));
    });

    it('should fail a counter sum past the safe integer range with the field name', () => {
      const a = Object.assign(new Section(), { hits: Number.MAX_SAFE_INTEGER });
      const b = Object.assign(new Section(), { hits: 1 });

      let thrown: unknown;
      try {
        SECTION.combine(a, b);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ShardStatsError);
      expect(thrown).toMatchObject({
        code: 'SHARDSTATS_W102',
        context: { field: 'hits', sum: Number.MAX_SAFE_INTEGER + 1 },
      });
      expect(a.hits).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('should leave the target untouched when the source has no section', () => {
      const target = new Sample();
      SAMPLE.combine(target, new Sample());
      expect(target.section).toBeUndefined();
    });
  });

  describe('binaryOnly', () => {
    const table = new FieldTable<Sample>([
      binaryOnly(vintField('shard', (s) => s.shard, (s, v) => { s.shard = v; })),
      stringField('name', (s) => s.name, (s, v) => { s.name = v; }),
    ]);

    it('should keep the field in the binary form', () => {
      const sample = Object.assign(new Sample(), { shard: 4, name: 'x' });
      const bytes = writeToBytes((out) => table.writeTo(out, sample));
      expect(readFully(bytes, (input) => table.readFrom(input, new Sample())).shard).toBe(4);
    });

    it('should drop the field from the document form', () => {
      const sample = Object.assign(new Sample(), { shard: 4, name: 'x' });
      expect(table.toDocument(sample)).toEqual({ name: 'x' });
      expect(table.fromDocument({ shard: 9 }, new Sample()).shard).toBe(0);
    });
  });

  describe('objectArrayField', () => {
    class Holder {
      sections: Section[] = [];
    }

    const table = new FieldTable<Holder>([
      objectArrayField('sections', (h) => h.sections, (h, v) => { h.sections = v; }, SECTION, () => new Section(), {
        omitEmpty: true,
      }),
    ]);

    it('should write a count followed by each item', () => {
      const holder = Object.assign(new Holder(), {
        sections: [Object.assign(new Section(), { hits: 1, misses: 2 })],
      });
      expect([...writeToBytes((out) => table.writeTo(out, holder))]).toEqual([1, 1, 2]);
    });

    it('should omit an empty array from the document when asked to', () => {
      expect(table.toDocument(new Holder())).toEqual({});
    });

    it('should report item paths', () => {
      const error = documentError(() => table.fromDocument({ sections: [{ hits: 1 }, 2] }, new Holder()));
      expect(error.message).toBe('Field "sections[1]" must be an object');
    });
  });
});
