import { describe, expect, it } from 'vitest';
import { DocumentDecodeError, StreamDecodeError } from '@shardstats/core';
import { PayloadCarrier } from '../payload-carrier.js';
import { SuggestQueryBuilder } from '../suggest-query-builder.js';

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

/* ================================================================== */
/*  Payload ownership                                                  */
/* ================================================================== */

describe('PayloadCarrier', () => {
  describe('prepareForDispatch', () => {
    it('should copy an unsafe payload and clear the flag', () => {
      const borrowed = new Uint8Array([1, 2, 3]);
      const request = new PayloadCarrier('logs').setPayload(borrowed, true);

      request.prepareForDispatch();

      expect(request.payloadIsSharedUnsafe).toBe(false);
      expect(request.payload).not.toBe(borrowed);
      expect(request.payload).toEqual(new Uint8Array([1, 2, 3]));

      borrowed[0] = 9;
      expect(request.payload[0]).toBe(1);
    });

    it('should copy only once across repeated calls', () => {
      const request = new PayloadCarrier().setPayload(new Uint8Array([4, 5]), true);

      request.prepareForDispatch();
      const owned = request.payload;
      request.prepareForDispatch();
      request.prepareForDispatch();

      expect(request.payload).toBe(owned);
      expect(request.payload).toEqual(new Uint8Array([4, 5]));
    });

    it('should leave a safe payload untouched', () => {
      const bytes = new Uint8Array([7]);
      const request = new PayloadCarrier().setPayload(bytes);

      request.prepareForDispatch();

      expect(request.payload).toBe(bytes);
      expect(request.payloadIsSharedUnsafe).toBe(false);
    });
  });

  describe('setters', () => {
    it('should encode a structured query as owned JSON bytes', () => {
      const request = new PayloadCarrier('logs').setPayloadFromStructuredQuery(
        new SuggestQueryBuilder().text('shrd').term('fix', { field: 'title' })
      );

      expect(request.payloadIsSharedUnsafe).toBe(false);
      expect(text(request.payload)).toBe('{"text":"shrd","fix":{"term":{"field":"title"}}}');
    });

    it('should join several routing values with commas', () => {
      const request = new PayloadCarrier().setRouting('user-1', 'user-2');
      expect(request.routing).toBe('user-1,user-2');

      request.setRouting();
      expect(request.routing).toBeUndefined();
    });

    it('should default to every index and an empty payload', () => {
      const request = new PayloadCarrier();
      expect(request.indices).toEqual([]);
      expect(request.payload).toHaveLength(0);
      expect(request.preference).toBeUndefined();
    });

    it('should replace the target indices', () => {
      const request = new PayloadCarrier('a').setIndices('b', 'c');
      expect(request.indices).toEqual(['b', 'c']);
    });
  });

  /* ================================================================== */
  /*  Binary form                                                        */
  /* ================================================================== */

  describe('binary form', () => {
    it('should write indices, absent routing and preference, then the payload', () => {
      const request = new PayloadCarrier('ab').setPayload(new Uint8Array([7]));

      expect(Array.from(request.toBytes())).toEqual([1, 2, 0x61, 0x62, 0, 0, 1, 7]);
    });

    it('should round-trip every field', () => {
      const request = new PayloadCarrier('logs', 'metrics')
        .setRouting('r1')
        .setPreference('_local')
        .setPayloadFromText('{"q":1}');

      const decoded = PayloadCarrier.fromBytes(request.toBytes());

      expect(decoded.indices).toEqual(['logs', 'metrics']);
      expect(decoded.routing).toBe('r1');
      expect(decoded.preference).toBe('_local');
      expect(text(decoded.payload)).toBe('{"q":1}');
      expect(decoded.toBytes()).toEqual(request.toBytes());
    });

    it('should mark a decoded payload unsafe because it views the received buffer', () => {
      const bytes = new PayloadCarrier('ab').setPayload(new Uint8Array([7])).toBytes();

      const decoded = PayloadCarrier.fromBytes(bytes);
      expect(decoded.payloadIsSharedUnsafe).toBe(true);
      expect(decoded.payload.buffer).toBe(bytes.buffer);

      decoded.prepareForDispatch();
      bytes[7] = 9;
      expect(Array.from(decoded.payload)).toEqual([7]);
    });

    it('should reject a truncated request', () => {
      const bytes = new PayloadCarrier('ab').setPayload(new Uint8Array([7, 8])).toBytes();

      expect(() => PayloadCarrier.fromBytes(bytes.slice(0, bytes.length - 1))).toThrow(StreamDecodeError);
    });

    it('should reject trailing bytes', () => {
      const bytes = new PayloadCarrier().toBytes();
      const padded = new Uint8Array([...bytes, 0]);

      expect(() => PayloadCarrier.fromBytes(padded)).toThrow(StreamDecodeError);
    });
  });

  /* ================================================================== */
  /*  Document form                                                      */
  /* ================================================================== */

  describe('document form', () => {
    it('should render the payload as base64 source', () => {
      const request = new PayloadCarrier('logs').setRouting('r1').setPayloadFromText('{"a":1}');

      expect(request.toDocument()).toEqual({
        indices: ['logs'],
        routing: 'r1',
        source: 'eyJhIjoxfQ==',
      });
    });

    it('should omit an empty payload and unset hints', () => {
      expect(new PayloadCarrier().toDocument()).toEqual({ indices: [] });
    });

    it('should decode tolerantly and ignore unknown fields', () => {
      const decoded = PayloadCarrier.fromDocument({
        source: 'eyJhIjoxfQ==',
        preference: null,
        future_flag: true,
        indices: ['x'],
      });

      expect(decoded.indices).toEqual(['x']);
      expect(decoded.preference).toBeUndefined();
      expect(decoded.payloadIsSharedUnsafe).toBe(false);
      expect(text(decoded.payload)).toBe('{"a":1}');
    });

    it('should reject a source that is not base64', () => {
      expect(() => PayloadCarrier.fromDocument({ source: 'not base64!' })).toThrow(DocumentDecodeError);

      try {
        PayloadCarrier.fromDocument({ source: 'not base64!' });
        expect.unreachable();
      } catch (error) {
        expect(error).toMatchObject({
          code: 'SHARDSTATS_D201',
          issues: [{ path: 'source', message: expect.any(String) }],
        });
      }
    });
  });

  describe('toString', () => {
    it('should show indices and the JSON source', () => {
      const request = new PayloadCarrier('logs', 'metrics').setPayloadFromText('{"a":1}');
      expect(request.toString()).toBe('[logs,metrics], source[{"a":1}]');
    });

    it('should show _na_ when the payload is not a JSON object', () => {
      expect(new PayloadCarrier('logs').setPayload(new Uint8Array([0xff])).toString()).toBe(
        '[logs], source[_na_]'
      );
      expect(new PayloadCarrier().toString()).toBe('[], source[_na_]');
    });
  });
});
