import type {TraceContext} from '../types';

import {describe, expect, it} from 'vitest';
import * as fc from 'fast-check';

import {TRACE_CONTEXT_HEADER, decode, encode, isSampled, isValidTraceContext} from './codec';

const hex = (length: number) =>
  fc
    .stringMatching(new RegExp(`^[0-9a-f]{${length}}$`))
    .filter(value => value !== '0'.repeat(length));

const traceContext: fc.Arbitrary<TraceContext> = fc.record({
  traceId: hex(32),
  spanId: hex(16),
  traceOptions: fc.integer({min: 0, max: 255}),
});

const sample: TraceContext = {
  traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
  spanId: '00f067aa0ba902b7',
  traceOptions: 1,
};

describe('context codec', () => {
  it('should use the lower-case traceparent header name', () => {
    expect(TRACE_CONTEXT_HEADER).toBe('traceparent');
  });

  describe('encode', () => {
    it('should render version, ids and two-digit flags', () => {
      expect(encode(sample)).toBe('00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01');
    });

    it('should pad flags and keep leading zeros of ids', () => {
      const ctx = {traceId: '0'.repeat(31) + '1', spanId: '0'.repeat(15) + 'a', traceOptions: 0};

      expect(encode(ctx)).toBe(`00-${'0'.repeat(31)}1-${'0'.repeat(15)}a-00`);
      expect(encode({...ctx, traceOptions: 255})).toBe(`00-${'0'.repeat(31)}1-${'0'.repeat(15)}a-ff`);
    });
  });

  describe('decode', () => {
    it('should parse a well-formed header', () => {
      expect(decode('00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01')).toEqual(sample);
    });

    it('should normalize upper-case hex', () => {
      expect(decode('00-4BF92F3577B34DA6A3CE929D0E0E4736-00F067AA0BA902B7-01')).toEqual(sample);
    });

    it('should accept a single-element header array', () => {
      expect(decode(['00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'])).toEqual(sample);
    });

    it('should reject repeated headers', () => {
      const value = '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01';
      expect(decode([value, value])).toBeUndefined();
      expect(decode([])).toBeUndefined();
    });

    it.each([
      ['absent', undefined],
      ['empty', ''],
      ['unknown version', '01-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'],
      ['zero trace id', `00-${'0'.repeat(32)}-00f067aa0ba902b7-01`],
      ['zero span id', `00-4bf92f3577b34da6a3ce929d0e0e4736-${'0'.repeat(16)}-01`],
      ['short trace id', '00-4bf92f3577b34da6a3ce929d0e0e473-00f067aa0ba902b7-01'],
      ['non-hex flags', '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-0g'],
      ['trailing data', '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01-extra'],
      ['surrounding spaces', ' 00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01 '],
      ['joined duplicates', '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01, 00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'],
    ])('should return undefined for %s header', (_, value) => {
      expect(decode(value)).toBeUndefined();
    });

    it('should restore every encoded context', () => {
      fc.assert(
        fc.property(traceContext, ctx => {
          expect(decode(encode(ctx))).toEqual(ctx);
        }),
      );
    });

    it('should never throw on arbitrary input', () => {
      fc.assert(
        fc.property(fc.string(), value => {
          const ctx = decode(value);
          return ctx === undefined || encode(ctx) === value.toLowerCase();
        }),
      );
    });
  });

  describe('isValidTraceContext', () => {
    it('should accept a decoded context', () => {
      expect(isValidTraceContext(sample)).toBe(true);
    });

    it('should reject out-of-range flags and wrong id widths', () => {
      expect(isValidTraceContext({...sample, traceOptions: 256})).toBe(false);
      expect(isValidTraceContext({...sample, traceOptions: -1})).toBe(false);
      expect(isValidTraceContext({...sample, spanId: 'abc'})).toBe(false);
      expect(isValidTraceContext({...sample, traceId: sample.traceId.toUpperCase()})).toBe(false);
    });
  });

  describe('isSampled', () => {
    it('should read the low flag bit', () => {
      expect(isSampled(sample)).toBe(true);
      expect(isSampled({...sample, traceOptions: 0})).toBe(false);
      expect(isSampled({...sample, traceOptions: 3})).toBe(true);
      expect(isSampled({...sample, traceOptions: 2})).toBe(false);
    });
  });
});
