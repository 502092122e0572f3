import { bytesToHex } from '@noble/hashes/utils';
import { describe, expect, it } from 'vitest';

import type { CborErrorCode } from './cbor-error.js';
import { CborEncoder, type CborSerializable, Tagged, encode } from './encoder.js';

const hex = (value: unknown, options?: Parameters<typeof encode>[1]): string =>
  bytesToHex(encode(value, options));

const expectCode = (fn: () => unknown, code: CborErrorCode): void => {
  expect(fn).toThrowError(expect.objectContaining({ name: 'CborError', code }));
};

describe('encode', () => {
  it('writes simple values and integers with the shortest head', () => {
    expect(hex(null)).toBe('f6');
    expect(hex(undefined)).toBe('f6');
    expect(hex(true)).toBe('f5');
    expect(hex(false)).toBe('f4');
    expect(hex(0)).toBe('00');
    expect(hex(23)).toBe('17');
    expect(hex(24)).toBe('1818');
    expect(hex(500)).toBe('1901f4');
    expect(hex(-1)).toBe('20');
    expect(hex(-500)).toBe('3901f3');
    expect(hex(2n ** 64n - 1n)).toBe('1bffffffffffffffff');
    expect(hex(-(2n ** 64n))).toBe('3bffffffffffffffff');
  });

  it('rejects integers a CBOR head cannot carry', () => {
    expectCode(() => encode(2n ** 64n), 'INTEGER_OUT_OF_RANGE');
    expectCode(() => encode(-(2n ** 64n) - 1n), 'INTEGER_OUT_OF_RANGE');
  });

  it('writes floats in the shortest exact width', () => {
    expect(hex(1.5)).toBe('f93e00');
    expect(hex(100000.5)).toBe('fa47c35040');
    expect(hex(0.1)).toBe('fb3fb999999999999a');
    expect(hex(Number.NaN)).toBe('f97e00');
    expect(hex(Number.POSITIVE_INFINITY)).toBe('f97c00');
    expect(hex(-0)).toBe('f98000');
    // integral numbers inside the safe range are integers, not floats
    expect(hex(1.0)).toBe('01');
  });

  it('keeps the sign of negative zero', () => {
    expect(hex(0)).toBe('00');
    expect(hex([-0, 0])).toBe('82f9800000');
    expect(hex({ z: -0 })).toBe('a1617af98000');
  });

  it('writes strings, byte strings, arrays and maps', () => {
    expect(hex('hello')).toBe('6568656c6c6f');
    expect(hex(Uint8Array.of(1, 2, 3))).toBe('43010203');
    expect(hex([1, [2, 3]])).toBe('8201820203');
    expect(hex({ b: 2, a: 1 })).toBe('a2616202616101');
    expect(hex({ a: 1, b: undefined })).toBe('a1616101');
    expect(hex(new Map([['x', true]]))).toBe('a16178f5');
    expect(hex([])).toBe('80');
    expect(hex({})).toBe('a0');
  });

  it('writes tags and self-describing values', () => {
    const link: CborSerializable = {
      encodeCbor: (encoder) => encoder.writeTaggedBytes(42, Uint8Array.of(1)),
    };
    expect(hex(new Tagged(1, 0))).toBe('c100');
    expect(hex(link)).toBe('d82a4101');
    expect(hex({ l: link })).toBe('a1616cd82a4101');
  });

  it('rejects values with no CBOR form', () => {
    expectCode(() => encode(Symbol('x')), 'UNSUPPORTED_TYPE');
    expectCode(() => encode(() => 1), 'UNSUPPORTED_TYPE');
    expectCode(() => encode(new Date(0)), 'UNSUPPORTED_TYPE');
    expectCode(() => encode(new Map([[1, 2]])), 'UNSUPPORTED_TYPE');
    expectCode(() => encode('a\uD800'), 'INVALID_STRING');
  });

  it('enforces depth and size limits', () => {
    expectCode(() => encode([[]], { limits: { maxDepth: 1 } }), 'DEPTH_EXCEEDED');
    expect(hex([[]], { limits: { maxDepth: 2 } })).toBe('8180');
    expectCode(
      () => encode(new Tagged(1, new Tagged(2, 0)), { limits: { maxDepth: 1 } }),
      'DEPTH_EXCEEDED',
    );
    expectCode(
      () => encode('abcd', { limits: { maxEncodedBytes: 3 } }),
      'ENCODED_TOO_LARGE',
    );
  });

  it('grows its buffer past the initial capacity', () => {
    const encoded = encode('x'.repeat(1000));
    expect(encoded.length).toBe(1003);
    expect(bytesToHex(encoded.subarray(0, 4))).toBe('7903e878');
  });
});

describe('CborEncoder', () => {
  it('composes headers by hand', () => {
    const encoder = new CborEncoder();
    encoder.writeMapHeader(1);
    encoder.writeString('n');
    encoder.writeArrayHeader(2);
    encoder.writeInteger(-2n);
    encoder.writeFloat(0.5);
    expect(bytesToHex(encoder.finish())).toBe('a1616e8221f93800');
  });

  it('rejects negative tags and non-safe integer numbers', () => {
    const encoder = new CborEncoder();
    expectCode(() => encoder.writeTag(-1), 'INTEGER_OUT_OF_RANGE');
    expectCode(() => encoder.writeInteger(2 ** 60), 'INTEGER_OUT_OF_RANGE');
  });
});
