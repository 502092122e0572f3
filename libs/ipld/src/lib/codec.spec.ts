import { CborEncoder, decodeAs } from '@ipld-lite/cbor';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { decodeIpld, encodeIpld, ipldDecoder, taggedIpldDecoder, writeIpld } from './codec.js';
import { Ipld, ipldEquals } from './ipld.js';
import type { IpldErrorCode } from './ipld-error.js';

const hex = (bytes: Uint8Array): string => bytesToHex(bytes);
const decodeHex = (value: string): Ipld => decodeIpld(hexToBytes(value));

const expectIpldCode = (fn: () => unknown, code: IpldErrorCode): void => {
  expect(fn).toThrowError(expect.objectContaining({ name: 'IpldError', code }));
};

describe('decodeIpld', () => {
  it('keeps 64-bit integers exact', () => {
    expect(decodeHex('1bffffffffffffffff')).toEqual(Ipld.integer(2n ** 64n - 1n));
    expect(decodeHex('3b7fffffffffffffff')).toEqual(Ipld.integer(-(2n ** 63n)));
    expect(decodeHex('3bffffffffffffffff')).toEqual(Ipld.integer(-(2n ** 64n)));
  });

  it('reads scalars', () => {
    expect(decodeHex('f6')).toEqual(Ipld.null());
    expect(decodeHex('f5')).toEqual(Ipld.bool(true));
    expect(decodeHex('f93c00')).toEqual(Ipld.float(1));
    const zero = decodeHex('f98000');
    expect(zero.kind === 'float' && Object.is(zero.value, -0)).toBe(true);
    expect(decodeHex('6161')).toEqual(Ipld.string('a'));
    expect(decodeHex('420102')).toEqual(Ipld.bytes([1, 2]));
  });

  it('copies byte strings out of the input', () => {
    const input = hexToBytes('420102');
    const decoded = decodeIpld(input);
    expect(decoded.kind).toBe('bytes');
    if (decoded.kind === 'bytes') {
      expect(decoded.value.buffer).not.toBe(input.buffer);
    }
  });

  it('turns tag 42 over bytes into a link', () => {
    expect(decodeHex('d82a43070809')).toEqual(Ipld.link([7, 8, 9]));
    expect(decodeHex('82d82a41014102')).toEqual(
      Ipld.list([Ipld.link([1]), Ipld.bytes([2])]),
    );
  });

  it('rejects any other tag', () => {
    expect(() => decodeHex('c743070809')).toThrowError(
      expect.objectContaining({
        name: 'IpldError',
        code: 'UNEXPECTED_TAG',
        message: 'unexpected tag (7)',
        tag: 7n,
      }),
    );
    // tag 7 nested under tag 42
    expect(() => decodeHex('d82ac74101')).toThrowError('unexpected tag (7)');
  });

  it('requires tag 42 to wrap a byte string', () => {
    expectIpldCode(() => decodeHex('d82a01'), 'BYTES_EXPECTED');
    expectIpldCode(() => decodeHex('d82a6161'), 'BYTES_EXPECTED');
    expectIpldCode(() => decodeHex('d82ad82a4101'), 'BYTES_EXPECTED');
    expect(() => decodeHex('d82a01')).toThrowError('bytes expected');
  });

  it('passes on errors from inside a tagged payload', () => {
    expect(() => decodeHex('d82a430708')).toThrowError(
      expect.objectContaining({ name: 'CborError', code: 'TRUNCATED' }),
    );
  });

  it('sorts map keys and keeps the last duplicate', () => {
    const map = decodeHex('a3616202616101616303');
    expect(map.kind).toBe('map');
    if (map.kind === 'map') {
      expect(Array.from(map.value.keys())).toEqual(['a', 'b', 'c']);
    }
    expect(decodeHex('a2616101616102')).toEqual(Ipld.map([['a', Ipld.integer(2)]]));
  });

  it('requires text map keys', () => {
    expect(() => decodeHex('a10102')).toThrowError(
      'invalid type: integer `1`, expected a string',
    );
  });

  it('stops at the depth limit', () => {
    const nested = '81'.repeat(200) + '80';
    expect(() => decodeHex(nested)).toThrowError(
      expect.objectContaining({ name: 'CborError', code: 'DEPTH_EXCEEDED' }),
    );
    expect(decodeIpld(hexToBytes('8180'), { limits: { maxDepth: 2 } })).toEqual(
      Ipld.list([Ipld.list([])]),
    );
  });
});

describe('taggedIpldDecoder', () => {
  it('requires a tag', () => {
    expectIpldCode(() => decodeAs(hexToBytes('4101'), taggedIpldDecoder), 'TAG_EXPECTED');
    expect(() => decodeAs(hexToBytes('4101'), taggedIpldDecoder)).toThrowError(
      'tag expected',
    );
    expect(decodeAs(hexToBytes('d82a4101'), taggedIpldDecoder)).toEqual(Ipld.link([1]));
  });

  it('rejects tags other than 42', () => {
    expectIpldCode(() => decodeAs(hexToBytes('c14101'), taggedIpldDecoder), 'UNEXPECTED_TAG');
  });
});

describe('encodeIpld', () => {
  it('writes empty containers', () => {
    expect(hex(encodeIpld(decodeHex('80')))).toBe('80');
    expect(hex(encodeIpld(decodeHex('a0')))).toBe('a0');
  });

  it('writes links under tag 42 and maps in key order', () => {
    const contact = Ipld.map([
      ['name', Ipld.string('Hello World!')],
      ['details', Ipld.link([7, 8, 9])],
    ]);
    expect(hex(encodeIpld(contact))).toBe(
      'a267' + '64657461696c73' + 'd82a43070809' + '646e616d65' + '6c48656c6c6f20576f726c6421',
    );
  });

  it('keeps floats apart from integers', () => {
    expect(hex(encodeIpld(Ipld.float(1)))).toBe('f93c00');
    expect(hex(encodeIpld(Ipld.integer(1)))).toBe('01');
    expect(hex(encodeIpld(Ipld.float(0.1)))).toBe('fb3fb999999999999a');
  });

  it('rejects integers beyond the CBOR head range', () => {
    expect(() => encodeIpld(Ipld.integer(2n ** 64n))).toThrowError(
      expect.objectContaining({ name: 'CborError', code: 'INTEGER_OUT_OF_RANGE' }),
    );
  });

  it('writes through a shared encoder', () => {
    const encoder = new CborEncoder();
    encoder.writeArrayHeader(2);
    writeIpld(encoder, Ipld.null());
    writeIpld(encoder, Ipld.link([1]));
    expect(hex(encoder.finish())).toBe('82f6d82a4101');
    expect(decodeAs(encoder.finish(), ipldDecoder)).toEqual(
      Ipld.list([Ipld.null(), Ipld.link([1])]),
    );
  });
});

describe('round trip', () => {
  it('decodes what it encodes', () => {
    const bytesArb = fc.uint8Array({ maxLength: 8 });
    const keyArb = fc
      .array(fc.integer({ min: 0x20, max: 0x7e }), { maxLength: 8 })
      .map((codes) => String.fromCharCode(...codes));

    const leaf: fc.Arbitrary<Ipld> = fc.oneof(
      fc.constant(Ipld.null()),
      fc.boolean().map((value) => Ipld.bool(value)),
      fc.bigInt({ min: -(2n ** 64n), max: 2n ** 64n - 1n }).map((value) => Ipld.integer(value)),
      fc.double().map((value) => Ipld.float(value)),
      keyArb.map((value) => Ipld.string(value)),
      bytesArb.map((value) => Ipld.bytes(value)),
      bytesArb.map((value) => Ipld.link(value)),
    );

    const ipldMemo = (depth: number): fc.Arbitrary<Ipld> =>
      depth <= 0
        ? leaf
        : fc.oneof(
            leaf,
            fc.array(ipldMemo(depth - 1), { maxLength: 4 }).map((items) => Ipld.list(items)),
            fc
              .array(fc.tuple(keyArb, ipldMemo(depth - 1)), { maxLength: 4 })
              .map((entries) => Ipld.map(entries)),
          );

    fc.assert(
      fc.property(ipldMemo(3), (value) => {
        const encoded = encodeIpld(value);
        const decoded = decodeIpld(encoded);
        expect(ipldEquals(decoded, value)).toBe(true);
        expect(hex(encodeIpld(decoded))).toBe(hex(encoded));
      }),
      { numRuns: 150 },
    );
  });
});
