import { cborError } from './cbor-error.js';
import {
  CBOR_MAJOR_ARRAY,
  CBOR_MAJOR_BYTES,
  CBOR_MAJOR_MAP,
  CBOR_MAJOR_NINT,
  CBOR_MAJOR_TAG,
  CBOR_MAJOR_TEXT,
  CBOR_MAJOR_UINT,
  NINT64_MIN,
  UINT64_MAX,
} from './constants.js';
import { floatToHalf } from './float16.js';
import { type CborLimits, type CborOptions, normalizeLimits } from './limits.js';

const textEncoder = new TextEncoder();

/** A value that writes its own CBOR form. */
export interface CborSerializable {
  encodeCbor(encoder: CborEncoder): void;
}

/** Wraps `value` in a CBOR tag when passed to {@link encode}. */
export class Tagged {
  constructor(
    public readonly tag: bigint | number,
    public readonly value: unknown,
  ) {}
}

/**
 * Encodes a JS value:
 * - `null` and `undefined` as null
 * - safe integers and bigints as integers, other numbers as floats
 * - `Uint8Array` as a byte string
 * - arrays, `Map`s with string keys and plain objects (insertion order,
 *   `undefined` members left out)
 * - {@link Tagged} and {@link CborSerializable} values as they describe
 */
export function encode(value: unknown, options?: CborOptions): Uint8Array {
  const encoder = new CborEncoder(options);
  encodeValue(value, encoder);
  return encoder.finish();
}

export function encodeValue(value: unknown, encoder: CborEncoder): void {
  if (value === null || value === undefined) {
    encoder.writeNull();
    return;
  }

  switch (typeof value) {
    case 'boolean':
      encoder.writeBool(value);
      return;
    case 'number':
      // -0 is a safe integer but only a float keeps its sign
      if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
        encoder.writeInteger(value);
      } else {
        encoder.writeFloat(value);
      }
      return;
    case 'bigint':
      encoder.writeInteger(value);
      return;
    case 'string':
      encoder.writeString(value);
      return;
    case 'object':
      break;
    default:
      throw cborError('UNSUPPORTED_TYPE', `unsupported CBOR type: ${typeof value}`);
  }

  if (value instanceof Uint8Array) {
    encoder.writeBytes(value);
    return;
  }

  if (value instanceof Tagged) {
    encoder.enter();
    encoder.writeTag(value.tag);
    encodeValue(value.value, encoder);
    encoder.leave();
    return;
  }

  if (isSerializable(value)) {
    value.encodeCbor(encoder);
    return;
  }

  if (Array.isArray(value)) {
    encoder.enter();
    encoder.writeArrayHeader(value.length);
    for (const element of value) {
      encodeValue(element, encoder);
    }
    encoder.leave();
    return;
  }

  if (value instanceof Map) {
    encoder.enter();
    encoder.writeMapHeader(value.size);
    for (const [key, entry] of value) {
      if (typeof key !== 'string') {
        throw cborError('UNSUPPORTED_TYPE', `map keys must be strings, got ${typeof key}`);
      }
      encoder.writeString(key);
      encodeValue(entry, encoder);
    }
    encoder.leave();
    return;
  }

  if (isPlainObject(value)) {
    const entries = Object.entries(value).filter(([, entry]) => entry !== undefined);
    encoder.enter();
    encoder.writeMapHeader(entries.length);
    for (const [key, entry] of entries) {
      encoder.writeString(key);
      encodeValue(entry, encoder);
    }
    encoder.leave();
    return;
  }

  throw cborError(
    'UNSUPPORTED_TYPE',
    `unsupported CBOR type: ${value.constructor?.name ?? 'object'}`,
  );
}

export class CborEncoder {
  private readonly limits: CborLimits;
  private buffer = new Uint8Array(256);
  private offset = 0;
  private depth = 0;

  constructor(options?: CborOptions) {
    this.limits = normalizeLimits(options?.limits);
  }

  writeNull(): void {
    this.pushByte(0xf6);
  }

  writeBool(value: boolean): void {
    this.pushByte(value ? 0xf5 : 0xf4);
  }

  /** Accepts -2^64 ..= 2^64 - 1; numbers must be safe integers. */
  writeInteger(value: number | bigint): void {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw cborError('INTEGER_OUT_OF_RANGE', `integer is not a safe integer: ${value}`);
    }
    const integer = BigInt(value);
    if (integer > UINT64_MAX || integer < NINT64_MIN) {
      throw cborError(
        'INTEGER_OUT_OF_RANGE',
        `integer does not fit in a CBOR head (${integer})`,
      );
    }
    if (integer >= 0n) {
      this.writeHead(CBOR_MAJOR_UINT, integer);
    } else {
      this.writeHead(CBOR_MAJOR_NINT, -1n - integer);
    }
  }

  /** Writes the shortest of half, single or double precision that keeps `value` exact. */
  writeFloat(value: number): void {
    const half = floatToHalf(value);
    if (half !== undefined) {
      this.pushByte(0xf9);
      this.view(2).setUint16(0, half, false);
      return;
    }
    if (Math.fround(value) === value) {
      this.pushByte(0xfa);
      this.view(4).setFloat32(0, value, false);
      return;
    }
    this.pushByte(0xfb);
    this.view(8).setFloat64(0, value, false);
  }

  writeString(value: string): void {
    if (!isWellFormedString(value)) {
      throw cborError('INVALID_STRING', 'string contains lone surrogate code points');
    }
    const bytes = textEncoder.encode(value);
    this.writeHead(CBOR_MAJOR_TEXT, bytes.length);
    this.pushBytes(bytes);
  }

  writeBytes(value: Uint8Array): void {
    this.writeHead(CBOR_MAJOR_BYTES, value.length);
    this.pushBytes(value);
  }

  writeArrayHeader(length: number): void {
    this.writeHead(CBOR_MAJOR_ARRAY, length);
  }

  writeMapHeader(length: number): void {
    this.writeHead(CBOR_MAJOR_MAP, length);
  }

  writeTag(tag: bigint | number): void {
    const value = typeof tag === 'bigint' ? tag : BigInt(tag);
    if (value < 0n || value > UINT64_MAX) {
      throw cborError('INTEGER_OUT_OF_RANGE', `tag number out of range (${value})`);
    }
    this.writeHead(CBOR_MAJOR_TAG, value);
  }

  /** Writes `tag` followed by a byte string, as one nested item. */
  writeTaggedBytes(tag: bigint | number, bytes: Uint8Array): void {
    this.enter();
    this.writeTag(tag);
    this.writeBytes(bytes);
    this.leave();
  }

  /** Accounts for one level of nesting; pair with {@link leave}. */
  enter(): void {
    if (this.depth + 1 > this.limits.maxDepth) {
      throw cborError('DEPTH_EXCEEDED', `maxDepth ${this.limits.maxDepth} exceeded`);
    }
    this.depth += 1;
  }

  leave(): void {
    this.depth -= 1;
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  private writeHead(major: number, length: number | bigint): void {
    if (typeof length === 'number' && (!Number.isInteger(length) || length < 0)) {
      throw cborError('INVALID_LENGTH', `length must be a non-negative integer: ${length}`);
    }

    const value = typeof length === 'bigint' ? length : BigInt(length);

    if (value <= 23n) {
      this.pushByte((major << 5) | Number(value));
    } else if (value <= 0xffn) {
      this.pushByte((major << 5) | 24);
      this.pushByte(Number(value));
    } else if (value <= 0xffffn) {
      this.pushByte((major << 5) | 25);
      this.view(2).setUint16(0, Number(value), false);
    } else if (value <= 0xffffffffn) {
      this.pushByte((major << 5) | 26);
      this.view(4).setUint32(0, Number(value), false);
    } else {
      this.pushByte((major << 5) | 27);
      this.view(8).setBigUint64(0, value, false);
    }
  }

  private pushByte(byte: number): void {
    this.ensure(1);
    this.buffer[this.offset] = byte & 0xff;
    this.offset += 1;
  }

  private pushBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /** Reserves `width` bytes and returns a view over them. */
  private view(width: number): DataView {
    this.ensure(width);
    const view = new DataView(this.buffer.buffer, this.offset, width);
    this.offset += width;
    return view;
  }

  private ensure(additional: number): void {
    const required = this.offset + additional;
    if (required > this.limits.maxEncodedBytes) {
      throw cborError(
        'ENCODED_TOO_LARGE',
        `encoded CBOR exceeds maxEncodedBytes (${required} > ${this.limits.maxEncodedBytes})`,
      );
    }
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.offset));
    this.buffer = next;
  }
}

function isSerializable(value: object): value is CborSerializable {
  return 'encodeCbor' in value && typeof value.encodeCbor === 'function';
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isWellFormedString(value: string): boolean {
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff) {
      if (i + 1 >= value.length) {
        return false;
      }
      const next = value.charCodeAt(i + 1);
      if (next < 0xdc00 || next > 0xdfff) {
        return false;
      }
      i += 1;
    } else if (code >= 0xdc00 && code <= 0xdfff) {
      return false;
    }
  }
  return true;
}
