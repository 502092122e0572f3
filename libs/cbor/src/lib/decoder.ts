import { CborError, cborError } from './cbor-error.js';
import {
  CBOR_BREAK,
  CBOR_INDEFINITE,
  CBOR_MAJOR_ARRAY,
  CBOR_MAJOR_BYTES,
  CBOR_MAJOR_MAP,
  CBOR_MAJOR_NINT,
  CBOR_MAJOR_SIMPLE,
  CBOR_MAJOR_TAG,
  CBOR_MAJOR_TEXT,
  CBOR_MAJOR_UINT,
  INT64_MIN,
} from './constants.js';
import { halfToFloat } from './float16.js';
import { type CborLimits, type CborOptions, normalizeLimits } from './limits.js';
import type {
  Deserializer,
  MapAccess,
  Seed,
  SeqAccess,
  TaggedValue,
  Visitor,
} from './visitor.js';

const textDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export type CborInput = ArrayBufferView | ArrayBuffer | Uint8Array;

/**
 * Runs `seed` over exactly one CBOR item spanning the whole input.
 */
export function decodeWith<T>(
  input: CborInput,
  seed: Seed<T>,
  options?: CborOptions,
): T {
  const limits = normalizeLimits(options?.limits);
  const bytes =
    input instanceof Uint8Array
      ? input
      : input instanceof ArrayBuffer
        ? new Uint8Array(input)
        : new Uint8Array(input.buffer, input.byteOffset, input.byteLength);

  if (bytes.length > limits.maxEncodedBytes) {
    throw cborError(
      'ENCODED_TOO_LARGE',
      `encoded CBOR exceeds maxEncodedBytes (${bytes.length} > ${limits.maxEncodedBytes})`,
    );
  }

  const reader = new CborReader(bytes);
  const value = seed(new CborDeserializer(reader, limits, 0));

  if (!reader.isEOF()) {
    throw cborError('TRAILING_BYTES', 'unexpected trailing bytes after CBOR item');
  }

  return value;
}

/** Accepts and discards any single item. */
export const ignoredAny: Visitor<undefined> = {
  expecting: 'any value',
  visitNull: () => undefined,
  visitBool: () => undefined,
  visitUnsigned: () => undefined,
  visitSigned: () => undefined,
  visitBigSigned: () => undefined,
  visitFloat: () => undefined,
  visitString: () => undefined,
  visitBytes: () => undefined,
  visitSeq(seq) {
    while (seq.hasNext()) {
      seq.next(skipItem);
    }
    return undefined;
  },
  visitMap(map) {
    while (map.hasNext()) {
      map.nextKey(skipItem);
      map.nextValue(skipItem);
    }
    return undefined;
  },
  visitTagged(payload) {
    return skipItem(payload);
  },
};

function skipItem(de: Deserializer): undefined {
  return de.deserializeAny(ignoredAny);
}

class CborReader {
  private offset: number;

  constructor(
    private readonly bytes: Uint8Array,
    offset = 0,
  ) {
    this.offset = offset;
  }

  readByte(): number {
    const value = this.peekByte();
    this.offset += 1;
    return value;
  }

  peekByte(): number {
    if (this.offset >= this.bytes.length) {
      throw cborError('TRUNCATED', 'unexpected end of buffer');
    }
    return this.bytes[this.offset];
  }

  readUint16(): number {
    return this.take(2).getUint16(0, false);
  }

  readUint32(): number {
    return this.take(4).getUint32(0, false);
  }

  readUint64(): bigint {
    return this.take(8).getBigUint64(0, false);
  }

  readFloat32(): number {
    return this.take(4).getFloat32(0, false);
  }

  readFloat64(): number {
    return this.take(8).getFloat64(0, false);
  }

  /** Returns a view into the input, not a copy. */
  readSlice(length: number): Uint8Array {
    this.ensure(length);
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  fork(): CborReader {
    return new CborReader(this.bytes, this.offset);
  }

  position(): number {
    return this.offset;
  }

  isEOF(): boolean {
    return this.offset === this.bytes.length;
  }

  private take(width: number): DataView {
    this.ensure(width);
    const view = new DataView(
      this.bytes.buffer,
      this.bytes.byteOffset + this.offset,
      width,
    );
    this.offset += width;
    return view;
  }

  private ensure(length: number): void {
    if (length > this.bytes.length - this.offset) {
      throw cborError('TRUNCATED', 'unexpected end of buffer');
    }
  }
}

class CborDeserializer implements Deserializer {
  constructor(
    private readonly reader: CborReader,
    private readonly limits: CborLimits,
    private readonly depth: number,
  ) {}

  deserializeAny<T>(visitor: Visitor<T>): T {
    const initial = this.reader.readByte();
    const major = initial >> 5;
    const additional = initial & 0x1f;

    switch (major) {
      case CBOR_MAJOR_UINT: {
        const value = this.readDefinite(additional, 'integers');
        if (!visitor.visitUnsigned) {
          throw invalidType(`integer \`${value}\``, visitor);
        }
        return visitor.visitUnsigned(value);
      }
      case CBOR_MAJOR_NINT:
        return this.visitNegative(additional, visitor);
      case CBOR_MAJOR_BYTES: {
        const bytes = this.readStringBytes(CBOR_MAJOR_BYTES, additional);
        if (!visitor.visitBytes) {
          throw invalidType('byte string', visitor);
        }
        return visitor.visitBytes(bytes);
      }
      case CBOR_MAJOR_TEXT: {
        const text = decodeUtf8(this.readStringBytes(CBOR_MAJOR_TEXT, additional));
        if (!visitor.visitString) {
          throw invalidType(`string ${JSON.stringify(text)}`, visitor);
        }
        return visitor.visitString(text);
      }
      case CBOR_MAJOR_ARRAY:
        return this.visitArray(additional, visitor);
      case CBOR_MAJOR_MAP:
        return this.visitMap(additional, visitor);
      case CBOR_MAJOR_TAG:
        return this.visitTag(additional, visitor);
      case CBOR_MAJOR_SIMPLE:
        return this.visitSimple(additional, visitor);
      default:
        throw cborError('UNSUPPORTED_CBOR', `unsupported CBOR major type ${major}`);
    }
  }

  deserializeNewtype<T>(visitor: Visitor<T>): T {
    const initial = this.reader.peekByte();
    if (initial >> 5 === CBOR_MAJOR_TAG) {
      this.reader.readByte();
      return this.visitTag(initial & 0x1f, visitor);
    }
    if (!visitor.visitTagged) {
      throw invalidType('untagged value', visitor);
    }
    return visitor.visitTagged(this, undefined);
  }

  deserializeTagged<T>(seed: Seed<T>): TaggedValue<T> {
    const initial = this.reader.peekByte();
    if (initial >> 5 !== CBOR_MAJOR_TAG) {
      return { tag: undefined, value: seed(this) };
    }
    this.reader.readByte();
    const tag = this.readDefinite(initial & 0x1f, 'tags');
    return { tag, value: seed(this.child()) };
  }

  deserializeOption<T>(seed: Seed<T>): T | null {
    const initial = this.reader.peekByte();
    if (initial === 0xf6 || initial === 0xf7) {
      this.reader.readByte();
      return null;
    }
    return seed(this);
  }

  fork(): CborDeserializer {
    return new CborDeserializer(this.reader.fork(), this.limits, this.depth);
  }

  private child(): CborDeserializer {
    const nextDepth = this.depth + 1;
    if (nextDepth > this.limits.maxDepth) {
      throw cborError('DEPTH_EXCEEDED', `maxDepth ${this.limits.maxDepth} exceeded`);
    }
    return new CborDeserializer(this.reader, this.limits, nextDepth);
  }

  private visitNegative<T>(additional: number, visitor: Visitor<T>): T {
    const value = -1n - this.readDefinite(additional, 'integers');
    if (value >= INT64_MIN) {
      if (!visitor.visitSigned) {
        throw invalidType(`integer \`${value}\``, visitor);
      }
      return visitor.visitSigned(value);
    }
    if (!visitor.visitBigSigned) {
      throw invalidType(`integer \`${value}\``, visitor);
    }
    return visitor.visitBigSigned(value);
  }

  private visitArray<T>(additional: number, visitor: Visitor<T>): T {
    const length = this.readArgument(additional);
    if (!visitor.visitSeq) {
      throw invalidType('sequence', visitor);
    }
    const seq = new CborSeqAccess(
      this.reader,
      this.child(),
      length === undefined ? undefined : toLength(length),
    );
    const value = visitor.visitSeq(seq);
    seq.finish();
    return value;
  }

  private visitMap<T>(additional: number, visitor: Visitor<T>): T {
    const length = this.readArgument(additional);
    if (!visitor.visitMap) {
      throw invalidType('map', visitor);
    }
    const map = new CborMapAccess(
      this.reader,
      this.child(),
      length === undefined ? undefined : toLength(length),
    );
    const value = visitor.visitMap(map);
    map.finish();
    return value;
  }

  private visitTag<T>(additional: number, visitor: Visitor<T>): T {
    const tag = this.readDefinite(additional, 'tags');
    if (!visitor.visitTagged) {
      throw invalidType(`tagged value (tag ${tag})`, visitor);
    }
    const payload = this.child();
    const start = this.reader.position();
    const value = visitor.visitTagged(payload, tag);
    if (this.reader.position() === start) {
      throw cborError('INVALID_LENGTH', `payload of tag ${tag} was not read`);
    }
    return value;
  }

  private visitSimple<T>(additional: number, visitor: Visitor<T>): T {
    switch (additional) {
      case 20:
      case 21: {
        const value = additional === 21;
        if (!visitor.visitBool) {
          throw invalidType(`boolean \`${value}\``, visitor);
        }
        return visitor.visitBool(value);
      }
      case 22:
      case 23:
        if (!visitor.visitNull) {
          throw invalidType('null', visitor);
        }
        return visitor.visitNull();
      case 25:
        return this.visitFloat(halfToFloat(this.reader.readUint16()), visitor);
      case 26:
        return this.visitFloat(this.reader.readFloat32(), visitor);
      case 27:
        return this.visitFloat(this.reader.readFloat64(), visitor);
      case CBOR_INDEFINITE:
        throw cborError('UNSUPPORTED_CBOR', 'unexpected break outside an indefinite-length item');
      default:
        throw cborError('UNSUPPORTED_CBOR', `unsupported simple value ${additional}`);
    }
  }

  private visitFloat<T>(value: number, visitor: Visitor<T>): T {
    if (!visitor.visitFloat) {
      throw invalidType(`floating point \`${value}\``, visitor);
    }
    return visitor.visitFloat(value);
  }

  private readStringBytes(major: number, additional: number): Uint8Array {
    if (additional !== CBOR_INDEFINITE) {
      return this.reader.readSlice(toLength(this.readDefinite(additional, 'strings')));
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const initial = this.reader.readByte();
      if (initial === CBOR_BREAK) {
        break;
      }
      if (initial >> 5 !== major) {
        throw cborError(
          'UNSUPPORTED_CBOR',
          'indefinite-length string chunk has a different major type',
        );
      }
      const chunk = this.reader.readSlice(
        toLength(this.readDefinite(initial & 0x1f, 'string chunks')),
      );
      chunks.push(chunk);
      total += chunk.length;
    }

    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  private readDefinite(additional: number, what: string): bigint {
    const value = this.readArgument(additional);
    if (value === undefined) {
      throw cborError('UNSUPPORTED_CBOR', `indefinite length is not allowed for ${what}`);
    }
    return value;
  }

  /** Returns `undefined` for an indefinite length. */
  private readArgument(additional: number): bigint | undefined {
    if (additional <= 23) {
      return BigInt(additional);
    }
    if (additional === 24) {
      return BigInt(this.reader.readByte());
    }
    if (additional === 25) {
      return BigInt(this.reader.readUint16());
    }
    if (additional === 26) {
      return BigInt(this.reader.readUint32());
    }
    if (additional === 27) {
      return this.reader.readUint64();
    }
    if (additional === CBOR_INDEFINITE) {
      return undefined;
    }
    throw cborError('UNSUPPORTED_CBOR', `unsupported additional info ${additional}`);
  }
}

class CborSeqAccess implements SeqAccess {
  private finished = false;

  constructor(
    private readonly reader: CborReader,
    private readonly element: CborDeserializer,
    private remaining: number | undefined,
  ) {}

  hasNext(): boolean {
    if (this.finished) {
      return false;
    }
    if (this.remaining === undefined) {
      if (this.reader.peekByte() !== CBOR_BREAK) {
        return true;
      }
      this.reader.readByte();
    } else if (this.remaining > 0) {
      return true;
    }
    this.finished = true;
    return false;
  }

  next<T>(seed: Seed<T>): T {
    if (!this.hasNext()) {
      throw cborError('INVALID_LENGTH', 'sequence has no more elements');
    }
    if (this.remaining !== undefined) {
      this.remaining -= 1;
    }
    return seed(this.element);
  }

  finish(): void {
    if (this.hasNext()) {
      throw cborError('INVALID_LENGTH', 'sequence has unread elements');
    }
  }
}

class CborMapAccess implements MapAccess {
  private finished = false;
  private pendingValue = false;

  constructor(
    private readonly reader: CborReader,
    private readonly entry: CborDeserializer,
    private remaining: number | undefined,
  ) {}

  hasNext(): boolean {
    if (this.pendingValue) {
      return true;
    }
    if (this.finished) {
      return false;
    }
    if (this.remaining === undefined) {
      if (this.reader.peekByte() !== CBOR_BREAK) {
        return true;
      }
      this.reader.readByte();
    } else if (this.remaining > 0) {
      return true;
    }
    this.finished = true;
    return false;
  }

  nextKey<T>(seed: Seed<T>): T {
    if (this.pendingValue) {
      throw cborError('INVALID_LENGTH', 'map value was not read before the next key');
    }
    if (!this.hasNext()) {
      throw cborError('INVALID_LENGTH', 'map has no more entries');
    }
    if (this.remaining !== undefined) {
      this.remaining -= 1;
    }
    this.pendingValue = true;
    return seed(this.entry);
  }

  nextValue<T>(seed: Seed<T>): T {
    this.takePendingValue();
    return seed(this.entry);
  }

  deferValue(): Deserializer {
    this.takePendingValue();
    const deferred = this.entry.fork();
    skipItem(this.entry);
    return deferred;
  }

  finish(): void {
    if (this.hasNext()) {
      throw cborError('INVALID_LENGTH', 'map has unread entries');
    }
  }

  private takePendingValue(): void {
    if (!this.pendingValue) {
      throw cborError('INVALID_LENGTH', 'map key must be read before its value');
    }
    this.pendingValue = false;
  }
}

function toLength(value: bigint): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw cborError('INVALID_LENGTH', 'length exceeds supported range');
  }
  return Number(value);
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (error) {
    throw new CborError('INVALID_UTF8', 'invalid UTF-8 in text string', {
      cause: error,
    });
  }
}

function invalidType(unexpected: string, visitor: Visitor<unknown>): CborError {
  return cborError(
    'INVALID_TYPE',
    `invalid type: ${unexpected}, expected ${visitor.expecting}`,
  );
}
