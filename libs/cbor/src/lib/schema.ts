import { cborError } from './cbor-error.js';
import { type CborInput, decodeWith } from './decoder.js';
import type { CborOptions } from './limits.js';
import type { Deserializer, Visitor } from './visitor.js';

/** Decodes one item into a typed value. */
export interface Decoder<T> {
  readonly expecting: string;
  decode(de: Deserializer): T;
}

export function decodeAs<T>(
  input: CborInput,
  decoder: Decoder<T>,
  options?: CborOptions,
): T {
  return decodeWith(input, (de) => decoder.decode(de), options);
}

export function fromVisitor<T>(visitor: Visitor<T>): Decoder<T> {
  return {
    expecting: visitor.expecting,
    decode: (de) => de.deserializeAny(visitor),
  };
}

export const bool: Decoder<boolean> = fromVisitor({
  expecting: 'a boolean',
  visitBool: (value) => value,
});

export const integer: Decoder<bigint> = fromVisitor({
  expecting: 'an integer',
  visitUnsigned: (value) => value,
  visitSigned: (value) => value,
  visitBigSigned: (value) => value,
});

export const safeInteger: Decoder<number> = {
  expecting: 'a safe integer',
  decode(de) {
    const value = integer.decode(de);
    if (
      value > BigInt(Number.MAX_SAFE_INTEGER) ||
      value < BigInt(Number.MIN_SAFE_INTEGER)
    ) {
      throw cborError(
        'INTEGER_OUT_OF_RANGE',
        `integer is outside safe range (${value})`,
      );
    }
    return Number(value);
  },
};

/** Integers are accepted and converted, as a float field would take them. */
export const float: Decoder<number> = fromVisitor({
  expecting: 'a float',
  visitFloat: (value) => value,
  visitUnsigned: (value) => Number(value),
  visitSigned: (value) => Number(value),
  visitBigSigned: (value) => Number(value),
});

export const text: Decoder<string> = fromVisitor({
  expecting: 'a string',
  visitString: (value) => value,
});

export const bytes: Decoder<Uint8Array> = fromVisitor({
  expecting: 'a byte string',
  visitBytes: (value) => value.slice(),
});

export function nullable<T>(inner: Decoder<T>): Decoder<T | null> {
  return {
    expecting: `${inner.expecting} or null`,
    decode: (de) => de.deserializeOption((payload) => inner.decode(payload)),
  };
}

export function array<T>(element: Decoder<T>): Decoder<T[]> {
  return fromVisitor<T[]>({
    expecting: `a sequence of ${element.expecting}`,
    visitSeq(seq) {
      const out: T[] = [];
      while (seq.hasNext()) {
        out.push(seq.next((de) => element.decode(de)));
      }
      return out;
    },
  });
}

/** A string-keyed map; later duplicates overwrite earlier ones. */
export function record<T>(value: Decoder<T>): Decoder<Record<string, T>> {
  return fromVisitor<Record<string, T>>({
    expecting: `a map of ${value.expecting}`,
    visitMap(map) {
      const out: Record<string, T> = Object.create(null);
      while (map.hasNext()) {
        const key = map.nextKey((de) => text.decode(de));
        out[key] = map.nextValue((de) => value.decode(de));
      }
      return out;
    },
  });
}

/** Field lookup handed to a {@link struct} builder. */
export interface StructFields {
  required<T>(key: string, decoder: Decoder<T>): T;
  optional<T>(key: string, decoder: Decoder<T>): T | undefined;
}

/**
 * Decodes a map into a record built by `build`.
 *
 * Fields are decoded when `build` asks for them; keys it never asks for are
 * skipped. A key appearing twice is a `DUPLICATE_FIELD` error, a required
 * key that is absent a `MISSING_FIELD` error.
 */
export function struct<T>(
  name: string,
  build: (fields: StructFields) => T,
): Decoder<T> {
  return fromVisitor<T>({
    expecting: `struct ${name}`,
    visitMap(map) {
      const values = new Map<string, Deserializer>();
      while (map.hasNext()) {
        const key = map.nextKey((de) => text.decode(de));
        if (values.has(key)) {
          throw cborError('DUPLICATE_FIELD', `duplicate field \`${key}\``);
        }
        values.set(key, map.deferValue());
      }

      return build({
        required(key, decoder) {
          const de = values.get(key);
          if (de === undefined) {
            throw cborError('MISSING_FIELD', `missing field \`${key}\``);
          }
          return decoder.decode(de);
        },
        optional(key, decoder) {
          const de = values.get(key);
          return de === undefined ? undefined : decoder.decode(de);
        },
      });
    },
  });
}
