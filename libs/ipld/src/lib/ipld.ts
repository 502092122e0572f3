import { bytesEqual } from './bytes.js';
import { IpldError } from './ipld-error.js';

const INT128_MIN = -(2n ** 127n);
const INT128_MAX = 2n ** 127n - 1n;

export interface IpldNull {
  readonly kind: 'null';
}

export interface IpldBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface IpldInteger {
  readonly kind: 'integer';
  /** Within -2^127 ..= 2^127 - 1. */
  readonly value: bigint;
}

export interface IpldFloat {
  readonly kind: 'float';
  readonly value: number;
}

export interface IpldString {
  readonly kind: 'string';
  readonly value: string;
}

export interface IpldBytes {
  readonly kind: 'bytes';
  /** A copy owned by this value. Typed arrays cannot be frozen; do not write to it. */
  readonly value: Uint8Array;
}

export interface IpldList {
  readonly kind: 'list';
  readonly value: readonly Ipld[];
}

export interface IpldMap {
  readonly kind: 'map';
  /** Iterates in {@link compareKeys} order. */
  readonly value: ReadonlyMap<string, Ipld>;
}

/** A content identifier, kept as opaque bytes. */
export interface IpldLink {
  readonly kind: 'link';
  /** A copy owned by this value, like {@link IpldBytes.value}. */
  readonly value: Uint8Array;
}

export type Ipld =
  | IpldNull
  | IpldBool
  | IpldInteger
  | IpldFloat
  | IpldString
  | IpldBytes
  | IpldList
  | IpldMap
  | IpldLink;

export type IpldKind = Ipld['kind'];

const NULL: IpldNull = Object.freeze({ kind: 'null' });

/**
 * Constructors for {@link Ipld} values. Every value they return is frozen,
 * lists and maps included; byte arrays are copied but stay writable.
 */
export const Ipld = {
  null(): IpldNull {
    return NULL;
  },

  bool(value: boolean): IpldBool {
    return freeze({ kind: 'bool', value });
  },

  integer(value: bigint | number): IpldInteger {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new IpldError(
        'INTEGER_OUT_OF_RANGE',
        `integer is not a safe integer: ${value}`,
      );
    }
    const integer = BigInt(value);
    if (integer < INT128_MIN || integer > INT128_MAX) {
      throw new IpldError(
        'INTEGER_OUT_OF_RANGE',
        `integer does not fit in 128 bits (${integer})`,
      );
    }
    return freeze({ kind: 'integer', value: integer });
  },

  float(value: number): IpldFloat {
    return freeze({ kind: 'float', value });
  },

  string(value: string): IpldString {
    return freeze({ kind: 'string', value });
  },

  bytes(value: Uint8Array | Iterable<number>): IpldBytes {
    return freeze({ kind: 'bytes', value: Uint8Array.from(value) });
  },

  list(items: Iterable<Ipld>): IpldList {
    return freeze({ kind: 'list', value: Object.freeze(Array.from(items)) });
  },

  /** Later entries for the same key replace earlier ones. */
  map(entries: Iterable<readonly [string, Ipld]>): IpldMap {
    const latest = new Map<string, Ipld>(entries);
    const keys = Array.from(latest.keys()).sort(compareKeys);
    const sorted = new Map<string, Ipld>();
    for (const key of keys) {
      const value = latest.get(key);
      if (value !== undefined) {
        sorted.set(key, value);
      }
    }
    return freeze({ kind: 'map', value: new IpldEntries(sorted) });
  },

  link(value: Uint8Array | Iterable<number>): IpldLink {
    return freeze({ kind: 'link', value: Uint8Array.from(value) });
  },
};

/** Read-only view over the entries of a map value. */
class IpldEntries implements ReadonlyMap<string, Ipld> {
  constructor(private readonly table: Map<string, Ipld>) {
    Object.freeze(this);
  }

  get size(): number {
    return this.table.size;
  }

  get(key: string): Ipld | undefined {
    return this.table.get(key);
  }

  has(key: string): boolean {
    return this.table.has(key);
  }

  forEach(
    callback: (value: Ipld, key: string, map: ReadonlyMap<string, Ipld>) => void,
    thisArg?: unknown,
  ): void {
    this.table.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.table.entries();
  }

  keys() {
    return this.table.keys();
  }

  values() {
    return this.table.values();
  }

  [Symbol.iterator]() {
    return this.table[Symbol.iterator]();
  }
}

/**
 * Orders keys by Unicode code point, which matches the byte order of their
 * UTF-8 encodings.
 */
export function compareKeys(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) {
      return left - right;
    }
    if (left > 0xffff) {
      i += 1;
    }
  }
  return a.length - b.length;
}

/**
 * Structural equality. Floats compare with `Object.is`, so `NaN` equals
 * `NaN` and `-0` differs from `0`.
 */
export function ipldEquals(a: Ipld, b: Ipld): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bytes':
      return b.kind === 'bytes' && bytesEqual(a.value, b.value);
    case 'link':
      return b.kind === 'link' && bytesEqual(a.value, b.value);
    case 'list':
      return b.kind === 'list' && listsEqual(a.value, b.value);
    case 'map':
      return b.kind === 'map' && mapsEqual(a.value, b.value);
  }
}

function listsEqual(a: readonly Ipld[], b: readonly Ipld[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i += 1) {
    if (!ipldEquals(a[i], b[i])) {
      return false;
    }
  }
  return true;
}

function mapsEqual(
  a: ReadonlyMap<string, Ipld>,
  b: ReadonlyMap<string, Ipld>,
): boolean {
  if (a.size !== b.size) {
    return false;
  }
  const right = b.entries();
  for (const [key, value] of a) {
    const next = right.next();
    if (next.done || next.value[0] !== key || !ipldEquals(value, next.value[1])) {
      return false;
    }
  }
  return true;
}

function freeze<T extends Ipld>(value: T): T {
  return Object.freeze(value);
}
