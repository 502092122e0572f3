/**
 * Receives the decode events for exactly one CBOR item.
 *
 * The deserializer calls the method matching the item it reads. A visitor that
 * leaves a method out rejects that kind of item with an `INVALID_TYPE` error
 * naming `expecting`.
 */
export interface Visitor<T> {
  /** Human-readable description used in `INVALID_TYPE` messages. */
  readonly expecting: string;
  /** CBOR `null` and `undefined`. */
  visitNull?(): T;
  visitBool?(value: boolean): T;
  /** Major type 0, 0 ..= 2^64 - 1. */
  visitUnsigned?(value: bigint): T;
  /** Major type 1 inside the signed 64-bit range. */
  visitSigned?(value: bigint): T;
  /** Major type 1 below the signed 64-bit range, down to -2^64. */
  visitBigSigned?(value: bigint): T;
  /** Half, single and double precision floats, widened to a number. */
  visitFloat?(value: number): T;
  visitString?(value: string): T;
  /**
   * `value` may be a view into the input buffer; copy it before keeping it
   * beyond the call.
   */
  visitBytes?(value: Uint8Array): T;
  visitSeq?(seq: SeqAccess): T;
  visitMap?(map: MapAccess): T;
  /**
   * Called for a tagged item with the tag that wraps it and a deserializer
   * positioned on the payload. `tag` is `undefined` only when a newtype was
   * requested and the item carries no tag.
   */
  visitTagged?(payload: Deserializer, tag: bigint | undefined): T;
}

/** Decodes one item from a deserializer. */
export type Seed<T> = (de: Deserializer) => T;

export interface TaggedValue<T> {
  tag: bigint | undefined;
  value: T;
}

export interface Deserializer {
  /** Reads one item and reports it to `visitor`. */
  deserializeAny<T>(visitor: Visitor<T>): T;
  /**
   * Reads one item expected to be tag-wrapped. A tagged item is reported to
   * `visitTagged` with its tag; any other item with `tag` undefined and this
   * deserializer as the payload.
   */
  deserializeNewtype<T>(visitor: Visitor<T>): T;
  /** Reads an optional tag, then decodes the payload with `seed`. */
  deserializeTagged<T>(seed: Seed<T>): TaggedValue<T>;
  /** Consumes `null`/`undefined` and returns null, else decodes with `seed`. */
  deserializeOption<T>(seed: Seed<T>): T | null;
}

export interface SeqAccess {
  hasNext(): boolean;
  next<T>(seed: Seed<T>): T;
}

export interface MapAccess {
  hasNext(): boolean;
  nextKey<T>(seed: Seed<T>): T;
  nextValue<T>(seed: Seed<T>): T;
  /**
   * Skips the next value and returns a deserializer positioned on it, for
   * decoding it later.
   */
  deferValue(): Deserializer;
}
