import {
  type CborEncoder,
  type CborSerializable,
  type Decoder,
  bytes as byteString,
} from '@ipld-lite/cbor';
import { bytesToHex } from '@noble/hashes/utils';

import { bytesEqual } from './bytes.js';
import { IpldError } from './ipld-error.js';

/** CBOR tag marking a byte string as a content identifier. */
export const CID_TAG = 42n;

/**
 * A content identifier held as opaque bytes. Its multihash and multicodec
 * fields are not inspected.
 */
export class Cid implements CborSerializable {
  /**
   * Reads a byte string tagged 42 or carrying no tag at all. Any other tag is
   * an `UNEXPECTED_TAG` error.
   */
  static readonly decoder: Decoder<Cid> = {
    expecting: 'a CID byte string',
    decode(de) {
      const { tag, value } = de.deserializeTagged((payload) => byteString.decode(payload));
      if (tag !== undefined && tag !== CID_TAG) {
        throw new IpldError('UNEXPECTED_TAG', 'unexpected tag', tag);
      }
      return new Cid(value);
    },
  };

  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array | Iterable<number>) {
    this.bytes = Uint8Array.from(bytes);
  }

  equals(other: Cid): boolean {
    return bytesEqual(this.bytes, other.bytes);
  }

  encodeCbor(encoder: CborEncoder): void {
    encoder.writeTaggedBytes(CID_TAG, this.bytes);
  }

  toString(): string {
    return `Cid(${bytesToHex(this.bytes)})`;
  }

  toJSON(): string {
    return this.toString();
  }
}
