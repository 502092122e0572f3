import {
  CborEncoder,
  type CborInput,
  type CborOptions,
  type Decoder,
  decodeWith,
} from '@ipld-lite/cbor';

import { CID_TAG } from './cid.js';
import type { Ipld } from './ipld.js';
import { deserializeIpld, ipldVisitor } from './ipld-visitor.js';

export function decodeIpld(input: CborInput, options?: CborOptions): Ipld {
  return decodeWith(input, deserializeIpld, options);
}

export function encodeIpld(value: Ipld, options?: CborOptions): Uint8Array {
  const encoder = new CborEncoder(options);
  writeIpld(encoder, value);
  return encoder.finish();
}

/** Decodes any item as {@link Ipld}, for use inside structured decoders. */
export const ipldDecoder: Decoder<Ipld> = {
  expecting: ipldVisitor.expecting,
  decode: deserializeIpld,
};

/**
 * Decodes a value that must be wrapped in a tag, such as a link field read
 * through `deserializeNewtype`. An untagged value is a `TAG_EXPECTED` error.
 */
export const taggedIpldDecoder: Decoder<Ipld> = {
  expecting: 'a tagged CBOR value',
  decode: (de) => de.deserializeNewtype(ipldVisitor),
};

export function writeIpld(encoder: CborEncoder, value: Ipld): void {
  switch (value.kind) {
    case 'null':
      encoder.writeNull();
      return;
    case 'bool':
      encoder.writeBool(value.value);
      return;
    case 'integer':
      encoder.writeInteger(value.value);
      return;
    case 'float':
      encoder.writeFloat(value.value);
      return;
    case 'string':
      encoder.writeString(value.value);
      return;
    case 'bytes':
      encoder.writeBytes(value.value);
      return;
    case 'list':
      encoder.enter();
      encoder.writeArrayHeader(value.value.length);
      for (const item of value.value) {
        writeIpld(encoder, item);
      }
      encoder.leave();
      return;
    case 'map':
      encoder.enter();
      encoder.writeMapHeader(value.value.size);
      for (const [key, entry] of value.value) {
        encoder.writeString(key);
        writeIpld(encoder, entry);
      }
      encoder.leave();
      return;
    case 'link':
      encoder.writeTaggedBytes(CID_TAG, value.value);
      return;
  }
}
