import { type Deserializer, type Visitor, text } from '@ipld-lite/cbor';

import { CID_TAG } from './cid.js';
import { Ipld } from './ipld.js';
import { IpldError } from './ipld-error.js';

/**
 * Folds the decode events of one item into an {@link Ipld} value.
 *
 * Tag 42 over a byte string becomes a link. Every other tag is rejected, as
 * is a newtype request that finds no tag.
 */
export const ipldVisitor: Visitor<Ipld> = {
  expecting: 'any valid CBOR value',

  visitNull: () => Ipld.null(),
  visitBool: (value) => Ipld.bool(value),
  visitUnsigned: (value) => Ipld.integer(value),
  visitSigned: (value) => Ipld.integer(value),
  visitBigSigned: (value) => Ipld.integer(value),
  visitFloat: (value) => Ipld.float(value),
  visitString: (value) => Ipld.string(value),
  // copies out of the input buffer
  visitBytes: (value) => Ipld.bytes(value),

  visitSeq(seq) {
    const items: Ipld[] = [];
    while (seq.hasNext()) {
      items.push(seq.next(deserializeIpld));
    }
    return Ipld.list(items);
  },

  visitMap(map) {
    const entries: Array<[string, Ipld]> = [];
    while (map.hasNext()) {
      const key = map.nextKey((de) => text.decode(de));
      entries.push([key, map.nextValue(deserializeIpld)]);
    }
    return Ipld.map(entries);
  },

  visitTagged(payload, tag) {
    if (tag === undefined) {
      throw new IpldError('TAG_EXPECTED', 'tag expected');
    }
    if (tag !== CID_TAG) {
      throw new IpldError('UNEXPECTED_TAG', `unexpected tag (${tag})`, tag);
    }
    const inner = deserializeIpld(payload);
    if (inner.kind !== 'bytes') {
      throw new IpldError('BYTES_EXPECTED', 'bytes expected');
    }
    return Ipld.link(inner.value);
  },
};

export function deserializeIpld(de: Deserializer): Ipld {
  return de.deserializeAny(ipldVisitor);
}
