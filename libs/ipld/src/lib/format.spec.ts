import { describe, expect, it } from 'vitest';

import { formatIpld } from './format.js';
import { Ipld } from './ipld.js';

describe('formatIpld', () => {
  it('renders a map with a link', () => {
    const contact = Ipld.map([
      ['name', Ipld.string('Hello World!')],
      ['details', Ipld.link([7, 8, 9])],
    ]);
    expect(formatIpld(contact)).toBe('{"details": Link(070809), "name": "Hello World!"}');
  });

  it('marks floats and bytes', () => {
    expect(formatIpld(Ipld.float(1))).toBe('1.0');
    expect(formatIpld(Ipld.float(1.5))).toBe('1.5');
    expect(formatIpld(Ipld.float(-0))).toBe('-0.0');
    expect(formatIpld(Ipld.float(Number.NaN))).toBe('NaN');
    expect(formatIpld(Ipld.integer(-5))).toBe('-5');
    expect(formatIpld(Ipld.bytes([10]))).toBe('Bytes(0a)');
  });

  it('renders lists', () => {
    expect(formatIpld(Ipld.list([Ipld.null(), Ipld.bool(true)]))).toBe('[null, true]');
    expect(formatIpld(Ipld.list([]))).toBe('[]');
  });
});
