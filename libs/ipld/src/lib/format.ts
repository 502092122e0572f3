import { bytesToHex } from '@noble/hashes/utils';

import type { Ipld } from './ipld.js';

/**
 * Renders a value on one line for logs and debugging, e.g.
 * `{"details": Link(070809), "name": "Hello World!"}`.
 */
export function formatIpld(value: Ipld): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
    case 'integer':
      return String(value.value);
    case 'float':
      return formatFloat(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'bytes':
      return `Bytes(${bytesToHex(value.value)})`;
    case 'link':
      return `Link(${bytesToHex(value.value)})`;
    case 'list':
      return `[${value.value.map(formatIpld).join(', ')}]`;
    case 'map': {
      const entries = Array.from(
        value.value,
        ([key, entry]) => `${JSON.stringify(key)}: ${formatIpld(entry)}`,
      );
      return `{${entries.join(', ')}}`;
    }
  }
}

// keeps floats visibly distinct from integers
function formatFloat(value: number): string {
  if (Object.is(value, -0)) {
    return '-0.0';
  }
  return Number.isInteger(value) && Math.abs(value) < 1e21
    ? `${value}.0`
    : String(value);
}
