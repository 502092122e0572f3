import { describe, expect, it } from 'vitest';

import { floatToHalf, halfToFloat } from './float16.js';

describe('halfToFloat', () => {
  it('decodes normal, subnormal and special values', () => {
    expect(halfToFloat(0x3c00)).toBe(1);
    expect(halfToFloat(0x3e00)).toBe(1.5);
    expect(halfToFloat(0xc000)).toBe(-2);
    expect(halfToFloat(0x7bff)).toBe(65504);
    expect(halfToFloat(0x0001)).toBe(2 ** -24);
    expect(halfToFloat(0x7c00)).toBe(Number.POSITIVE_INFINITY);
    expect(halfToFloat(0xfc00)).toBe(Number.NEGATIVE_INFINITY);
    expect(halfToFloat(0x7e00)).toBeNaN();
    expect(Object.is(halfToFloat(0x8000), -0)).toBe(true);
  });
});

describe('floatToHalf', () => {
  it('returns bits for exactly representable values', () => {
    expect(floatToHalf(1)).toBe(0x3c00);
    expect(floatToHalf(1.5)).toBe(0x3e00);
    expect(floatToHalf(-2)).toBe(0xc000);
    expect(floatToHalf(65504)).toBe(0x7bff);
    expect(floatToHalf(2 ** -24)).toBe(0x0001);
    expect(floatToHalf(-0)).toBe(0x8000);
    expect(floatToHalf(Number.NaN)).toBe(0x7e00);
    expect(floatToHalf(Number.NEGATIVE_INFINITY)).toBe(0xfc00);
  });

  it('returns undefined when precision or range would be lost', () => {
    expect(floatToHalf(0.1)).toBeUndefined();
    expect(floatToHalf(65505)).toBeUndefined();
    expect(floatToHalf(2 ** -25)).toBeUndefined();
    expect(floatToHalf(1 + 2 ** -11)).toBeUndefined();
  });
});
