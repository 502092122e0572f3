// Node 20 ships no DataView#getFloat16/setFloat16.

const HALF_MAX = 65504;
const HALF_MIN_NORMAL = 2 ** -14;
const HALF_SUBNORMAL_STEP = 2 ** -24;

export function halfToFloat(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const fraction = bits & 0x3ff;

  if (exponent === 0) {
    return sign * fraction * HALF_SUBNORMAL_STEP;
  }
  if (exponent === 0x1f) {
    return fraction === 0 ? sign * Number.POSITIVE_INFINITY : Number.NaN;
  }
  return sign * (1 + fraction / 1024) * 2 ** (exponent - 15);
}

/**
 * Returns the half-precision bit pattern for `value`, or `undefined` when the
 * value cannot be represented exactly.
 */
export function floatToHalf(value: number): number | undefined {
  if (Number.isNaN(value)) {
    return 0x7e00;
  }

  const sign = value < 0 || Object.is(value, -0) ? 0x8000 : 0;
  const abs = Math.abs(value);

  if (abs === Number.POSITIVE_INFINITY) {
    return sign | 0x7c00;
  }
  if (abs === 0) {
    return sign;
  }
  if (abs > HALF_MAX) {
    return undefined;
  }

  if (abs < HALF_MIN_NORMAL) {
    const fraction = abs / HALF_SUBNORMAL_STEP;
    return Number.isInteger(fraction) ? sign | fraction : undefined;
  }

  let exponent = 15;
  while (2 ** exponent > abs) {
    exponent -= 1;
  }
  const fraction = (abs / 2 ** exponent - 1) * 1024;
  if (!Number.isInteger(fraction)) {
    return undefined;
  }
  return sign | ((exponent + 15) << 10) | fraction;
}
