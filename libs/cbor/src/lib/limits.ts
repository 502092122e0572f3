export interface CborLimits {
  /** Nesting of arrays, maps and tags allowed below the top-level item. */
  maxDepth: number;
  maxEncodedBytes: number;
}

export const CBOR_LIMIT_DEFAULTS: Readonly<CborLimits> = {
  maxDepth: 128,
  maxEncodedBytes: 16_777_216,
};

export interface CborOptions {
  limits?: Partial<CborLimits>;
}

export function normalizeLimits(limits?: Partial<CborLimits>): CborLimits {
  return {
    maxDepth: limits?.maxDepth ?? CBOR_LIMIT_DEFAULTS.maxDepth,
    maxEncodedBytes:
      limits?.maxEncodedBytes ?? CBOR_LIMIT_DEFAULTS.maxEncodedBytes,
  };
}
