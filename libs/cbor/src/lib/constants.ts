export const CBOR_MAJOR_UINT = 0;
export const CBOR_MAJOR_NINT = 1;
export const CBOR_MAJOR_BYTES = 2;
export const CBOR_MAJOR_TEXT = 3;
export const CBOR_MAJOR_ARRAY = 4;
export const CBOR_MAJOR_MAP = 5;
export const CBOR_MAJOR_TAG = 6;
export const CBOR_MAJOR_SIMPLE = 7;

export const CBOR_INDEFINITE = 31;
export const CBOR_BREAK = 0xff;

export const UINT64_MAX = 0xffff_ffff_ffff_ffffn;
export const INT64_MIN = -0x8000_0000_0000_0000n;
/** Smallest integer a CBOR major type 1 head can carry: -1 - (2^64 - 1). */
export const NINT64_MIN = -0x1_0000_0000_0000_0000n;
