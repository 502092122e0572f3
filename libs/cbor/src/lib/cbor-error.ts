export type CborErrorCode =
  | 'TRUNCATED'
  | 'TRAILING_BYTES'
  | 'INVALID_UTF8'
  | 'INVALID_STRING'
  | 'UNSUPPORTED_CBOR'
  | 'UNSUPPORTED_TYPE'
  | 'DEPTH_EXCEEDED'
  | 'ENCODED_TOO_LARGE'
  | 'INTEGER_OUT_OF_RANGE'
  | 'INVALID_LENGTH'
  | 'INVALID_TYPE'
  | 'MISSING_FIELD'
  | 'DUPLICATE_FIELD';

export class CborError extends Error {
  constructor(
    public readonly code: CborErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CborError';
  }
}

export function cborError(code: CborErrorCode, message: string): CborError {
  return new CborError(code, message);
}
