export type IpldErrorCode =
  | 'UNEXPECTED_TAG'
  | 'BYTES_EXPECTED'
  | 'TAG_EXPECTED'
  | 'INTEGER_OUT_OF_RANGE';

export class IpldError extends Error {
  constructor(
    public readonly code: IpldErrorCode,
    message: string,
    /** The offending tag number, for `UNEXPECTED_TAG`. */
    public readonly tag?: bigint,
  ) {
    super(message);
    this.name = 'IpldError';
  }
}
