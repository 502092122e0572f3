import { CborError, decodeAs, encode } from '@ipld-lite/cbor';
import { type Ipld, IpldError, decodeIpld, formatIpld } from '@ipld-lite/ipld';
import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

import {
  type Contact,
  SAMPLE_CONTACT,
  contactDecoder,
  formatContact,
} from './contact.js';

export interface ContactDemoSummary {
  status: 'ok' | 'error' | 'fatal';
  encodedHex: string;
  digest?: string;
  contact?: Contact;
  ipld?: Ipld;
  error?: {
    kind: string;
    code?: string;
    tag?: string;
    message: string;
  };
}

export interface ContactDemoOptions {
  debug?: boolean;
  log?: (line: string) => void;
  /** Decodes these bytes instead of the encoded sample contact. */
  inputHex?: string;
}

/**
 * Encodes the sample contact (or takes `inputHex`), decodes it back both as a
 * typed `Contact` and as a generic value, and logs what it found.
 */
export function runContactDemo(options?: ContactDemoOptions): ContactDemoSummary {
  const logger = options?.log ?? defaultLog;
  let encodedHex = options?.inputHex ?? '';

  let summary: ContactDemoSummary;
  try {
    const encoded =
      options?.inputHex === undefined
        ? encode(SAMPLE_CONTACT)
        : hexToBytes(options.inputHex);
    encodedHex = bytesToHex(encoded);
    summary = decodeContact(encoded, encodedHex);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    summary = {
      status: 'fatal',
      encodedHex,
      error: { kind: 'fatal', message },
    };
  }

  logSummary(summary, logger, options?.debug);
  return summary;
}

function decodeContact(encoded: Uint8Array, encodedHex: string): ContactDemoSummary {
  const digest = bytesToHex(sha256(encoded));
  try {
    return {
      status: 'ok',
      encodedHex,
      digest,
      contact: decodeAs(encoded, contactDecoder),
      ipld: decodeIpld(encoded),
    };
  } catch (error) {
    if (error instanceof CborError) {
      return {
        status: 'error',
        encodedHex,
        digest,
        error: { kind: error.name, code: error.code, message: error.message },
      };
    }
    if (error instanceof IpldError) {
      return {
        status: 'error',
        encodedHex,
        digest,
        error: {
          kind: error.name,
          code: error.code,
          tag: error.tag?.toString(),
          message: error.message,
        },
      };
    }
    throw error;
  }
}

function logSummary(
  summary: ContactDemoSummary,
  log: (line: string) => void,
  debug?: boolean,
): void {
  log('contact-demo');
  log(`encoded       : ${summary.encodedHex}`);
  if (summary.digest) {
    log(`sha-256       : ${summary.digest}`);
  }
  log(`status        : ${summary.status}`);

  if (summary.contact) {
    log(`contact       : ${formatContact(summary.contact)}`);
  }

  if (summary.error) {
    const code = summary.error.code ?? 'unknown';
    const tag = summary.error.tag ?? 'n/a';
    log(`error         : ${summary.error.kind} code=${code} tag=${tag}`);
    log(`message       : ${summary.error.message}`);
  }

  if (debug && summary.ipld) {
    log(`ipld (debug)  : ${formatIpld(summary.ipld)}`);
  }
}

function defaultLog(line: string): void {
  console.log(line);
}
