import nacl from 'tweetnacl';
import { encodeEnvelope } from '../codec/envelope-codec.js';
import type { DhtHeader } from '../types/envelope.js';
import { bytesToHex } from '../utils/bytes.js';

const DIGEST_LENGTH = 32;

/** Identity of an envelope on the wire: truncated SHA-512 over its canonical encoding */
export function envelopeDigest(header: DhtHeader, body: Uint8Array): string {
  return bytesToHex(nacl.hash(encodeEnvelope(header, body)).subarray(0, DIGEST_LENGTH));
}
