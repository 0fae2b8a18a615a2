import { decode, encode } from '@msgpack/msgpack';
import { DhtError } from '../errors/dht-error.js';
import type { DhtDestination, DhtEnvelope, DhtHeader, Network } from '../types/envelope.js';
import { DHT_PROTOCOL_VERSION } from '../types/envelope.js';
import {
  EnvelopeField,
  HeaderField,
  MESSAGE_TYPE_TAGS,
  NETWORK_TAGS,
  OriginField,
  type WireRecord,
  isUint32,
  isWireRecord,
  messageTypeFromTag,
  networkFromTag,
} from './wire.js';

/** Default upper bound for a single envelope frame (256 KiB) */
export const DEFAULT_MAX_ENVELOPE_SIZE = 256 * 1024;

/** Maps in the schema have at most a handful of keys */
const MAX_MAP_LENGTH = 64;

const EMPTY = new Uint8Array(0);

export type DecodeFailure = 'MALFORMED_ENVELOPE' | 'UNSUPPORTED_VERSION' | 'NETWORK_MISMATCH';

export type DecodeResult = { ok: true; envelope: DhtEnvelope } | { ok: false; reason: DecodeFailure; detail: string };

export type HeaderParseResult = { ok: true; header: DhtHeader } | { ok: false; detail: string };

export type WireReadResult = { ok: true; value: unknown } | { ok: false; detail: string };

export interface EnvelopeCodecOptions {
  /** Local network; envelopes tagged for any other network are dropped */
  network: Network;
  maxEnvelopeSize?: number;
}

// ============================================
// Encoding
// ============================================

export function headerToWire(header: DhtHeader, includeSignature = true): WireRecord {
  const wire: WireRecord = { [HeaderField.VERSION]: header.version };

  switch (header.destination.kind) {
    case 'unknown':
      wire[HeaderField.DESTINATION_UNKNOWN] = true;
      break;
    case 'public-key':
      wire[HeaderField.DESTINATION_PUBLIC_KEY] = header.destination.publicKey;
      break;
    case 'node-id':
      wire[HeaderField.DESTINATION_NODE_ID] = header.destination.nodeId;
      break;
  }

  if (header.origin) {
    wire[HeaderField.ORIGIN] = {
      [OriginField.PUBLIC_KEY]: header.origin.publicKey,
      [OriginField.SIGNATURE]: includeSignature ? header.origin.signature : EMPTY,
    };
  }

  wire[HeaderField.MESSAGE_TYPE] = MESSAGE_TYPE_TAGS[header.messageType];
  wire[HeaderField.NETWORK] = NETWORK_TAGS[header.network];
  wire[HeaderField.FLAGS] = header.flags;
  return wire;
}

export function encodeEnvelope(header: DhtHeader, body: Uint8Array): Uint8Array {
  return encode({ [EnvelopeField.HEADER]: headerToWire(header), [EnvelopeField.BODY]: body });
}

/**
 * Bytes covered by the origin signature: the envelope encoding with the
 * signature field emptied. Any header or body change alters them.
 */
export function signingBytes(header: DhtHeader, body: Uint8Array): Uint8Array {
  return encode({ [EnvelopeField.HEADER]: headerToWire(header, false), [EnvelopeField.BODY]: body });
}

// ============================================
// Decoding
// ============================================

/** Decode a msgpack frame with every length bounded by maxSize */
export function readWire(bytes: Uint8Array, maxSize: number): WireReadResult {
  if (bytes.length > maxSize) {
    return { ok: false, detail: `frame of ${bytes.length} bytes exceeds limit of ${maxSize}` };
  }
  try {
    const value = decode(bytes, {
      maxStrLength: maxSize,
      maxBinLength: maxSize,
      maxArrayLength: maxSize,
      maxMapLength: MAX_MAP_LENGTH,
      maxExtLength: 0,
    });
    return { ok: true, value };
  } catch (err) {
    return { ok: false, detail: err instanceof Error ? err.message : String(err) };
  }
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

function readDestination(raw: WireRecord): DhtDestination | string {
  const unknownFlag = raw[HeaderField.DESTINATION_UNKNOWN];
  const publicKey = raw[HeaderField.DESTINATION_PUBLIC_KEY];
  const nodeId = raw[HeaderField.DESTINATION_NODE_ID];
  const set = [unknownFlag, publicKey, nodeId].filter((v) => !isAbsent(v)).length;
  if (set !== 1) {
    return `destination has ${set} variants set`;
  }

  if (!isAbsent(unknownFlag)) {
    return typeof unknownFlag === 'boolean' ? { kind: 'unknown' } : 'destination.unknown is not a boolean';
  }
  if (!isAbsent(publicKey)) {
    return publicKey instanceof Uint8Array
      ? { kind: 'public-key', publicKey: publicKey.slice() }
      : 'destination.public_key is not bytes';
  }
  return nodeId instanceof Uint8Array ? { kind: 'node-id', nodeId: nodeId.slice() } : 'destination.node_id is not bytes';
}

/** Structural decode of a header map. Does not check version or network. */
export function headerFromWire(raw: unknown): HeaderParseResult {
  if (!isWireRecord(raw)) {
    return { ok: false, detail: 'header is not a map' };
  }

  const version = raw[HeaderField.VERSION] ?? 0;
  if (!isUint32(version)) {
    return { ok: false, detail: 'version is not a uint32' };
  }

  const destination = readDestination(raw);
  if (typeof destination === 'string') {
    return { ok: false, detail: destination };
  }

  const typeTag = raw[HeaderField.MESSAGE_TYPE] ?? 0;
  const messageType = isUint32(typeTag) ? messageTypeFromTag(typeTag) : undefined;
  if (!messageType) {
    return { ok: false, detail: `unrecognized message type tag ${String(typeTag)}` };
  }

  const networkTag = raw[HeaderField.NETWORK] ?? 0;
  const network = isUint32(networkTag) ? networkFromTag(networkTag) : undefined;
  if (!network) {
    return { ok: false, detail: `unrecognized network tag ${String(networkTag)}` };
  }

  const flags = raw[HeaderField.FLAGS] ?? 0;
  if (!isUint32(flags)) {
    return { ok: false, detail: 'flags is not a uint32' };
  }

  const header: DhtHeader = { version, destination, messageType, network, flags };

  const origin = raw[HeaderField.ORIGIN];
  if (!isAbsent(origin)) {
    if (!isWireRecord(origin)) {
      return { ok: false, detail: 'origin is not a map' };
    }
    const publicKey = origin[OriginField.PUBLIC_KEY];
    const signature = origin[OriginField.SIGNATURE] ?? EMPTY;
    if (!(publicKey instanceof Uint8Array) || !(signature instanceof Uint8Array)) {
      return { ok: false, detail: 'origin fields are not bytes' };
    }
    header.origin = { publicKey: publicKey.slice(), signature: signature.slice() };
  }

  return { ok: true, header };
}

/**
 * Decode a single envelope frame. Pure: no authentication, no side effects.
 * Unknown fields are ignored.
 */
export function decodeEnvelope(bytes: Uint8Array, network: Network, maxSize = DEFAULT_MAX_ENVELOPE_SIZE): DecodeResult {
  const wire = readWire(bytes, maxSize);
  if (!wire.ok) {
    return { ok: false, reason: 'MALFORMED_ENVELOPE', detail: wire.detail };
  }
  if (!isWireRecord(wire.value)) {
    return { ok: false, reason: 'MALFORMED_ENVELOPE', detail: 'envelope is not a map' };
  }

  const rawHeader = wire.value[EnvelopeField.HEADER];
  if (isAbsent(rawHeader)) {
    return { ok: false, reason: 'MALFORMED_ENVELOPE', detail: 'missing header' };
  }
  const parsed = headerFromWire(rawHeader);
  if (!parsed.ok) {
    return { ok: false, reason: 'MALFORMED_ENVELOPE', detail: parsed.detail };
  }

  const body = wire.value[EnvelopeField.BODY] ?? EMPTY;
  if (!(body instanceof Uint8Array)) {
    return { ok: false, reason: 'MALFORMED_ENVELOPE', detail: 'body is not bytes' };
  }

  const { header } = parsed;
  if (header.version !== DHT_PROTOCOL_VERSION) {
    return { ok: false, reason: 'UNSUPPORTED_VERSION', detail: `version ${header.version}` };
  }
  if (header.network !== network) {
    return { ok: false, reason: 'NETWORK_MISMATCH', detail: `network ${header.network}` };
  }

  return { ok: true, envelope: { header, body: body.slice() } };
}

/**
 * Envelope codec bound to the local network and size limit.
 */
export class EnvelopeCodec {
  readonly network: Network;
  readonly maxEnvelopeSize: number;

  constructor(options: EnvelopeCodecOptions) {
    this.network = options.network;
    this.maxEnvelopeSize = options.maxEnvelopeSize ?? DEFAULT_MAX_ENVELOPE_SIZE;
  }

  /** @throws DhtError when the local message would exceed what peers accept */
  encode(header: DhtHeader, body: Uint8Array): Uint8Array {
    const bytes = encodeEnvelope(header, body);
    if (bytes.length > this.maxEnvelopeSize) {
      throw new DhtError('MALFORMED_ENVELOPE', `Envelope of ${bytes.length} bytes exceeds limit`, {
        limit: this.maxEnvelopeSize,
      });
    }
    return bytes;
  }

  decode(bytes: Uint8Array): DecodeResult {
    return decodeEnvelope(bytes, this.network, this.maxEnvelopeSize);
  }
}
