import { encode } from '@msgpack/msgpack';
import type { StoredMessage, StoredMessagesRequest, StoredMessagesResponse } from '../types/envelope.js';
import { DEFAULT_MAX_ENVELOPE_SIZE, headerFromWire, headerToWire, readWire } from './envelope-codec.js';
import {
  StoredMessageField,
  StoredMessagesRequestField,
  StoredMessagesResponseField,
  type WireRecord,
  isTimestamp,
  isUint32,
  isWireRecord,
} from './wire.js';

export type PayloadDecodeResult<T> = { ok: true; value: T } | { ok: false; detail: string };

export interface DecodedStoredMessages {
  messages: StoredMessage[];
  /** Entries that failed structural decoding and were skipped */
  skipped: number;
}

export function encodeStoredMessagesRequest(request: StoredMessagesRequest): Uint8Array {
  const wire: WireRecord = {};
  if (request.since !== undefined) {
    wire[StoredMessagesRequestField.SINCE] = request.since;
  }
  return encode(wire);
}

export function decodeStoredMessagesRequest(
  bytes: Uint8Array,
  maxSize = DEFAULT_MAX_ENVELOPE_SIZE,
): PayloadDecodeResult<StoredMessagesRequest> {
  const wire = readWire(bytes, maxSize);
  if (!wire.ok) return wire;
  if (!isWireRecord(wire.value)) {
    return { ok: false, detail: 'stored messages request is not a map' };
  }
  const since = wire.value[StoredMessagesRequestField.SINCE];
  if (since === undefined || since === null) {
    return { ok: true, value: {} };
  }
  if (!isTimestamp(since)) {
    return { ok: false, detail: 'since is not a timestamp' };
  }
  return { ok: true, value: { since } };
}

function storedMessageToWire(message: StoredMessage): WireRecord {
  return {
    [StoredMessageField.STORED_AT]: message.storedAt,
    [StoredMessageField.VERSION]: message.version,
    [StoredMessageField.DHT_HEADER]: headerToWire(message.dhtHeader),
    [StoredMessageField.ENCRYPTED_BODY]: message.encryptedBody,
  };
}

/** Encoded length of one stored message as it sits inside a response */
export function storedMessageEncodedLength(message: StoredMessage): number {
  return encode(storedMessageToWire(message)).length;
}

/**
 * Encoded length of a response holding `count` entries that together take
 * `entryBytes`: a one-field map, its one-character key, then the array header.
 */
export function storedMessagesResponseLength(count: number, entryBytes: number): number {
  const arrayHeader = count < 16 ? 1 : count < 0x10000 ? 3 : 5;
  return 1 + 2 + arrayHeader + entryBytes;
}

function storedMessageFromWire(raw: unknown): StoredMessage | null {
  if (!isWireRecord(raw)) return null;
  const storedAt = raw[StoredMessageField.STORED_AT];
  const version = raw[StoredMessageField.VERSION] ?? 0;
  const body = raw[StoredMessageField.ENCRYPTED_BODY];
  if (!isTimestamp(storedAt) || !isUint32(version) || !(body instanceof Uint8Array)) {
    return null;
  }
  const header = headerFromWire(raw[StoredMessageField.DHT_HEADER]);
  if (!header.ok) return null;
  return { storedAt, version, dhtHeader: header.header, encryptedBody: body.slice() };
}

export function encodeStoredMessagesResponse(response: StoredMessagesResponse): Uint8Array {
  return encode({ [StoredMessagesResponseField.MESSAGES]: response.messages.map(storedMessageToWire) });
}

/**
 * Decode a response. A structurally broken entry is skipped rather than failing
 * the whole response; every entry is re-authenticated by the dispatcher anyway.
 */
export function decodeStoredMessagesResponse(
  bytes: Uint8Array,
  maxSize = DEFAULT_MAX_ENVELOPE_SIZE,
): PayloadDecodeResult<DecodedStoredMessages> {
  const wire = readWire(bytes, maxSize);
  if (!wire.ok) return wire;
  if (!isWireRecord(wire.value)) {
    return { ok: false, detail: 'stored messages response is not a map' };
  }
  const rawMessages = wire.value[StoredMessagesResponseField.MESSAGES] ?? [];
  if (!Array.isArray(rawMessages)) {
    return { ok: false, detail: 'messages is not an array' };
  }

  const messages: StoredMessage[] = [];
  let skipped = 0;
  for (const raw of rawMessages) {
    const message = storedMessageFromWire(raw);
    if (message) {
      messages.push(message);
    } else {
      skipped++;
    }
  }
  return { ok: true, value: { messages, skipped } };
}
