/** Major protocol version this node speaks; anything else is rejected at decode */
export const DHT_PROTOCOL_VERSION = 1;

export type Network = 'main' | 'test' | 'local-test';

export type DhtMessageType =
  | 'none'
  | 'join'
  | 'discovery'
  | 'discovery-response'
  | 'reject'
  | 'store-forward-request'
  | 'store-forward-response';

/** Exactly one destination variant; `unknown` means broadcast or "the peer this is sent to" */
export type DhtDestination =
  | { kind: 'unknown' }
  | { kind: 'public-key'; publicKey: Uint8Array }
  | { kind: 'node-id'; nodeId: Uint8Array };

export interface DhtOrigin {
  publicKey: Uint8Array;
  signature: Uint8Array;
}

export interface DhtHeader {
  version: number;
  destination: DhtDestination;
  origin?: DhtOrigin;
  messageType: DhtMessageType;
  network: Network;
  flags: number;
}

export interface DhtEnvelope {
  header: DhtHeader;
  /** Wire body: ciphertext when the encrypted flag is set */
  body: Uint8Array;
}

/** Header flag bits. Bits other than ENCRYPTED are reserved and written as zero. */
export const DhtMessageFlags = {
  NONE: 0,
  ENCRYPTED: 0x01,
} as const;

/** Types whose origin must be present and verified */
export const AUTHENTICATED_MESSAGE_TYPES: ReadonlySet<DhtMessageType> = new Set<DhtMessageType>([
  'join',
  'discovery',
  'discovery-response',
]);

export function isEncrypted(header: DhtHeader): boolean {
  return (header.flags & DhtMessageFlags.ENCRYPTED) !== 0;
}

export function cloneDestination(destination: DhtDestination): DhtDestination {
  switch (destination.kind) {
    case 'unknown':
      return { kind: 'unknown' };
    case 'public-key':
      return { kind: 'public-key', publicKey: destination.publicKey.slice() };
    case 'node-id':
      return { kind: 'node-id', nodeId: destination.nodeId.slice() };
  }
}

/** Deep copy; headers moving into or out of the store-and-forward cache are never aliased */
export function cloneHeader(header: DhtHeader): DhtHeader {
  const copy: DhtHeader = {
    version: header.version,
    destination: cloneDestination(header.destination),
    messageType: header.messageType,
    network: header.network,
    flags: header.flags,
  };
  if (header.origin) {
    copy.origin = { publicKey: header.origin.publicKey.slice(), signature: header.origin.signature.slice() };
  }
  return copy;
}

// ============================================
// Store-and-forward payloads
// ============================================

export interface StoredMessage {
  /** Milliseconds since the Unix epoch */
  storedAt: number;
  version: number;
  dhtHeader: DhtHeader;
  /** Body bytes exactly as they arrived */
  encryptedBody: Uint8Array;
}

export interface StoredMessagesRequest {
  /** Only messages stored at or after this time; absent means all applicable */
  since?: number;
}

export interface StoredMessagesResponse {
  messages: StoredMessage[];
}
