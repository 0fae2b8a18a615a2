import type { DhtMessageType, Network } from '../types/envelope.js';

/**
 * Field numbers of the wire schema. msgpack writes them as string map keys
 * ("1", "2", ...); a field keeps its number across protocol versions and
 * unknown fields are skipped.
 */
export const EnvelopeField = { HEADER: 1, BODY: 2 } as const;

export const HeaderField = {
  VERSION: 1,
  DESTINATION_UNKNOWN: 2,
  DESTINATION_PUBLIC_KEY: 3,
  DESTINATION_NODE_ID: 4,
  ORIGIN: 5,
  MESSAGE_TYPE: 6,
  NETWORK: 7,
  FLAGS: 8,
} as const;

export const OriginField = { PUBLIC_KEY: 1, SIGNATURE: 2 } as const;

export const StoredMessagesRequestField = { SINCE: 1 } as const;

export const StoredMessageField = { STORED_AT: 1, VERSION: 2, DHT_HEADER: 3, ENCRYPTED_BODY: 4 } as const;

export const StoredMessagesResponseField = { MESSAGES: 1 } as const;

export const MESSAGE_TYPE_TAGS: Record<DhtMessageType, number> = {
  none: 0,
  join: 1,
  discovery: 2,
  'discovery-response': 3,
  reject: 4,
  'store-forward-request': 20,
  'store-forward-response': 21,
};

export const NETWORK_TAGS: Record<Network, number> = {
  main: 0,
  test: 1,
  'local-test': 2,
};

export const MESSAGE_TYPES: readonly DhtMessageType[] = [
  'none',
  'join',
  'discovery',
  'discovery-response',
  'reject',
  'store-forward-request',
  'store-forward-response',
];

export const NETWORKS: readonly Network[] = ['main', 'test', 'local-test'];

function invert<K extends string>(tags: Record<K, number>, keys: readonly K[]): Map<number, K> {
  const out = new Map<number, K>();
  for (const key of keys) {
    out.set(tags[key], key);
  }
  return out;
}

const MESSAGE_TYPES_BY_TAG = invert(MESSAGE_TYPE_TAGS, MESSAGE_TYPES);
const NETWORKS_BY_TAG = invert(NETWORK_TAGS, NETWORKS);

export function messageTypeFromTag(tag: number): DhtMessageType | undefined {
  return MESSAGE_TYPES_BY_TAG.get(tag);
}

export function networkFromTag(tag: number): Network | undefined {
  return NETWORKS_BY_TAG.get(tag);
}

/** A decoded msgpack map; field numbers come back as string property names */
export type WireRecord = Record<string, unknown>;

export function isWireRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

export function isUint32(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

export function isTimestamp(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}
