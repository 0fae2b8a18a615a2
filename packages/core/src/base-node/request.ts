import { encode } from '@msgpack/msgpack';
import nacl from 'tweetnacl';
import { DEFAULT_MAX_ENVELOPE_SIZE, readWire } from '../codec/envelope-codec.js';
import type { PayloadDecodeResult } from '../codec/store-forward-codec.js';
import { type WireRecord, isTimestamp, isWireRecord } from '../codec/wire.js';

/** request_key travels as 8 big-endian bytes so the full uint64 range survives */
export const REQUEST_KEY_LENGTH = 8;

const MAX_UINT64 = (1n << 64n) - 1n;

/**
 * Chain-state queries a wallet or node sends to a base node. Exactly one variant
 * per request; heights and hashes are opaque to this layer.
 */
export type BaseNodeRequest =
  | { kind: 'get-chain-metadata' }
  | { kind: 'fetch-kernels'; hashes: Uint8Array[] }
  | { kind: 'fetch-headers'; heights: number[] }
  | { kind: 'fetch-headers-with-hashes'; hashes: Uint8Array[] }
  | { kind: 'fetch-utxos'; hashes: Uint8Array[] }
  | { kind: 'fetch-blocks'; heights: number[] }
  | { kind: 'fetch-blocks-with-hashes'; hashes: Uint8Array[] }
  | { kind: 'get-new-block-template' }
  | { kind: 'get-new-block'; template: Uint8Array }
  | { kind: 'get-target-difficulty'; algorithm: number }
  | { kind: 'fetch-headers-after'; hashes: Uint8Array[]; stoppingHash: Uint8Array };

export type BaseNodeRequestKind = BaseNodeRequest['kind'];

export interface BaseNodeServiceRequest {
  /** Correlates a request with its response; echoed unchanged */
  requestKey: bigint;
  request: BaseNodeRequest;
}

export interface BaseNodeServiceResponse<T> {
  requestKey: bigint;
  response: T;
}

const REQUEST_KEY_FIELD = 1;

/** Field number of each oneof variant */
export const BASE_NODE_REQUEST_FIELDS: Record<BaseNodeRequestKind, number> = {
  'get-chain-metadata': 2,
  'fetch-kernels': 3,
  'fetch-headers': 4,
  'fetch-headers-with-hashes': 5,
  'fetch-utxos': 6,
  'fetch-blocks': 7,
  'fetch-blocks-with-hashes': 8,
  'get-new-block-template': 9,
  'get-new-block': 10,
  'get-target-difficulty': 11,
  'fetch-headers-after': 12,
};

const REQUEST_KINDS: readonly BaseNodeRequestKind[] = [
  'get-chain-metadata',
  'fetch-kernels',
  'fetch-headers',
  'fetch-headers-with-hashes',
  'fetch-utxos',
  'fetch-blocks',
  'fetch-blocks-with-hashes',
  'get-new-block-template',
  'get-new-block',
  'get-target-difficulty',
  'fetch-headers-after',
];

/** Nested message fields (HashOutputs.outputs, BlockHeights.heights, FetchHeadersAfter) */
const LIST_FIELD = 1;
const STOPPING_HASH_FIELD = 2;

// ============================================
// request_key
// ============================================

export function generateRequestKey(): bigint {
  return requestKeyFromBytes(nacl.randomBytes(REQUEST_KEY_LENGTH)) ?? 0n;
}

/** @throws RangeError when the key does not fit in a uint64 */
export function requestKeyToBytes(key: bigint): Uint8Array {
  if (key < 0n || key > MAX_UINT64) {
    throw new RangeError(`request key ${key} is not a uint64`);
  }
  const bytes = new Uint8Array(REQUEST_KEY_LENGTH);
  new DataView(bytes.buffer).setBigUint64(0, key);
  return bytes;
}

export function requestKeyFromBytes(bytes: Uint8Array): bigint | null {
  if (bytes.length !== REQUEST_KEY_LENGTH) return null;
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(0);
}

/** Pair a response with the request it answers; the key is echoed unchanged */
export function respondTo<T>(request: BaseNodeServiceRequest, response: T): BaseNodeServiceResponse<T> {
  return { requestKey: request.requestKey, response };
}

// ============================================
// Codec
// ============================================

function variantToWire(request: BaseNodeRequest): unknown {
  switch (request.kind) {
    case 'get-chain-metadata':
    case 'get-new-block-template':
      return true;
    case 'fetch-kernels':
    case 'fetch-headers-with-hashes':
    case 'fetch-utxos':
    case 'fetch-blocks-with-hashes':
      return { [LIST_FIELD]: request.hashes };
    case 'fetch-headers':
    case 'fetch-blocks':
      return { [LIST_FIELD]: request.heights };
    case 'get-new-block':
      return request.template;
    case 'get-target-difficulty':
      return request.algorithm;
    case 'fetch-headers-after':
      return { [LIST_FIELD]: request.hashes, [STOPPING_HASH_FIELD]: request.stoppingHash };
  }
}

export function encodeBaseNodeRequest(message: BaseNodeServiceRequest): Uint8Array {
  const wire: WireRecord = {
    [REQUEST_KEY_FIELD]: requestKeyToBytes(message.requestKey),
    [BASE_NODE_REQUEST_FIELDS[message.request.kind]]: variantToWire(message.request),
  };
  return encode(wire);
}

function readHashes(raw: unknown): Uint8Array[] | null {
  if (!isWireRecord(raw)) return null;
  const list = raw[LIST_FIELD] ?? [];
  if (!Array.isArray(list)) return null;
  const hashes: Uint8Array[] = [];
  for (const item of list) {
    if (!(item instanceof Uint8Array)) return null;
    hashes.push(item.slice());
  }
  return hashes;
}

function readHeights(raw: unknown): number[] | null {
  if (!isWireRecord(raw)) return null;
  const list = raw[LIST_FIELD] ?? [];
  if (!Array.isArray(list)) return null;
  const heights: number[] = [];
  for (const item of list) {
    if (!isTimestamp(item)) return null;
    heights.push(item);
  }
  return heights;
}

function variantFromWire(kind: BaseNodeRequestKind, raw: unknown): BaseNodeRequest | null {
  switch (kind) {
    case 'get-chain-metadata':
    case 'get-new-block-template':
      return typeof raw === 'boolean' ? { kind } : null;
    case 'fetch-kernels':
    case 'fetch-headers-with-hashes':
    case 'fetch-utxos':
    case 'fetch-blocks-with-hashes': {
      const hashes = readHashes(raw);
      return hashes ? { kind, hashes } : null;
    }
    case 'fetch-headers':
    case 'fetch-blocks': {
      const heights = readHeights(raw);
      return heights ? { kind, heights } : null;
    }
    case 'get-new-block':
      return raw instanceof Uint8Array ? { kind, template: raw.slice() } : null;
    case 'get-target-difficulty':
      return isTimestamp(raw) ? { kind, algorithm: raw } : null;
    case 'fetch-headers-after': {
      const hashes = readHashes(raw);
      if (!hashes || !isWireRecord(raw)) return null;
      const stoppingHash = raw[STOPPING_HASH_FIELD] ?? new Uint8Array(0);
      if (!(stoppingHash instanceof Uint8Array)) return null;
      return { kind, hashes, stoppingHash: stoppingHash.slice() };
    }
  }
}

export function decodeBaseNodeRequest(
  bytes: Uint8Array,
  maxSize = DEFAULT_MAX_ENVELOPE_SIZE,
): PayloadDecodeResult<BaseNodeServiceRequest> {
  const wire = readWire(bytes, maxSize);
  if (!wire.ok) return wire;
  if (!isWireRecord(wire.value)) {
    return { ok: false, detail: 'base node request is not a map' };
  }
  const fields = wire.value;

  const rawKey = fields[REQUEST_KEY_FIELD] ?? new Uint8Array(REQUEST_KEY_LENGTH);
  const requestKey = rawKey instanceof Uint8Array ? requestKeyFromBytes(rawKey) : null;
  if (requestKey === null) {
    return { ok: false, detail: 'request_key is not 8 bytes' };
  }

  const present = REQUEST_KINDS.filter((kind) => {
    const value = fields[BASE_NODE_REQUEST_FIELDS[kind]];
    return value !== undefined && value !== null;
  });
  if (present.length !== 1) {
    return { ok: false, detail: `request has ${present.length} variants set` };
  }

  const [kind] = present;
  const request = variantFromWire(kind, fields[BASE_NODE_REQUEST_FIELDS[kind]]);
  if (!request) {
    return { ok: false, detail: `${kind} has the wrong wire type` };
  }
  return { ok: true, value: { requestKey, request } };
}
