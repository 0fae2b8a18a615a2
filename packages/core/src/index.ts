export const DHTWIRE_VERSION = '0.1.0';

export {
  IdentityManager,
  generateIdentity,
  identityFromSeed,
  identityFromSecretKeys,
  identityPublicKey,
  splitPublicKey,
  signData,
  verifySignature,
  publicKeyToNodeId,
  publicKeyToNodeIdBytes,
  MemoryStorage,
  FileStorageAdapter,
  PUBLIC_KEY_LENGTH,
  NODE_ID_LENGTH,
  SIGNATURE_LENGTH,
} from './identity/index.js';
export type { NodeIdentity, NodeId, KeyPair, IdentityStorage } from './identity/index.js';

export {
  DHT_PROTOCOL_VERSION,
  DhtMessageFlags,
  AUTHENTICATED_MESSAGE_TYPES,
  isEncrypted,
  cloneHeader,
  cloneDestination,
} from './types/index.js';
export type {
  Network,
  DhtMessageType,
  DhtDestination,
  DhtOrigin,
  DhtHeader,
  DhtEnvelope,
  StoredMessage,
  StoredMessagesRequest,
  StoredMessagesResponse,
} from './types/index.js';

export { DhtError } from './errors/index.js';
export type { DhtErrorCode, DropReason } from './errors/index.js';

export {
  DEFAULT_DHT_CONFIG,
  DEFAULT_FAN_OUT,
  DEFAULT_SAF_RETENTION_MS,
  DEFAULT_SAF_CAPACITY,
  DEFAULT_SAF_SWEEP_INTERVAL_MS,
  DEFAULT_SAF_MAX_RETURNED_MESSAGES,
  DEFAULT_DEDUP_TTL_MS,
  DEFAULT_DEDUP_MAX_SIZE,
  resolveDhtConfig,
} from './config/dht-config.js';
export type { DhtConfig } from './config/dht-config.js';

export {
  EnvelopeCodec,
  DEFAULT_MAX_ENVELOPE_SIZE,
  encodeEnvelope,
  decodeEnvelope,
  signingBytes,
  encodeStoredMessagesRequest,
  decodeStoredMessagesRequest,
  encodeStoredMessagesResponse,
  decodeStoredMessagesResponse,
  MESSAGE_TYPE_TAGS,
  NETWORK_TAGS,
} from './codec/index.js';
export type { DecodeResult, DecodeFailure, EnvelopeCodecOptions, PayloadDecodeResult, DecodedStoredMessages } from './codec/index.js';

export { naclCrypto, deriveSharedSecret, encryptBody, decryptBody, envelopeDigest } from './crypto/index.js';
export type { DhtCrypto } from './crypto/index.js';

export { OriginAuthenticator } from './auth/index.js';
export type { AuthFailureReason, AuthFailed, VerifyResult, OpenResult, SealParams, OriginAuthenticatorOptions } from './auth/index.js';

export { PeerTable, xorDistance, peerTargetFor, DestinationRouter, DuplicateFilter } from './routing/index.js';
export type {
  PeerTarget,
  RoutingTable,
  DistanceMetric,
  PeerTableOptions,
  DestinationRouterOptions,
  DuplicateFilterOptions,
} from './routing/index.js';

export { SafStore } from './store-forward/index.js';
export type { SafStoreEvents, SafStoreOptions, EvictionReason } from './store-forward/index.js';

export { TransportLayer, MemoryTransportHub } from './transport/index.js';
export type { DhtTransport, PeerConnection, TransportEvents } from './transport/index.js';

export { OutboundMessenger } from './outbound/index.js';
export type { SendParams, SendResult, OutboundMessengerOptions } from './outbound/index.js';

export { DhtDispatcher, InboundQueue, inlineExecutor } from './dispatch/index.js';
export type {
  DhtDispatcherOptions,
  DhtMessage,
  DhtMessageHandler,
  DispatcherEvents,
  FrameHandler,
  FrameSource,
  TaskExecutor,
} from './dispatch/index.js';

export {
  encodeBaseNodeRequest,
  decodeBaseNodeRequest,
  generateRequestKey,
  requestKeyToBytes,
  requestKeyFromBytes,
  respondTo,
  BASE_NODE_REQUEST_FIELDS,
} from './base-node/index.js';
export type {
  BaseNodeRequest,
  BaseNodeRequestKind,
  BaseNodeServiceRequest,
  BaseNodeServiceResponse,
} from './base-node/index.js';

export { bytesToHex, hexToBytes, bytesEqual, concatBytes } from './utils/bytes.js';
