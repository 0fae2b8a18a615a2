export {
  DHT_PROTOCOL_VERSION,
  DhtMessageFlags,
  AUTHENTICATED_MESSAGE_TYPES,
  isEncrypted,
  cloneHeader,
  cloneDestination,
} from './envelope.js';
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
} from './envelope.js';
