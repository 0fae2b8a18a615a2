export {
  EnvelopeCodec,
  DEFAULT_MAX_ENVELOPE_SIZE,
  encodeEnvelope,
  decodeEnvelope,
  signingBytes,
} from './envelope-codec.js';
export type { DecodeResult, DecodeFailure, EnvelopeCodecOptions } from './envelope-codec.js';
export {
  encodeStoredMessagesRequest,
  decodeStoredMessagesRequest,
  encodeStoredMessagesResponse,
  decodeStoredMessagesResponse,
} from './store-forward-codec.js';
export type { PayloadDecodeResult, DecodedStoredMessages } from './store-forward-codec.js';
export { MESSAGE_TYPE_TAGS, NETWORK_TAGS } from './wire.js';
