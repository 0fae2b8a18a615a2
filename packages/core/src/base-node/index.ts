export {
  encodeBaseNodeRequest,
  decodeBaseNodeRequest,
  generateRequestKey,
  requestKeyToBytes,
  requestKeyFromBytes,
  respondTo,
  BASE_NODE_REQUEST_FIELDS,
  REQUEST_KEY_LENGTH,
} from './request.js';
export type {
  BaseNodeRequest,
  BaseNodeRequestKind,
  BaseNodeServiceRequest,
  BaseNodeServiceResponse,
} from './request.js';
