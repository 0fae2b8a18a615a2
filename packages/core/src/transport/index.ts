export { TransportLayer } from './transport-layer.js';
export type { DhtTransport, PeerConnection, TransportEvents } from './transport-layer.js';
export { MemoryTransportHub } from './memory-transport.js';
