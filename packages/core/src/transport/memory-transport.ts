import type { PeerTarget } from '../routing/peer-table.js';
import { peerTargetFor } from '../routing/peer-table.js';
import type { PeerConnection } from './transport-layer.js';
import { TransportLayer } from './transport-layer.js';

class MemoryConnection implements PeerConnection {
  onFrame: ((bytes: Uint8Array) => void) | null = null;
  onClose: (() => void) | null = null;
  remote: MemoryConnection | null = null;
  private closed = false;

  constructor(readonly peer: PeerTarget) {}

  send(bytes: Uint8Array): void {
    if (this.closed || !this.remote) {
      throw new Error(`Link to ${this.peer.nodeId.slice(0, 8)} is closed`);
    }
    // Receivers own their copy, like a real wire
    this.remote.onFrame?.(bytes.slice());
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const remote = this.remote;
    this.remote = null;
    remote?.close();
    this.onClose?.();
  }
}

/**
 * In-process network of TransportLayers. Frames are delivered synchronously,
 * which keeps multi-node scenarios deterministic.
 */
export class MemoryTransportHub {
  private transports = new Map<string, TransportLayer>();

  createTransport(publicKey: Uint8Array): TransportLayer {
    const { nodeId } = peerTargetFor(publicKey);
    const transport = new TransportLayer();
    this.transports.set(nodeId, transport);
    return transport;
  }

  /** Open a bidirectional link between two transports created by this hub */
  connect(a: Uint8Array, b: Uint8Array): void {
    const aTarget = peerTargetFor(a);
    const bTarget = peerTargetFor(b);
    const aTransport = this.transports.get(aTarget.nodeId);
    const bTransport = this.transports.get(bTarget.nodeId);
    if (!aTransport || !bTransport) {
      throw new Error('Both ends must be created by this hub before connecting');
    }

    // a's side of the link points at b and vice versa
    const atA = new MemoryConnection(bTarget);
    const atB = new MemoryConnection(aTarget);
    atA.remote = atB;
    atB.remote = atA;
    aTransport.registerPeer(atA);
    bTransport.registerPeer(atB);
  }

  disconnect(a: Uint8Array, b: Uint8Array): void {
    this.transports.get(peerTargetFor(a).nodeId)?.getPeer(peerTargetFor(b).nodeId)?.close();
  }
}
