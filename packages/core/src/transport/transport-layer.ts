import { DhtError } from '../errors/dht-error.js';
import type { NodeId } from '../identity/index.js';
import type { PeerTarget } from '../routing/peer-table.js';

/** One live link to a neighbour; frames are whole encoded envelopes */
export interface PeerConnection {
  peer: PeerTarget;
  send(bytes: Uint8Array): void;
  close(): void;
  onFrame: ((bytes: Uint8Array) => void) | null;
  onClose: (() => void) | null;
}

export interface TransportEvents {
  onReceive: (peer: PeerTarget, bytes: Uint8Array) => void;
  onPeerConnected?: (peer: PeerTarget) => void;
  onPeerDisconnected?: (peer: PeerTarget) => void;
  onError?: (peer: PeerTarget, error: DhtError) => void;
}

/**
 * Transport capability: non-blocking hand-off of frames to neighbours and a
 * callback for frames that arrive.
 */
export interface DhtTransport {
  send(peer: PeerTarget, bytes: Uint8Array): void;
  listen(events: TransportEvents): void;
  close(): void;
}

/**
 * Connection registry implementing DhtTransport on top of PeerConnection
 * objects supplied by a concrete link (WebSocket, in-memory, ...).
 */
export class TransportLayer implements DhtTransport {
  private connections = new Map<NodeId, PeerConnection>();
  private events: TransportEvents | null = null;

  listen(events: TransportEvents): void {
    this.events = events;
  }

  /** Adopt a connection. A previous connection to the same node is closed. */
  registerPeer(conn: PeerConnection): void {
    const { peer } = conn;
    const previous = this.connections.get(peer.nodeId);
    if (previous && previous !== conn) {
      previous.onClose = null;
      previous.close();
    }

    conn.onFrame = (bytes) => {
      this.events?.onReceive(peer, bytes);
    };
    conn.onClose = () => {
      if (this.connections.get(peer.nodeId) !== conn) return;
      this.connections.delete(peer.nodeId);
      this.events?.onPeerDisconnected?.(peer);
    };
    this.connections.set(peer.nodeId, conn);
    this.events?.onPeerConnected?.(peer);
  }

  send(peer: PeerTarget, bytes: Uint8Array): void {
    const conn = this.connections.get(peer.nodeId);
    if (!conn) {
      this.reportError(peer, new DhtError('TRANSPORT_FAILED', `No connection to peer ${peer.nodeId.slice(0, 8)}`));
      return;
    }
    try {
      conn.send(bytes);
    } catch (err) {
      this.reportError(
        peer,
        new DhtError('TRANSPORT_FAILED', err instanceof Error ? err.message : String(err), { nodeId: peer.nodeId }),
      );
    }
  }

  reportError(peer: PeerTarget, error: DhtError): void {
    console.warn(`[TransportLayer] ${error.message}`);
    this.events?.onError?.(peer, error);
  }

  getPeer(nodeId: NodeId): PeerConnection | undefined {
    return this.connections.get(nodeId);
  }

  getConnectedPeers(): PeerTarget[] {
    return Array.from(this.connections.values(), (conn) => conn.peer);
  }

  close(): void {
    for (const conn of this.connections.values()) {
      conn.onClose = null;
      conn.close();
      this.events?.onPeerDisconnected?.(conn.peer);
    }
    this.connections.clear();
  }
}
