import type { NodeId } from '../identity/index.js';
import { publicKeyToNodeIdBytes } from '../identity/keypair.js';
import type { DhtDestination } from '../types/envelope.js';
import type { PeerTarget, RoutingTable } from './peer-table.js';
import { peerTargetFor } from './peer-table.js';

export interface DestinationRouterOptions {
  routingTable: RoutingTable;
  localPublicKey: Uint8Array;
  fanOut: number;
}

/**
 * Resolves a destination descriptor into the neighbours a message goes to.
 * Greedy DHT step: only local closeness is consulted, no I/O.
 */
export class DestinationRouter {
  private routingTable: RoutingTable;
  private localNodeIdBytes: Uint8Array;
  private localNodeId: NodeId;
  private fanOut: number;

  constructor(options: DestinationRouterOptions) {
    this.routingTable = options.routingTable;
    this.localNodeIdBytes = publicKeyToNodeIdBytes(options.localPublicKey);
    this.localNodeId = peerTargetFor(options.localPublicKey).nodeId;
    this.fanOut = options.fanOut;
  }

  /**
   * @param exclude node ids never to return (typically the peer a forwarded message came from)
   */
  resolve(destination: DhtDestination, exclude: Iterable<NodeId> = []): PeerTarget[] {
    const excluded = new Set(exclude);
    excluded.add(this.localNodeId);

    switch (destination.kind) {
      case 'unknown':
        return this.routingTable.closestPeers(this.localNodeIdBytes, this.fanOut, excluded);

      case 'public-key': {
        const direct = peerTargetFor(destination.publicKey);
        if (excluded.has(direct.nodeId)) {
          if (direct.nodeId === this.localNodeId) return [];
        } else if (this.routingTable.isDirectlyReachable(destination.publicKey)) {
          return [direct];
        }
        return this.routingTable.closestPeers(publicKeyToNodeIdBytes(destination.publicKey), this.fanOut, excluded);
      }

      case 'node-id':
        return this.routingTable.closestPeers(destination.nodeId, this.fanOut, excluded);
    }
  }
}
