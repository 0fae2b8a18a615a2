import type { NodeId } from '../identity/index.js';
import { publicKeyToNodeIdBytes } from '../identity/keypair.js';
import { bytesToHex } from '../utils/bytes.js';

/** A neighbour the transport can hand bytes to */
export interface PeerTarget {
  nodeId: NodeId;
  /** Hex-encoded wire public key */
  publicKey: string;
}

/** Closeness between two node ids; smaller is closer */
export type DistanceMetric = (a: Uint8Array, b: Uint8Array) => bigint;

/**
 * Routing-table capability consumed by the destination router.
 * Maintenance (discovery, liveness) is the implementer's concern.
 */
export interface RoutingTable {
  closestPeers(nodeId: Uint8Array, count: number, exclude?: ReadonlySet<NodeId>): PeerTarget[];
  isDirectlyReachable(publicKey: Uint8Array): boolean;
}

/** XOR of the two ids read as big-endian unsigned integers */
export const xorDistance: DistanceMetric = (a, b) => {
  const length = Math.max(a.length, b.length);
  let distance = 0n;
  for (let i = 0; i < length; i++) {
    // Shorter ids are left-padded with zeros
    const x = a[i - (length - a.length)] ?? 0;
    const y = b[i - (length - b.length)] ?? 0;
    distance = (distance << 8n) | BigInt(x ^ y);
  }
  return distance;
};

export function peerTargetFor(publicKey: Uint8Array): PeerTarget {
  return { nodeId: bytesToHex(publicKeyToNodeIdBytes(publicKey)), publicKey: bytesToHex(publicKey) };
}

interface PeerEntry {
  target: PeerTarget;
  nodeIdBytes: Uint8Array;
  lastSeen: number;
}

export interface PeerTableOptions {
  /** Local node's public key; never returned as a peer */
  localPublicKey?: Uint8Array;
  distance?: DistanceMetric;
  now?: () => number;
}

/**
 * In-memory table of directly connected neighbours.
 */
export class PeerTable implements RoutingTable {
  private peers = new Map<NodeId, PeerEntry>();
  private localNodeId: NodeId | null;
  private distance: DistanceMetric;
  private now: () => number;

  constructor(options: PeerTableOptions = {}) {
    this.localNodeId = options.localPublicKey ? peerTargetFor(options.localPublicKey).nodeId : null;
    this.distance = options.distance ?? xorDistance;
    this.now = options.now ?? Date.now;
  }

  addPeer(publicKey: Uint8Array): PeerTarget {
    const target = peerTargetFor(publicKey);
    if (target.nodeId === this.localNodeId) return target;
    this.peers.set(target.nodeId, {
      target,
      nodeIdBytes: publicKeyToNodeIdBytes(publicKey),
      lastSeen: this.now(),
    });
    return target;
  }

  removePeer(nodeId: NodeId): boolean {
    return this.peers.delete(nodeId);
  }

  getPeer(nodeId: NodeId): PeerTarget | undefined {
    return this.peers.get(nodeId)?.target;
  }

  touch(nodeId: NodeId): void {
    const entry = this.peers.get(nodeId);
    if (entry) entry.lastSeen = this.now();
  }

  lastSeen(nodeId: NodeId): number | undefined {
    return this.peers.get(nodeId)?.lastSeen;
  }

  getPeers(): PeerTarget[] {
    return Array.from(this.peers.values(), (entry) => entry.target);
  }

  closestPeers(nodeId: Uint8Array, count: number, exclude?: ReadonlySet<NodeId>): PeerTarget[] {
    if (count <= 0) return [];
    return Array.from(this.peers.values())
      .filter((entry) => !exclude?.has(entry.target.nodeId))
      .map((entry) => ({ entry, distance: this.distance(nodeId, entry.nodeIdBytes) }))
      .sort((a, b) => {
        if (a.distance !== b.distance) return a.distance < b.distance ? -1 : 1;
        return a.entry.target.nodeId < b.entry.target.nodeId ? -1 : 1;
      })
      .slice(0, count)
      .map(({ entry }) => entry.target);
  }

  isDirectlyReachable(publicKey: Uint8Array): boolean {
    return this.peers.has(peerTargetFor(publicKey).nodeId);
  }

  size(): number {
    return this.peers.size;
  }
}
