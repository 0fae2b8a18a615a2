import { beforeEach, describe, expect, it } from 'vitest';
import { generateIdentity, identityPublicKey, publicKeyToNodeIdBytes } from '../identity/keypair.js';
import { bytesToHex, hexToBytes } from '../utils/bytes.js';
import { PeerTable, peerTargetFor, xorDistance } from './peer-table.js';

function makePublicKey(): Uint8Array {
  return identityPublicKey(generateIdentity());
}

describe('xorDistance', () => {
  it('is zero for identical ids', () => {
    expect(xorDistance(new Uint8Array([5, 6]), new Uint8Array([5, 6]))).toBe(0n);
  });

  it('reads ids as big-endian integers', () => {
    expect(xorDistance(new Uint8Array([0x01]), new Uint8Array([0x03]))).toBe(2n);
    expect(xorDistance(new Uint8Array([0x01, 0x00]), new Uint8Array([0x00, 0x00]))).toBe(256n);
  });

  it('left-pads the shorter id', () => {
    expect(xorDistance(new Uint8Array([0x01]), new Uint8Array([0x00, 0x01]))).toBe(0n);
  });
});

describe('PeerTable', () => {
  let clock: number;
  let table: PeerTable;
  const localKey = makePublicKey();

  beforeEach(() => {
    clock = 1000;
    table = new PeerTable({ localPublicKey: localKey, now: () => clock });
  });

  it('should add and retrieve a peer', () => {
    const key = makePublicKey();
    const target = table.addPeer(key);

    expect(target).toEqual({ nodeId: bytesToHex(publicKeyToNodeIdBytes(key)), publicKey: bytesToHex(key) });
    expect(table.getPeer(target.nodeId)).toEqual(target);
    expect(table.isDirectlyReachable(key)).toBe(true);
  });

  it('should never hold the local node', () => {
    table.addPeer(localKey);
    expect(table.size()).toBe(0);
    expect(table.isDirectlyReachable(localKey)).toBe(false);
  });

  it('should remove a peer', () => {
    const key = makePublicKey();
    const { nodeId } = table.addPeer(key);
    expect(table.removePeer(nodeId)).toBe(true);
    expect(table.isDirectlyReachable(key)).toBe(false);
    expect(table.removePeer(nodeId)).toBe(false);
  });

  it('should track lastSeen with the injected clock', () => {
    const { nodeId } = table.addPeer(makePublicKey());
    expect(table.lastSeen(nodeId)).toBe(1000);
    clock = 2500;
    table.touch(nodeId);
    expect(table.lastSeen(nodeId)).toBe(2500);
  });

  describe('closestPeers', () => {
    it('puts the peer with the target id first', () => {
      const keys = [makePublicKey(), makePublicKey(), makePublicKey(), makePublicKey()];
      for (const key of keys) table.addPeer(key);

      const closest = table.closestPeers(publicKeyToNodeIdBytes(keys[2]), 2);
      expect(closest).toHaveLength(2);
      expect(closest[0]).toEqual(peerTargetFor(keys[2]));
    });

    it('orders by distance', () => {
      const keys = [makePublicKey(), makePublicKey(), makePublicKey()];
      for (const key of keys) table.addPeer(key);
      const target = new Uint8Array(13);

      const closest = table.closestPeers(target, 3);
      const distances = closest.map((peer) => xorDistance(target, publicKeyToNodeIdBytes(hexToBytes(peer.publicKey))));
      expect(distances).toEqual([...distances].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)));
    });

    it('skips excluded peers', () => {
      const a = table.addPeer(makePublicKey());
      const b = table.addPeer(makePublicKey());

      expect(table.closestPeers(new Uint8Array(13), 5, new Set([a.nodeId]))).toEqual([b]);
    });

    it('returns nothing for a zero count', () => {
      table.addPeer(makePublicKey());
      expect(table.closestPeers(new Uint8Array(13), 0)).toEqual([]);
    });

    it('accepts a custom distance metric', () => {
      const a = table.addPeer(makePublicKey());
      const b = table.addPeer(makePublicKey());
      const reversed = new PeerTable({ distance: (_target, id) => (bytesToHex(id) === b.nodeId ? 0n : 1n) });
      reversed.addPeer(hexToBytes(a.publicKey));
      reversed.addPeer(hexToBytes(b.publicKey));

      expect(reversed.closestPeers(new Uint8Array(13), 1)).toEqual([b]);
    });
  });
});
