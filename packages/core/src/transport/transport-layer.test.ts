import type { Mock } from 'vitest';
import { describe, expect, it, vi } from 'vitest';
import { DhtError } from '../errors/dht-error.js';
import { generateIdentity, identityPublicKey } from '../identity/keypair.js';
import type { PeerTarget } from '../routing/peer-table.js';
import { peerTargetFor } from '../routing/peer-table.js';
import type { PeerConnection, TransportEvents } from './transport-layer.js';
import { TransportLayer } from './transport-layer.js';

function makePeer(): PeerTarget {
  return peerTargetFor(identityPublicKey(generateIdentity()));
}

function createMockEvents() {
  return {
    onReceive: vi.fn<TransportEvents['onReceive']>(),
    onPeerConnected: vi.fn<NonNullable<TransportEvents['onPeerConnected']>>(),
    onPeerDisconnected: vi.fn<NonNullable<TransportEvents['onPeerDisconnected']>>(),
    onError: vi.fn<NonNullable<TransportEvents['onError']>>(),
  };
}

interface MockConnection extends PeerConnection {
  send: Mock<PeerConnection['send']>;
  close: Mock<PeerConnection['close']>;
}

function createMockPeerConnection(peer: PeerTarget): MockConnection {
  return { peer, send: vi.fn(), close: vi.fn(), onFrame: null, onClose: null };
}

describe('TransportLayer', () => {
  it('registers a peer and fires onPeerConnected', () => {
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const peer = makePeer();

    transport.registerPeer(createMockPeerConnection(peer));

    expect(events.onPeerConnected).toHaveBeenCalledWith(peer);
    expect(transport.getConnectedPeers()).toEqual([peer]);
  });

  it('sends frames to the registered connection', () => {
    const transport = new TransportLayer();
    const peer = makePeer();
    const conn = createMockPeerConnection(peer);
    transport.registerPeer(conn);

    transport.send(peer, new Uint8Array([1, 2]));
    expect(conn.send).toHaveBeenCalledWith(new Uint8Array([1, 2]));
  });

  it('reports TRANSPORT_FAILED for an unknown peer', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const peer = makePeer();

    transport.send(peer, new Uint8Array([1]));

    expect(events.onError).toHaveBeenCalledTimes(1);
    const [errPeer, error] = events.onError.mock.calls[0];
    expect(errPeer).toBe(peer);
    expect(error).toBeInstanceOf(DhtError);
    expect(error.code).toBe('TRANSPORT_FAILED');
    vi.restoreAllMocks();
  });

  it('reports a connection that throws on send', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const peer = makePeer();
    const conn = createMockPeerConnection(peer);
    conn.send.mockImplementation(() => {
      throw new Error('socket closed');
    });
    transport.registerPeer(conn);

    transport.send(peer, new Uint8Array([1]));

    expect(events.onError.mock.calls[0][1].message).toBe('socket closed');
    vi.restoreAllMocks();
  });

  it('routes incoming frames with the peer they came from', () => {
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const peer = makePeer();
    const conn = createMockPeerConnection(peer);
    transport.registerPeer(conn);

    conn.onFrame?.(new Uint8Array([9]));
    expect(events.onReceive).toHaveBeenCalledWith(peer, new Uint8Array([9]));
  });

  it('forgets a peer whose connection closes', () => {
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const peer = makePeer();
    const conn = createMockPeerConnection(peer);
    transport.registerPeer(conn);

    conn.onClose?.();

    expect(events.onPeerDisconnected).toHaveBeenCalledWith(peer);
    expect(transport.getConnectedPeers()).toEqual([]);
  });

  it('replaces an older connection to the same node', () => {
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const peer = makePeer();
    const first = createMockPeerConnection(peer);
    const second = createMockPeerConnection(peer);

    transport.registerPeer(first);
    transport.registerPeer(second);
    transport.send(peer, new Uint8Array([1]));

    expect(first.close).toHaveBeenCalled();
    expect(first.send).not.toHaveBeenCalled();
    expect(second.send).toHaveBeenCalled();
    expect(events.onPeerDisconnected).not.toHaveBeenCalled();
  });

  it('closes all connections on close', () => {
    const events = createMockEvents();
    const transport = new TransportLayer();
    transport.listen(events);
    const a = createMockPeerConnection(makePeer());
    const b = createMockPeerConnection(makePeer());
    transport.registerPeer(a);
    transport.registerPeer(b);

    transport.close();

    expect(a.close).toHaveBeenCalled();
    expect(b.close).toHaveBeenCalled();
    expect(events.onPeerDisconnected).toHaveBeenCalledTimes(2);
    expect(transport.getConnectedPeers()).toEqual([]);
  });
});
