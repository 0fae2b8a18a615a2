import { describe, expect, it, vi } from 'vitest';
import { generateIdentity, identityPublicKey } from '../identity/keypair.js';
import { peerTargetFor } from '../routing/peer-table.js';
import { MemoryTransportHub } from './memory-transport.js';

describe('MemoryTransportHub', () => {
  const a = identityPublicKey(generateIdentity());
  const b = identityPublicKey(generateIdentity());

  it('delivers frames both ways with the sender as peer', () => {
    const hub = new MemoryTransportHub();
    const ta = hub.createTransport(a);
    const tb = hub.createTransport(b);
    const onReceiveA = vi.fn();
    const onReceiveB = vi.fn();
    ta.listen({ onReceive: onReceiveA });
    tb.listen({ onReceive: onReceiveB });
    hub.connect(a, b);

    ta.send(peerTargetFor(b), new Uint8Array([1]));
    tb.send(peerTargetFor(a), new Uint8Array([2]));

    expect(onReceiveB).toHaveBeenCalledWith(peerTargetFor(a), new Uint8Array([1]));
    expect(onReceiveA).toHaveBeenCalledWith(peerTargetFor(b), new Uint8Array([2]));
  });

  it('hands the receiver its own copy of the frame', () => {
    const hub = new MemoryTransportHub();
    const ta = hub.createTransport(a);
    const tb = hub.createTransport(b);
    let received: Uint8Array | null = null;
    tb.listen({
      onReceive: (_peer, bytes) => {
        received = bytes;
      },
    });
    hub.connect(a, b);

    const frame = new Uint8Array([7]);
    ta.send(peerTargetFor(b), frame);
    frame[0] = 0;

    expect(received).toEqual(new Uint8Array([7]));
  });

  it('tears down both ends on disconnect', () => {
    const hub = new MemoryTransportHub();
    const ta = hub.createTransport(a);
    const tb = hub.createTransport(b);
    const onPeerDisconnected = vi.fn();
    tb.listen({ onReceive: vi.fn(), onPeerDisconnected });
    hub.connect(a, b);

    hub.disconnect(a, b);

    expect(ta.getConnectedPeers()).toEqual([]);
    expect(tb.getConnectedPeers()).toEqual([]);
    expect(onPeerDisconnected).toHaveBeenCalledWith(peerTargetFor(a));
  });

  it('refuses to link transports it did not create', () => {
    const hub = new MemoryTransportHub();
    hub.createTransport(a);
    expect(() => hub.connect(a, b)).toThrow('Both ends must be created by this hub before connecting');
  });
});
