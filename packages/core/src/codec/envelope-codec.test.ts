import { encode } from '@msgpack/msgpack';
import { describe, expect, it } from 'vitest';
import { DhtError } from '../errors/dht-error.js';
import type { DhtHeader } from '../types/envelope.js';
import { DHT_PROTOCOL_VERSION, DhtMessageFlags } from '../types/envelope.js';
import { EnvelopeCodec, decodeEnvelope, encodeEnvelope, signingBytes } from './envelope-codec.js';

const BODY = new TextEncoder().encode('payload');

function makeHeader(overrides?: Partial<DhtHeader>): DhtHeader {
  return {
    version: DHT_PROTOCOL_VERSION,
    destination: { kind: 'unknown' },
    messageType: 'none',
    network: 'local-test',
    flags: DhtMessageFlags.NONE,
    ...overrides,
  };
}

function expectFailure(bytes: Uint8Array, reason: string, detail?: string): void {
  const result = decodeEnvelope(bytes, 'local-test');
  expect(result.ok).toBe(false);
  if (result.ok) return;
  expect(result.reason).toBe(reason);
  if (detail) expect(result.detail).toContain(detail);
}

describe('EnvelopeCodec', () => {
  const codec = new EnvelopeCodec({ network: 'local-test' });

  describe('round trip', () => {
    it('preserves an unknown-destination header and body', () => {
      const header = makeHeader();
      const result = codec.decode(codec.encode(header, BODY));
      expect(result).toEqual({ ok: true, envelope: { header, body: BODY } });
    });

    it('preserves a public-key destination with origin', () => {
      const header = makeHeader({
        destination: { kind: 'public-key', publicKey: new Uint8Array(64).fill(3) },
        origin: { publicKey: new Uint8Array(64).fill(4), signature: new Uint8Array(64).fill(5) },
        messageType: 'join',
        flags: DhtMessageFlags.ENCRYPTED,
      });
      const result = codec.decode(codec.encode(header, BODY));
      expect(result).toEqual({ ok: true, envelope: { header, body: BODY } });
    });

    it('preserves a node-id destination and store-forward message types', () => {
      for (const messageType of ['store-forward-request', 'store-forward-response'] as const) {
        const header = makeHeader({ destination: { kind: 'node-id', nodeId: new Uint8Array(13).fill(9) }, messageType });
        const result = codec.decode(codec.encode(header, new Uint8Array(0)));
        expect(result).toEqual({ ok: true, envelope: { header, body: new Uint8Array(0) } });
      }
    });
  });

  describe('structural validation', () => {
    it('rejects a header with no destination variant', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 6: 0, 7: 2, 8: 0 }, 2: BODY });
      expectFailure(bytes, 'MALFORMED_ENVELOPE', 'destination has 0 variants set');
    });

    it('rejects a header with two destination variants', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 2: true, 3: new Uint8Array(64), 6: 0, 7: 2 }, 2: BODY });
      expectFailure(bytes, 'MALFORMED_ENVELOPE', 'destination has 2 variants set');
    });

    it('rejects an unrecognized message type tag', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 2: true, 6: 7, 7: 2 }, 2: BODY });
      expectFailure(bytes, 'MALFORMED_ENVELOPE', 'unrecognized message type tag 7');
    });

    it('rejects an unrecognized network tag', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 2: true, 7: 9 }, 2: BODY });
      expectFailure(bytes, 'MALFORMED_ENVELOPE', 'unrecognized network tag 9');
    });

    it('rejects a destination public key that is not bytes', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 3: 'abc', 7: 2 }, 2: BODY });
      expectFailure(bytes, 'MALFORMED_ENVELOPE', 'destination.public_key is not bytes');
    });

    it('rejects a missing header', () => {
      expectFailure(encode({ 2: BODY }), 'MALFORMED_ENVELOPE', 'missing header');
    });

    it('rejects bytes that are not msgpack', () => {
      expectFailure(new Uint8Array([0xc1]), 'MALFORMED_ENVELOPE');
    });

    it('rejects frames larger than the configured maximum before decoding', () => {
      const small = new EnvelopeCodec({ network: 'local-test', maxEnvelopeSize: 64 });
      const bytes = encodeEnvelope(makeHeader(), new Uint8Array(100));
      const result = small.decode(bytes);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toBe('MALFORMED_ENVELOPE');
        expect(result.detail).toContain('exceeds limit of 64');
      }
    });

    it('applies proto-style defaults for absent scalar fields', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 2: true } });
      const result = decodeEnvelope(bytes, 'main');
      expect(result).toEqual({
        ok: true,
        envelope: {
          header: {
            version: DHT_PROTOCOL_VERSION,
            destination: { kind: 'unknown' },
            messageType: 'none',
            network: 'main',
            flags: 0,
          },
          body: new Uint8Array(0),
        },
      });
    });

    it('ignores unknown fields', () => {
      const bytes = encode({ 1: { 1: DHT_PROTOCOL_VERSION, 2: true, 7: 2, 42: 'future' }, 2: BODY, 9: [1, 2] });
      const result = codec.decode(bytes);
      expect(result.ok).toBe(true);
    });
  });

  describe('version and network', () => {
    it('reports an unknown major version', () => {
      const bytes = encodeEnvelope(makeHeader({ version: DHT_PROTOCOL_VERSION + 1 }), BODY);
      expectFailure(bytes, 'UNSUPPORTED_VERSION');
    });

    it('reports a foreign network', () => {
      const bytes = encodeEnvelope(makeHeader({ network: 'main' }), BODY);
      expectFailure(bytes, 'NETWORK_MISMATCH');
    });
  });

  it('does not alias the input buffer', () => {
    const bytes = codec.encode(makeHeader(), BODY);
    const result = codec.decode(bytes);
    bytes.fill(0);
    expect(result.ok && new TextDecoder().decode(result.envelope.body)).toBe('payload');
  });

  it('throws DhtError when a local envelope exceeds the limit', () => {
    const small = new EnvelopeCodec({ network: 'local-test', maxEnvelopeSize: 32 });
    expect(() => small.encode(makeHeader(), new Uint8Array(64))).toThrow(DhtError);
  });
});

describe('signingBytes', () => {
  const origin = (fill: number) => ({ publicKey: new Uint8Array(64).fill(1), signature: new Uint8Array(64).fill(fill) });

  it('does not depend on the signature value', () => {
    const a = signingBytes(makeHeader({ origin: origin(1) }), BODY);
    const b = signingBytes(makeHeader({ origin: origin(2) }), BODY);
    expect(a).toEqual(b);
  });

  it('changes when the body changes', () => {
    const header = makeHeader({ origin: origin(1) });
    expect(signingBytes(header, BODY)).not.toEqual(signingBytes(header, new Uint8Array([1])));
  });

  it('changes when a header field changes', () => {
    const a = signingBytes(makeHeader({ origin: origin(1) }), BODY);
    const b = signingBytes(makeHeader({ origin: origin(1), messageType: 'reject' }), BODY);
    expect(a).not.toEqual(b);
  });
});
