import { describe, expect, it } from 'vitest';
import { bytesEqual, bytesToHex, concatBytes, hexToBytes } from './bytes.js';

describe('bytes helpers', () => {
  it('encodes bytes as lowercase hex', () => {
    expect(bytesToHex(new Uint8Array([0, 15, 16, 255]))).toBe('000f10ff');
  });

  it('parses mixed-case hex', () => {
    expect(Array.from(hexToBytes('00Ff10'))).toEqual([0, 255, 16]);
  });

  it('rejects odd-length hex', () => {
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string');
  });

  it('rejects non-hex characters', () => {
    expect(() => hexToBytes('zz')).toThrow('Invalid hex string');
  });

  it('compares byte arrays by value', () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(bytesEqual(new Uint8Array([1]), new Uint8Array([1, 2]))).toBe(false);
  });

  it('concatenates in order', () => {
    expect(Array.from(concatBytes(new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3])))).toEqual([1, 2, 3]);
  });
});
