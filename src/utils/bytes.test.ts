import { describe, it, expect } from 'vitest';
import {
  bigIntToBytes,
  bytesToBigInt,
  equalBytes,
  secureRandom,
  xorBytes,
  zeroize,
} from './bytes.js';

describe('byte helpers', () => {
  it('should XOR equal-length arrays', () => {
    expect(xorBytes(Uint8Array.of(0x0f, 0xf0), Uint8Array.of(0xff, 0xff))).toEqual(
      Uint8Array.of(0xf0, 0x0f)
    );
  });

  it('should refuse to XOR arrays of different length', () => {
    expect(() => xorBytes(new Uint8Array(2), new Uint8Array(3))).toThrow(RangeError);
  });

  it('should compare bytes', () => {
    expect(equalBytes(Uint8Array.of(1, 2, 3), Uint8Array.of(1, 2, 3))).toBe(true);
    expect(equalBytes(Uint8Array.of(1, 2, 3), Uint8Array.of(1, 2, 4))).toBe(false);
    expect(equalBytes(Uint8Array.of(1, 2), Uint8Array.of(1, 2, 3))).toBe(false);
  });

  it('should zero every buffer', () => {
    const a = Uint8Array.of(1, 2);
    const b = Uint8Array.of(3);
    zeroize(a, b);
    expect(a).toEqual(new Uint8Array(2));
    expect(b).toEqual(new Uint8Array(1));
  });

  it('should convert big-endian integers', () => {
    expect(bytesToBigInt(Uint8Array.of(0x01, 0x00))).toBe(256n);
    expect(bigIntToBytes(256n, 4)).toEqual(Uint8Array.of(0, 0, 1, 0));
    expect(bytesToBigInt(new Uint8Array(0))).toBe(0n);
  });

  it('should reject integers that do not fit', () => {
    expect(() => bigIntToBytes(256n, 1)).toThrow(RangeError);
    expect(() => bigIntToBytes(-1n, 1)).toThrow(RangeError);
  });

  it('should produce random bytes of the requested length', () => {
    expect(secureRandom(32)).toHaveLength(32);
  });
});
