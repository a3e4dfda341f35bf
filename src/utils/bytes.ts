/**
 * Byte helpers shared by the cipher, the Shamir engine and the share codec
 */

import { randomBytes } from '@noble/hashes/utils';

/**
 * Source of uniformly random bytes
 */
export type RandomSource = (length: number) => Uint8Array;

/** Default CSPRNG (crypto.getRandomValues under the hood) */
export const secureRandom: RandomSource = (length) => randomBytes(length);

/**
 * Element-wise XOR of two equal-length arrays
 */
export function xorBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length !== b.length) {
    throw new RangeError(`Cannot XOR arrays of length ${a.length} and ${b.length}`);
  }
  const out = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] ^ b[i];
  }
  return out;
}

/**
 * Constant-time equality of two byte arrays
 */
export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Overwrite key material in place
 */
export function zeroize(...buffers: Uint8Array[]): void {
  for (const buffer of buffers) {
    buffer.fill(0);
  }
}

/**
 * Big-endian unsigned integer from bytes
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Big-endian bytes of a non-negative integer, left-padded to `length`
 */
export function bigIntToBytes(value: bigint, length: number): Uint8Array {
  if (value < 0n || value >> BigInt(length * 8) !== 0n) {
    throw new RangeError(`Value does not fit in ${length} bytes`);
  }
  const out = new Uint8Array(length);
  let rest = value;
  for (let i = length - 1; i >= 0; i--) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}
