/**
 * Shared test helpers
 */

import { MnemonicError } from '../errors.js';
import type { RandomSource } from '../utils/bytes.js';

/**
 * Run `fn` and return the MnemonicError it throws
 */
export function catchMnemonicError(fn: () => unknown): MnemonicError {
  try {
    fn();
  } catch (error) {
    if (error instanceof MnemonicError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a MnemonicError to be thrown');
}

/**
 * Reproducible byte stream (a linear congruential sequence mod 256)
 */
export function sequentialRandom(seed = 1): RandomSource {
  let state = seed & 0xff;
  return (length) =>
    Uint8Array.from({ length }, () => {
      state = (state * 73 + 41) & 0xff;
      return state;
    });
}

export function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function fromHex(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, 'hex'));
}
