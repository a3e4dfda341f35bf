/**
 * RS1024 checksum
 *
 * A Reed-Solomon code over GF(1024) that protects a mnemonic against
 * transcription errors. Three checksum symbols are appended so that the
 * customization string, the data and the checksum together leave a
 * polynomial residue of exactly 1. Any single-word error, and any error
 * confined to three consecutive words, is guaranteed to be detected.
 */

import { CHECKSUM_LENGTH_WORDS, CUSTOMIZATION_STRING, RADIX_BITS } from '../constants.js';
import { MnemonicError } from '../errors.js';

const GENERATOR = [
  0xe0e040, 0x1c1c080, 0x3838100, 0x7070200, 0xe0e0009,
  0x1c0c2412, 0x38086c24, 0x3090fc48, 0x21b1f890, 0x3f3f120,
] as const;

const SYMBOL_MASK = (1 << RADIX_BITS) - 1;

function customizationSymbols(customization: string): number[] {
  return Array.from(customization, (c) => c.charCodeAt(0));
}

/**
 * Residue of a symbol sequence modulo the RS1024 generator polynomial
 */
export function polymod(values: readonly number[]): number {
  let chk = 1;
  for (const value of values) {
    const top = chk >>> 20;
    chk = ((chk & 0xfffff) << 10) ^ value;
    for (let i = 0; i < GENERATOR.length; i++) {
      if ((top >>> i) & 1) {
        chk ^= GENERATOR[i];
      }
    }
  }
  return chk;
}

/**
 * Compute the checksum symbols for `data`
 *
 * @returns CHECKSUM_LENGTH_WORDS symbols, most significant first
 */
export function createChecksum(
  data: readonly number[],
  customization: string = CUSTOMIZATION_STRING
): number[] {
  const values = [
    ...customizationSymbols(customization),
    ...data,
    ...new Array<number>(CHECKSUM_LENGTH_WORDS).fill(0),
  ];
  const residue = polymod(values) ^ 1;

  const checksum: number[] = [];
  for (let i = CHECKSUM_LENGTH_WORDS - 1; i >= 0; i--) {
    checksum.push((residue >>> (RADIX_BITS * i)) & SYMBOL_MASK);
  }
  return checksum;
}

/**
 * Check `data` including its trailing checksum symbols
 */
export function verifyChecksum(
  data: readonly number[],
  customization: string = CUSTOMIZATION_STRING
): boolean {
  return polymod([...customizationSymbols(customization), ...data]) === 1;
}

/**
 * @throws {MnemonicError} INVALID_CHECKSUM
 */
export function assertChecksum(
  data: readonly number[],
  customization: string = CUSTOMIZATION_STRING
): void {
  if (!verifyChecksum(data, customization)) {
    throw new MnemonicError(
      'Invalid mnemonic checksum',
      'INVALID_CHECKSUM',
      { wordCount: data.length }
    );
  }
}
