/**
 * Word codec
 *
 * Maps 10-bit symbols to and from a fixed 1024-word vocabulary, and
 * converts between integers and MSB-first symbol sequences.
 */

import { readFileSync } from 'node:fs';
import { RADIX, RADIX_BITS } from '../constants.js';
import { MnemonicError } from '../errors.js';

/** Vocabulary shipped with the package, one word per line */
export const DEFAULT_WORDLIST_URL = new URL('../../data/wordlist.txt', import.meta.url);

const SYMBOL_MASK = BigInt(RADIX - 1);
const RADIX_BITS_BIG = BigInt(RADIX_BITS);

/**
 * An immutable 1024-word vocabulary
 */
export class Wordlist {
  readonly words: readonly string[];
  private readonly indexByWord: ReadonlyMap<string, number>;

  constructor(words: readonly string[]) {
    if (words.length !== RADIX) {
      throw new MnemonicError(
        `Wordlist must contain exactly ${RADIX} words, got ${words.length}`,
        'INVALID_WORDLIST',
        { count: words.length }
      );
    }

    const indexByWord = new Map<string, number>();
    words.forEach((word, index) => {
      if (indexByWord.has(word)) {
        throw new MnemonicError(`Duplicate word in wordlist: ${word}`, 'INVALID_WORDLIST', {
          word,
        });
      }
      indexByWord.set(word, index);
    });

    this.words = Object.freeze([...words]);
    this.indexByWord = indexByWord;
  }

  /**
   * Word for a 10-bit symbol
   */
  wordAt(index: number): string {
    const word = this.words[index];
    if (word === undefined) {
      throw new RangeError(`Word index out of range: ${index}`);
    }
    return word;
  }

  /**
   * Symbol for a word (case-insensitive)
   *
   * @throws {MnemonicError} UNKNOWN_WORD
   */
  indexOf(word: string): number {
    const index = this.indexByWord.get(word.toLowerCase());
    if (index === undefined) {
      throw new MnemonicError(`Invalid mnemonic word "${word}"`, 'UNKNOWN_WORD', { word });
    }
    return index;
  }

  has(word: string): boolean {
    return this.indexByWord.has(word.toLowerCase());
  }

  /**
   * Split a mnemonic on whitespace and look up every word
   */
  toIndices(mnemonic: string): number[] {
    return splitMnemonic(mnemonic).map((word) => this.indexOf(word));
  }

  toMnemonic(indices: readonly number[]): string {
    return indices.map((index) => this.wordAt(index)).join(' ');
  }
}

/**
 * Words of a mnemonic, ignoring surrounding and repeated whitespace
 */
export function splitMnemonic(mnemonic: string): string[] {
  const trimmed = mnemonic.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/**
 * Read a vocabulary file (one word per line, blank lines ignored)
 */
export function loadWordlist(path: string | URL = DEFAULT_WORDLIST_URL): Wordlist {
  const words = readFileSync(path, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return new Wordlist(words);
}

/**
 * Split a non-negative integer into `length` 10-bit symbols, most
 * significant first; unused high symbols are zero.
 */
export function intToIndices(value: bigint, length: number): number[] {
  if (value < 0n || value >> (RADIX_BITS_BIG * BigInt(length)) !== 0n) {
    throw new RangeError(`Value does not fit in ${length} words`);
  }
  const indices = new Array<number>(length);
  let rest = value;
  for (let i = length - 1; i >= 0; i--) {
    indices[i] = Number(rest & SYMBOL_MASK);
    rest >>= RADIX_BITS_BIG;
  }
  return indices;
}

/**
 * Inverse of {@link intToIndices}
 */
export function intFromIndices(indices: readonly number[]): bigint {
  let value = 0n;
  for (const index of indices) {
    value = (value << RADIX_BITS_BIG) | BigInt(index);
  }
  return value;
}

/**
 * Words needed to hold `bits` bits
 */
export function bitsToWords(bits: number): number {
  return Math.ceil(bits / RADIX_BITS);
}
