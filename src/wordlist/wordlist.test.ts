/**
 * Tests for the word codec
 */

import { describe, it, expect } from 'vitest';
import {
  bitsToWords,
  intFromIndices,
  intToIndices,
  loadWordlist,
  splitMnemonic,
  Wordlist,
} from './index.js';
import { catchMnemonicError } from '../__tests__/helpers.js';

describe('Wordlist', () => {
  const wordlist = loadWordlist();

  it('should load the bundled 1024-word vocabulary', () => {
    expect(wordlist.words).toHaveLength(1024);
    expect(wordlist.wordAt(0)).toBe('academic');
    expect(wordlist.wordAt(1)).toBe('acid');
    expect(wordlist.wordAt(1023)).toBe('zero');
  });

  it('should map words to indices case-insensitively', () => {
    expect(wordlist.indexOf('analysis')).toBe(38);
    expect(wordlist.indexOf('Merchant')).toBe(576);
    expect(wordlist.has('ZERO')).toBe(true);
    expect(wordlist.has('xyzzy')).toBe(false);
  });

  it('should throw UNKNOWN_WORD for words outside the vocabulary', () => {
    const error = catchMnemonicError(() => wordlist.toIndices('academic xyzzy acid'));
    expect(error.code).toBe('UNKNOWN_WORD');
    expect(error.message).toBe('Invalid mnemonic word "xyzzy"');
  });

  it('should convert between mnemonics and indices', () => {
    expect(wordlist.toIndices('  analysis   merchant\tacademic ')).toEqual([38, 576, 0]);
    expect(wordlist.toMnemonic([38, 576, 0])).toBe('analysis merchant academic');
  });

  it('should reject an index out of range', () => {
    expect(() => wordlist.wordAt(1024)).toThrow(RangeError);
  });

  it('should reject a vocabulary of the wrong size', () => {
    expect(catchMnemonicError(() => new Wordlist(['a', 'b'])).code).toBe('INVALID_WORDLIST');
  });

  it('should reject a vocabulary with duplicates', () => {
    const words = [...wordlist.words];
    words[1] = words[0];
    expect(catchMnemonicError(() => new Wordlist(words)).code).toBe('INVALID_WORDLIST');
  });
});

describe('splitMnemonic', () => {
  it('should ignore surrounding and repeated whitespace', () => {
    expect(splitMnemonic('  a  b\nc ')).toEqual(['a', 'b', 'c']);
    expect(splitMnemonic('   ')).toEqual([]);
  });
});

describe('integer/index conversion', () => {
  it('should split integers into MSB-first 10-bit symbols', () => {
    expect(intToIndices((0x3ffn << 10n) | 5n, 2)).toEqual([1023, 5]);
    expect(intToIndices(1n, 3)).toEqual([0, 0, 1]);
    expect(intToIndices(1234n << 25n, 4)).toEqual([38, 576, 0, 0]);
  });

  it('should invert intToIndices', () => {
    expect(intFromIndices([1023, 5])).toBe((0x3ffn << 10n) | 5n);
    expect(intFromIndices([38, 576, 0, 0])).toBe(1234n << 25n);
  });

  it('should reject values that do not fit', () => {
    expect(() => intToIndices(1n << 20n, 2)).toThrow(RangeError);
  });

  it('should count words needed for a bit length', () => {
    expect(bitsToWords(128)).toBe(13);
    expect(bitsToWords(256)).toBe(26);
    expect(bitsToWords(10)).toBe(1);
  });
});
