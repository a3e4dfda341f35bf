/**
 * Share codec
 *
 * Wire layout of a mnemonic, in 10-bit words:
 *
 *   identifier (15) ‖ iteration exponent (5) ‖ group index (4) ‖
 *   group threshold - 1 (4) ‖ group count - 1 (4) ‖ member index (4) ‖
 *   member threshold - 1 (4)                          → 4 words
 *   share value, zero-padded at the front             → ceil(8·len / 10) words
 *   RS1024 checksum                                   → 3 words
 */

import { assertChecksum, createChecksum } from '../checksum/index.js';
import {
  CHECKSUM_LENGTH_WORDS,
  GROUP_PREFIX_LENGTH_WORDS,
  HEADER_LENGTH_WORDS,
  ID_LENGTH_BITS,
  ITERATION_EXP_LENGTH_BITS,
  METADATA_LENGTH_WORDS,
  MIN_MNEMONIC_LENGTH_WORDS,
  RADIX_BITS,
} from '../constants.js';
import { MnemonicError } from '../errors.js';
import { bigIntToBytes, bytesToBigInt } from '../utils/bytes.js';
import {
  bitsToWords,
  intFromIndices,
  intToIndices,
  type Wordlist,
} from '../wordlist/index.js';
import { Share } from './share.js';
import type { ShareParameters } from './types.js';

const NIBBLE_BITS = 4;

/** Header fields in wire order with their bit widths and stored offsets */
const HEADER_LAYOUT: ReadonlyArray<{
  field: keyof ShareParameters;
  bits: number;
  offset: number;
}> = [
  { field: 'identifier', bits: ID_LENGTH_BITS, offset: 0 },
  { field: 'iterationExponent', bits: ITERATION_EXP_LENGTH_BITS, offset: 0 },
  { field: 'groupIndex', bits: NIBBLE_BITS, offset: 0 },
  { field: 'groupThreshold', bits: NIBBLE_BITS, offset: 1 },
  { field: 'groupCount', bits: NIBBLE_BITS, offset: 1 },
  { field: 'memberIndex', bits: NIBBLE_BITS, offset: 0 },
  { field: 'memberThreshold', bits: NIBBLE_BITS, offset: 1 },
];

function packHeader(params: ShareParameters): bigint {
  let header = 0n;
  for (const { field, bits, offset } of HEADER_LAYOUT) {
    header = (header << BigInt(bits)) | BigInt(params[field] - offset);
  }
  return header;
}

function unpackHeader(header: bigint): ShareParameters {
  const params: ShareParameters = {
    identifier: 0,
    iterationExponent: 0,
    groupIndex: 0,
    groupThreshold: 0,
    groupCount: 0,
    memberIndex: 0,
    memberThreshold: 0,
  };
  let rest = header;
  for (let i = HEADER_LAYOUT.length - 1; i >= 0; i--) {
    const { field, bits, offset } = HEADER_LAYOUT[i];
    params[field] = Number(rest & ((1n << BigInt(bits)) - 1n)) + offset;
    rest >>= BigInt(bits);
  }
  return params;
}

/**
 * Encodes shares to mnemonics and back using one vocabulary
 */
export class ShareCodec {
  constructor(readonly wordlist: Wordlist) {}

  /**
   * Word indices of a share, checksum included
   */
  toIndices(share: Share): number[] {
    const data = [
      ...intToIndices(packHeader(share), HEADER_LENGTH_WORDS),
      ...intToIndices(bytesToBigInt(share.value), bitsToWords(share.value.length * 8)),
    ];
    return [...data, ...createChecksum(data)];
  }

  encode(share: Share): string {
    return this.wordlist.toMnemonic(this.toIndices(share));
  }

  /**
   * Parse a mnemonic. Word lookup, length and checksum are all verified
   * before any header field is read.
   *
   * @throws {MnemonicError} UNKNOWN_WORD, INVALID_WORD_COUNT,
   *   INVALID_CHECKSUM, INVALID_PADDING or INVALID_SHARE_PARAMETERS
   */
  decode(mnemonic: string): Share {
    const indices = this.wordlist.toIndices(mnemonic);

    if (indices.length < MIN_MNEMONIC_LENGTH_WORDS) {
      throw new MnemonicError(
        `Invalid mnemonic length. The length of each mnemonic must be at least ${MIN_MNEMONIC_LENGTH_WORDS} words.`,
        'INVALID_WORD_COUNT',
        { wordCount: indices.length }
      );
    }

    // Share values are a whole number of 16-bit units
    const paddingBits = (RADIX_BITS * (indices.length - METADATA_LENGTH_WORDS)) % 16;
    if (paddingBits > 8) {
      throw new MnemonicError('Invalid mnemonic length.', 'INVALID_WORD_COUNT', {
        wordCount: indices.length,
      });
    }

    assertChecksum(indices);

    const header = unpackHeader(intFromIndices(indices.slice(0, HEADER_LENGTH_WORDS)));

    const valueIndices = indices.slice(
      HEADER_LENGTH_WORDS,
      indices.length - CHECKSUM_LENGTH_WORDS
    );
    const valueByteCount = (RADIX_BITS * valueIndices.length - paddingBits) / 8;
    const valueInt = intFromIndices(valueIndices);
    if (valueInt >> BigInt(valueByteCount * 8) !== 0n) {
      throw new MnemonicError('Invalid mnemonic padding.', 'INVALID_PADDING');
    }

    return new Share({ ...header, value: bigIntToBytes(valueInt, valueByteCount) });
  }

  /**
   * True when `mnemonic` decodes to a well-formed share
   */
  validate(mnemonic: string): boolean {
    try {
      this.decode(mnemonic);
      return true;
    } catch (error) {
      if (error instanceof MnemonicError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * The leading words shared by every member of one group. They identify
   * the split and the group without revealing anything about the secret.
   *
   * @param share - Any share of the split
   * @param groupIndex - Group to describe (defaults to the share's own)
   */
  groupPrefix(share: Share, groupIndex: number = share.groupIndex): string {
    const indices = this.toIndices(share.withGroupIndex(groupIndex));
    return this.wordlist.toMnemonic(indices.slice(0, GROUP_PREFIX_LENGTH_WORDS));
  }
}
