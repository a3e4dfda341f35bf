/**
 * Mnemonic set generation
 *
 * Encrypts the master secret, splits it across groups and then splits each
 * group's fragment across that group's members.
 */

import { encodePassphrase, encrypt } from '../cipher/index.js';
import { ID_LENGTH_BITS, MIN_STRENGTH_BITS } from '../constants.js';
import { MnemonicError } from '../errors.js';
import { Share } from '../share/index.js';
import { zeroize, type RandomSource } from '../utils/bytes.js';
import {
  GenerateOptionsSchema,
  type GenerateOptions,
  type MnemonicContext,
  type ParsedGenerateOptions,
} from './types.js';

/**
 * Validate generate options, turning schema issues into INVALID_GROUP_CONFIG
 */
export function parseGenerateOptions(options: GenerateOptions): ParsedGenerateOptions {
  const result = GenerateOptionsSchema.safeParse(options);
  if (!result.success) {
    const [first] = result.error.errors;
    throw new MnemonicError(first?.message ?? 'Invalid generate options', 'INVALID_GROUP_CONFIG', {
      issues: result.error.errors,
    });
  }
  return result.data;
}

/**
 * @throws {MnemonicError} INVALID_SECRET_STRENGTH or INVALID_SECRET_LENGTH
 */
export function assertMasterSecret(masterSecret: Uint8Array): void {
  if (masterSecret.length * 8 < MIN_STRENGTH_BITS) {
    throw new MnemonicError(
      `The length of the master secret (${masterSecret.length} bytes) must be at least ${MIN_STRENGTH_BITS / 8} bytes.`,
      'INVALID_SECRET_STRENGTH',
      { length: masterSecret.length }
    );
  }

  if (masterSecret.length % 2 !== 0) {
    throw new MnemonicError(
      `The length of the master secret (${masterSecret.length} bytes) must be a multiple of 2.`,
      'INVALID_SECRET_LENGTH',
      { length: masterSecret.length }
    );
  }
}

/**
 * Fresh 15-bit identifier
 */
export function randomIdentifier(randomBytes: RandomSource): number {
  const bytes = randomBytes(2);
  return ((bytes[0] << 8) | bytes[1]) & ((1 << ID_LENGTH_BITS) - 1);
}

/**
 * Random master secret of the given strength
 *
 * @param strengthBits - At least 128 and a multiple of 16
 */
export function randomMasterSecret(randomBytes: RandomSource, strengthBits = MIN_STRENGTH_BITS): Uint8Array {
  if (!Number.isInteger(strengthBits) || strengthBits < MIN_STRENGTH_BITS || strengthBits % 16 !== 0) {
    throw new MnemonicError(
      `Invalid strength (${strengthBits} bits). It must be a multiple of 16 and at least ${MIN_STRENGTH_BITS}.`,
      'INVALID_SECRET_STRENGTH',
      { strengthBits }
    );
  }
  return randomBytes(strengthBits / 8);
}

/**
 * Split a master secret into mnemonic shares
 *
 * @returns One list of mnemonics per group, in the order of `options.groups`
 *
 * @example
 * ```typescript
 * // Two groups: a 1-of-1 backup and a 3-of-5 among friends; either suffices
 * const mnemonics = generateMnemonics(context, {
 *   groupThreshold: 1,
 *   groups: [
 *     { memberThreshold: 1, memberCount: 1 },
 *     { memberThreshold: 3, memberCount: 5 },
 *   ],
 *   masterSecret,
 * });
 * ```
 */
export function generateMnemonics(context: MnemonicContext, options: GenerateOptions): string[][] {
  const { groupThreshold, groups, masterSecret, passphrase, iterationExponent } =
    parseGenerateOptions(options);

  assertMasterSecret(masterSecret);
  const passphraseBytes = encodePassphrase(passphrase);

  const identifier = randomIdentifier(context.randomBytes);
  const encryptedSecret = encrypt(masterSecret, {
    passphrase: passphraseBytes,
    iterationExponent,
    identifier,
  });

  const groupFragments = context.engine.split(groupThreshold, groups.length, encryptedSecret);

  const mnemonics = groups.map(({ memberThreshold, memberCount }, groupIndex) => {
    const memberFragments = context.engine.split(
      memberThreshold,
      memberCount,
      groupFragments[groupIndex].y
    );

    const encoded = memberFragments.map(({ x, y }) =>
      context.codec.encode(
        new Share({
          identifier,
          iterationExponent,
          groupIndex,
          groupThreshold,
          groupCount: groups.length,
          memberIndex: x,
          memberThreshold,
          value: y,
        })
      )
    );

    zeroize(...memberFragments.map((f) => f.y));
    return encoded;
  });

  zeroize(encryptedSecret, ...groupFragments.map((f) => f.y));
  return mnemonics;
}
