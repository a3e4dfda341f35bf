/**
 * Mnemonic set combination
 */

import { decrypt, encodePassphrase } from '../cipher/index.js';
import { MnemonicError } from '../errors.js';
import type { ShareFragment } from '../shamir/index.js';
import type { CommonParameters, Share, ShareCodec } from '../share/index.js';
import { zeroize } from '../utils/bytes.js';
import { ShareGroups } from './groups.js';
import type { MnemonicContext } from './types.js';

/**
 * Mnemonics decoded and sorted into groups
 */
export interface DecodedMnemonics {
  common: CommonParameters;
  groups: ShareGroups;
}

/**
 * Decode every mnemonic and check that they form one consistent set
 *
 * @throws {MnemonicError} EMPTY_MNEMONIC_SET, any decode error,
 *   MNEMONIC_SET_MISMATCH or DUPLICATE_MEMBER_INDEX
 */
export function decodeMnemonics(codec: ShareCodec, mnemonics: readonly string[]): DecodedMnemonics {
  if (mnemonics.length === 0) {
    throw new MnemonicError('The list of mnemonics is empty.', 'EMPTY_MNEMONIC_SET');
  }

  const shares = mnemonics.map((mnemonic) => codec.decode(mnemonic));
  const [first] = shares;
  const groups = new ShareGroups();

  shares.forEach((share, i) => {
    if (!first.hasCommonParameters(share)) {
      throw new MnemonicError(
        `Invalid set of mnemonics. Mnemonic ${i + 1} is not part of the same set as mnemonic 1.`,
        'MNEMONIC_SET_MISMATCH',
        { expected: first.commonParameters(), actual: share.commonParameters() }
      );
    }
    groups.add(share);
  });

  return { common: first.commonParameters(), groups };
}

function recombineGroup(context: MnemonicContext, members: readonly Share[]): Uint8Array {
  const threshold = members[0].memberThreshold;
  const fragments: ShareFragment[] = members
    .slice(0, threshold)
    .map((share) => ({ x: share.memberIndex, y: share.value }));
  return context.engine.recombine(threshold, fragments);
}

/**
 * Recover the master secret from a set of mnemonics
 *
 * Complete groups are used in group-index order, each contributing its
 * lowest member indices. A wrong passphrase is not detected: it yields a
 * different secret.
 *
 * @throws {MnemonicError} any decode or set-consistency error,
 *   NOT_ENOUGH_GROUPS, DIGEST_MISMATCH or INVALID_PASSPHRASE_ENCODING
 */
export function combineMnemonics(
  context: MnemonicContext,
  mnemonics: readonly string[],
  passphrase = ''
): Uint8Array {
  const passphraseBytes = encodePassphrase(passphrase);
  const { common, groups } = decodeMnemonics(context.codec, mnemonics);

  const complete = groups.completeGroupIndices();
  if (complete.length < common.groupThreshold) {
    throw new MnemonicError(
      `Insufficient number of complete mnemonic groups (${complete.length}). The required number of groups is ${common.groupThreshold}.`,
      'NOT_ENOUGH_GROUPS',
      { completed: complete.length, required: common.groupThreshold }
    );
  }

  const groupFragments: ShareFragment[] = complete
    .slice(0, common.groupThreshold)
    .map((groupIndex) => ({ x: groupIndex, y: recombineGroup(context, groups.members(groupIndex)) }));

  const encryptedSecret = context.engine.recombine(common.groupThreshold, groupFragments);
  zeroize(...groupFragments.map((f) => f.y));

  const masterSecret = decrypt(encryptedSecret, {
    passphrase: passphraseBytes,
    iterationExponent: common.iterationExponent,
    identifier: common.identifier,
  });
  zeroize(encryptedSecret);

  return masterSecret;
}
