/**
 * Shares collected per group
 *
 * Each group is a set keyed by the share's structural key, so an identical
 * share added twice is stored once. A different share claiming a member
 * index that is already held is refused rather than kept alongside.
 */

import { MnemonicError } from '../errors.js';
import type { Share } from '../share/index.js';

export type AddShareOutcome = 'added' | 'duplicate';

export class ShareGroups {
  private readonly groups = new Map<number, Map<string, Share>>();

  /**
   * Add a share to its group
   *
   * @throws {MnemonicError} MNEMONIC_SET_MISMATCH when the member threshold
   *   differs from the group's, DUPLICATE_MEMBER_INDEX when another share
   *   already holds the member index
   */
  add(share: Share): AddShareOutcome {
    let group = this.groups.get(share.groupIndex);
    if (!group) {
      group = new Map();
      this.groups.set(share.groupIndex, group);
    }

    const key = share.key();
    if (group.has(key)) {
      return 'duplicate';
    }

    for (const existing of group.values()) {
      if (existing.memberThreshold !== share.memberThreshold) {
        throw new MnemonicError(
          'Invalid set of mnemonics. All mnemonics in a group must have the same member threshold.',
          'MNEMONIC_SET_MISMATCH',
          {
            groupIndex: share.groupIndex,
            expected: existing.memberThreshold,
            actual: share.memberThreshold,
          }
        );
      }
      if (existing.memberIndex === share.memberIndex) {
        throw new MnemonicError(
          `A different share with member index ${share.memberIndex + 1} was already entered for this group.`,
          'DUPLICATE_MEMBER_INDEX',
          { groupIndex: share.groupIndex, memberIndex: share.memberIndex }
        );
      }
    }

    group.set(key, share);
    return 'added';
  }

  /**
   * Shares of a group ordered by member index
   */
  members(groupIndex: number): Share[] {
    const group = this.groups.get(groupIndex);
    if (!group) {
      return [];
    }
    return [...group.values()].sort((a, b) => a.memberIndex - b.memberIndex);
  }

  /**
   * Member threshold of a group, or undefined while it is empty
   */
  memberThreshold(groupIndex: number): number | undefined {
    const group = this.groups.get(groupIndex);
    if (!group) {
      return undefined;
    }
    for (const share of group.values()) {
      return share.memberThreshold;
    }
    return undefined;
  }

  size(groupIndex: number): number {
    return this.groups.get(groupIndex)?.size ?? 0;
  }

  isGroupComplete(groupIndex: number): boolean {
    const threshold = this.memberThreshold(groupIndex);
    return threshold !== undefined && this.size(groupIndex) >= threshold;
  }

  /**
   * Indices of complete groups in ascending order
   */
  completeGroupIndices(): number[] {
    return [...this.groups.keys()]
      .filter((groupIndex) => this.isGroupComplete(groupIndex))
      .sort((a, b) => a - b);
  }
}
