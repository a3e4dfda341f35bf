/**
 * Recovery session
 *
 * Accumulates mnemonics entered one at a time and decides when the
 * collected shares are enough to recover the master secret:
 * EMPTY → COLLECTING → COMPLETE, or CANCELLED from either open phase.
 *
 * Decode and set-consistency errors are returned to the caller instead of
 * thrown so that an interactive loop can report them and keep prompting.
 */

import { isMnemonicError, isRecoverableByReentry, MnemonicError } from '../errors.js';
import { ShareGroups } from '../mnemonic/groups.js';
import type { Share, ShareCodec } from '../share/index.js';
import {
  RecoveryPhase,
  type AcceptResult,
  type GroupStatus,
  type RecoveryStatus,
} from './types.js';

/**
 * Recovers the secret from the accepted mnemonics
 */
export type CombineFunction = (mnemonics: readonly string[], passphrase: string) => Uint8Array;

const VALID_TRANSITIONS: Record<RecoveryPhase, RecoveryPhase[]> = {
  [RecoveryPhase.EMPTY]: [RecoveryPhase.COLLECTING, RecoveryPhase.CANCELLED],
  [RecoveryPhase.COLLECTING]: [RecoveryPhase.COMPLETE, RecoveryPhase.CANCELLED],
  [RecoveryPhase.COMPLETE]: [],
  [RecoveryPhase.CANCELLED]: [],
};

export function isValidTransition(from: RecoveryPhase, to: RecoveryPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Interactive share collector
 *
 * @example
 * ```typescript
 * const session = new RecoverySession(codec, (m, p) => combineMnemonics(context, m, p));
 * for (const mnemonic of entered) {
 *   const result = session.accept(mnemonic);
 *   if (!result.accepted) console.error(result.error.message);
 *   if (session.isComplete()) break;
 * }
 * const secret = session.recover(passphrase);
 * ```
 */
export class RecoverySession {
  private phase: RecoveryPhase = RecoveryPhase.EMPTY;
  private lastShare: Share | null = null;
  private readonly groups = new ShareGroups();
  private readonly accepted: string[] = [];

  constructor(
    private readonly codec: ShareCodec,
    private readonly combine: CombineFunction
  ) {}

  get currentPhase(): RecoveryPhase {
    return this.phase;
  }

  /**
   * Accepted mnemonics in entry order
   */
  get mnemonics(): readonly string[] {
    return [...this.accepted];
  }

  /**
   * Offer a mnemonic to the session
   *
   * @throws {MnemonicError} INVALID_SESSION_STATE once the session is
   *   complete or cancelled
   */
  accept(mnemonic: string): AcceptResult {
    if (this.phase === RecoveryPhase.COMPLETE || this.phase === RecoveryPhase.CANCELLED) {
      throw new MnemonicError(
        `Cannot accept shares in phase ${this.phase}`,
        'INVALID_SESSION_STATE',
        { phase: this.phase }
      );
    }

    let share: Share;
    let duplicate: boolean;
    try {
      share = this.codec.decode(mnemonic);
      if (this.lastShare && !this.lastShare.hasCommonParameters(share)) {
        throw new MnemonicError(
          'This mnemonic is not part of the current set.',
          'MNEMONIC_SET_MISMATCH',
          { expected: this.lastShare.commonParameters(), actual: share.commonParameters() }
        );
      }
      duplicate = this.groups.add(share) === 'duplicate';
    } catch (error) {
      if (isMnemonicError(error) && isRecoverableByReentry(error)) {
        return { accepted: false, error, status: this.status() };
      }
      throw error;
    }

    this.lastShare = share;
    if (!duplicate) {
      this.accepted.push(mnemonic.trim());
    }

    if (this.phase === RecoveryPhase.EMPTY) {
      this.transition(RecoveryPhase.COLLECTING);
    }
    if (this.isComplete()) {
      this.transition(RecoveryPhase.COMPLETE);
    }

    return { accepted: true, share, duplicate, status: this.status() };
  }

  groupIsComplete(groupIndex: number): boolean {
    return this.groups.isGroupComplete(groupIndex);
  }

  completedGroupCount(): number {
    return this.groups.completeGroupIndices().length;
  }

  isComplete(): boolean {
    if (!this.lastShare) {
      return false;
    }
    return this.completedGroupCount() >= this.lastShare.groupThreshold;
  }

  /**
   * Leading words identifying a group of the current set
   */
  groupPrefix(groupIndex: number): string {
    if (!this.lastShare) {
      throw new MnemonicError('No share has been accepted yet', 'INVALID_SESSION_STATE', {
        phase: this.phase,
      });
    }
    return this.codec.groupPrefix(this.lastShare, groupIndex);
  }

  status(): RecoveryStatus {
    const share = this.lastShare;
    if (!share) {
      return { phase: this.phase, completedGroups: 0, groups: [] };
    }

    const groups: GroupStatus[] = [];
    for (let groupIndex = 0; groupIndex < share.groupCount; groupIndex++) {
      groups.push({
        groupIndex,
        prefix: this.codec.groupPrefix(share, groupIndex),
        collected: this.groups.size(groupIndex),
        threshold: this.groups.memberThreshold(groupIndex),
        complete: this.groups.isGroupComplete(groupIndex),
      });
    }

    return {
      phase: this.phase,
      completedGroups: this.completedGroupCount(),
      groupThreshold: share.groupThreshold,
      groupCount: share.groupCount,
      groups,
    };
  }

  /**
   * Abandon the session; nothing is recovered
   */
  cancel(): void {
    this.transition(RecoveryPhase.CANCELLED);
    this.accepted.length = 0;
  }

  /**
   * Recover the master secret from the accepted mnemonics
   *
   * @throws {MnemonicError} INVALID_SESSION_STATE before COMPLETE, or any
   *   reconstruction error from combining
   */
  recover(passphrase = ''): Uint8Array {
    if (this.phase !== RecoveryPhase.COMPLETE) {
      throw new MnemonicError(
        `Cannot recover the secret in phase ${this.phase}`,
        'INVALID_SESSION_STATE',
        { phase: this.phase }
      );
    }
    return this.combine(this.accepted, passphrase);
  }

  private transition(to: RecoveryPhase): void {
    if (!isValidTransition(this.phase, to)) {
      throw new MnemonicError(
        `Invalid phase transition: ${this.phase} → ${to}`,
        'INVALID_SESSION_STATE',
        { from: this.phase, to }
      );
    }
    this.phase = to;
  }
}
