/**
 * Types for interactive share recovery
 */

import type { MnemonicError } from '../errors.js';
import type { Share } from '../share/index.js';

// =============================================================================
// Session Phases
// =============================================================================

/**
 * Phases of a recovery session
 */
export enum RecoveryPhase {
  /** No share accepted yet */
  EMPTY = 'EMPTY',
  /** Shares are being collected */
  COLLECTING = 'COLLECTING',
  /** Enough groups are complete to recover the secret */
  COMPLETE = 'COMPLETE',
  /** Abandoned by the caller */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// Accept Results
// =============================================================================

/**
 * Outcome of offering one mnemonic to the session
 */
export type AcceptResult =
  | {
      accepted: true;
      share: Share;
      /** The identical share was already held; nothing changed */
      duplicate: boolean;
      status: RecoveryStatus;
    }
  | {
      accepted: false;
      /** Decode or set-consistency error explaining the rejection */
      error: MnemonicError;
      status: RecoveryStatus;
    };

// =============================================================================
// Status
// =============================================================================

export interface GroupStatus {
  groupIndex: number;
  /** Leading words shared by every mnemonic of the group */
  prefix: string;
  /** Distinct shares collected */
  collected: number;
  /** Member threshold, once a share of the group has been seen */
  threshold?: number;
  complete: boolean;
}

export interface RecoveryStatus {
  phase: RecoveryPhase;
  /** Complete groups so far */
  completedGroups: number;
  /** Groups needed; undefined until the first share is accepted */
  groupThreshold?: number;
  groupCount?: number;
  /** One entry per group of the split, empty before the first share */
  groups: GroupStatus[];
}
