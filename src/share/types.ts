/**
 * Types for mnemonic shares
 */

/**
 * Parameters every share of one split must agree on
 */
export interface CommonParameters {
  /** Random 15-bit value shared by all shares of a split */
  identifier: number;
  /** Key-stretching exponent of the passphrase cipher */
  iterationExponent: number;
  /** Groups needed to recover (1-16) */
  groupThreshold: number;
  /** Groups in the split (1-16) */
  groupCount: number;
}

/**
 * All metadata carried by a share's header
 */
export interface ShareParameters extends CommonParameters {
  /** 0-based index of the share's group */
  groupIndex: number;
  /** 0-based index of the share within its group */
  memberIndex: number;
  /** Shares needed to recover this group (1-16) */
  memberThreshold: number;
}

/**
 * Header plus share value
 */
export interface ShareData extends ShareParameters {
  /** y-value of the member polynomial at memberIndex */
  value: Uint8Array;
}
