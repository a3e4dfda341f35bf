/**
 * Types for the GF(256) Shamir engine
 */

import type { GF256 } from '../utils/gf256.js';
import type { RandomSource } from '../utils/bytes.js';

/**
 * One point of the sharing polynomials.
 *
 * Each byte position of `y` is an independent polynomial evaluated at `x`.
 */
export interface ShareFragment {
  /** The x-coordinate: 0-252 for ordinary fragments, 254 digest, 255 secret */
  x: number;
  /** The y-coordinates, one per secret byte */
  y: Uint8Array;
}

/**
 * Collaborators for the Shamir engine
 */
export interface ShamirEngineConfig {
  /** Shared GF(256) tables */
  field: GF256;
  /** Random bytes for fragments and digest salt */
  randomBytes: RandomSource;
}
