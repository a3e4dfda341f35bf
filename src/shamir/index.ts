/**
 * Shamir Secret Sharing over GF(256)
 *
 * Implements (t, n) threshold sharing of byte strings where:
 * - Every byte position is shared by its own degree t-1 polynomial
 * - The secret sits at x = 255, and for t >= 2 an integrity fragment
 *   digest ‖ salt sits at x = 254
 * - The remaining t-2 basis points are random, so any t-1 fragments
 *   reveal nothing about the secret
 *
 * Recombination interpolates both reserved points and checks the digest,
 * which catches fragments that do not come from one split.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { concatBytes } from '@noble/hashes/utils';
import {
  DIGEST_INDEX,
  DIGEST_LENGTH_BYTES,
  MAX_SHARE_COUNT,
  SECRET_INDEX,
} from '../constants.js';
import { MnemonicError } from '../errors.js';
import { equalBytes, zeroize, type RandomSource } from '../utils/bytes.js';
import type { GF256 } from '../utils/gf256.js';
import type { ShamirEngineConfig, ShareFragment } from './types.js';

/**
 * Truncated HMAC-SHA256 of the secret keyed by the random salt
 */
export function createDigest(salt: Uint8Array, secret: Uint8Array): Uint8Array {
  return hmac(sha256, salt, secret).slice(0, DIGEST_LENGTH_BYTES);
}

/**
 * Evaluate the polynomials through `fragments` at `x` using Lagrange
 * interpolation.
 *
 * For each fragment i the basis polynomial is
 * L_i(x) = Π (x - x_j) / (x_i - x_j) for j ≠ i,
 * and subtraction in GF(256) is XOR.
 *
 * @param field - GF(256) tables
 * @param fragments - Interpolation nodes with unique x and equal-length y
 * @param x - The point at which to evaluate
 */
export function interpolate(
  field: GF256,
  fragments: readonly ShareFragment[],
  x: number
): Uint8Array {
  if (fragments.length === 0) {
    throw new MnemonicError('At least one fragment is required', 'NOT_ENOUGH_FRAGMENTS');
  }

  const xCoordinates = new Set(fragments.map((f) => f.x));
  if (xCoordinates.size !== fragments.length) {
    throw new MnemonicError(
      'Invalid set of shares. Share indices must be unique.',
      'DUPLICATE_FRAGMENT_INDEX',
      { indices: fragments.map((f) => f.x) }
    );
  }

  const length = fragments[0].y.length;
  if (fragments.some((f) => f.y.length !== length)) {
    throw new MnemonicError(
      'Invalid set of shares. All share values must have the same length.',
      'FRAGMENT_LENGTH_MISMATCH',
      { lengths: fragments.map((f) => f.y.length) }
    );
  }

  const known = fragments.find((f) => f.x === x);
  if (known) {
    return known.y.slice();
  }

  const result = new Uint8Array(length);
  for (const { x: xi, y: yi } of fragments) {
    let numerator = 1;
    let denominator = 1;
    for (const { x: xj } of fragments) {
      if (xj === xi) continue;
      numerator = field.mul(numerator, field.add(x, xj));
      denominator = field.mul(denominator, field.add(xi, xj));
    }
    const basis = field.div(numerator, denominator);

    for (let k = 0; k < length; k++) {
      result[k] = field.add(result[k], field.mul(basis, yi[k]));
    }
  }

  return result;
}

/**
 * Byte-string Shamir engine with an integrity digest fragment
 *
 * @example
 * ```typescript
 * const engine = new ShamirEngine({ field: new GF256(), randomBytes: secureRandom });
 * const fragments = engine.split(3, 5, secret);
 * const recovered = engine.recombine(3, [fragments[0], fragments[2], fragments[4]]);
 * ```
 */
export class ShamirEngine {
  private readonly field: GF256;
  private readonly randomBytes: RandomSource;

  constructor(config: ShamirEngineConfig) {
    this.field = config.field;
    this.randomBytes = config.randomBytes;
  }

  /**
   * Split a secret into `fragmentCount` fragments at x = 0..fragmentCount-1
   *
   * @param threshold - Fragments needed to recombine (t)
   * @param fragmentCount - Fragments to create (n)
   * @param secret - Bytes to share
   */
  split(threshold: number, fragmentCount: number, secret: Uint8Array): ShareFragment[] {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new MnemonicError('The requested threshold must be a positive integer.', 'INVALID_THRESHOLD', {
        threshold,
      });
    }

    if (threshold > fragmentCount) {
      throw new MnemonicError(
        `The requested threshold (${threshold}) must not exceed the number of shares (${fragmentCount}).`,
        'INVALID_THRESHOLD',
        { threshold, fragmentCount }
      );
    }

    if (fragmentCount > MAX_SHARE_COUNT) {
      throw new MnemonicError(
        `The requested number of shares (${fragmentCount}) must not exceed ${MAX_SHARE_COUNT}.`,
        'INVALID_SHARE_COUNT',
        { fragmentCount }
      );
    }

    // Any single fragment is the secret itself
    if (threshold === 1) {
      return Array.from({ length: fragmentCount }, (_, x) => ({ x, y: secret.slice() }));
    }

    if (secret.length < DIGEST_LENGTH_BYTES) {
      throw new MnemonicError(
        `The secret must be at least ${DIGEST_LENGTH_BYTES} bytes long to be shared.`,
        'INVALID_SECRET_LENGTH',
        { length: secret.length }
      );
    }

    const randomFragmentCount = threshold - 2;
    const fragments: ShareFragment[] = [];
    for (let x = 0; x < randomFragmentCount; x++) {
      fragments.push({ x, y: this.randomBytes(secret.length) });
    }

    const salt = this.randomBytes(secret.length - DIGEST_LENGTH_BYTES);
    const digestFragment = concatBytes(createDigest(salt, secret), salt);

    const basis: ShareFragment[] = [
      ...fragments,
      { x: DIGEST_INDEX, y: digestFragment },
      { x: SECRET_INDEX, y: secret },
    ];

    for (let x = randomFragmentCount; x < fragmentCount; x++) {
      fragments.push({ x, y: interpolate(this.field, basis, x) });
    }

    zeroize(salt, digestFragment);
    return fragments;
  }

  /**
   * Recombine exactly `threshold` fragments into the secret
   *
   * @throws {MnemonicError} NOT_ENOUGH_FRAGMENTS, TOO_MANY_FRAGMENTS,
   *   DUPLICATE_FRAGMENT_INDEX or DIGEST_MISMATCH
   */
  recombine(threshold: number, fragments: readonly ShareFragment[]): Uint8Array {
    if (fragments.length === 0) {
      throw new MnemonicError('No fragments were supplied.', 'NOT_ENOUGH_FRAGMENTS', {
        threshold,
      });
    }

    if (threshold === 1) {
      return fragments[0].y.slice();
    }

    if (new Set(fragments.map((f) => f.x)).size !== fragments.length) {
      throw new MnemonicError(
        'Invalid set of shares. Share indices must be unique.',
        'DUPLICATE_FRAGMENT_INDEX',
        { indices: fragments.map((f) => f.x) }
      );
    }

    if (fragments.length < threshold) {
      throw new MnemonicError(
        `Insufficient number of shares. The threshold is ${threshold}, but ${fragments.length} were provided.`,
        'NOT_ENOUGH_FRAGMENTS',
        { threshold, provided: fragments.length }
      );
    }

    if (fragments.length > threshold) {
      throw new MnemonicError(
        `Too many shares. Exactly ${threshold} are required, but ${fragments.length} were provided.`,
        'TOO_MANY_FRAGMENTS',
        { threshold, provided: fragments.length }
      );
    }

    const secret = interpolate(this.field, fragments, SECRET_INDEX);
    const digestFragment = interpolate(this.field, fragments, DIGEST_INDEX);
    const digest = digestFragment.subarray(0, DIGEST_LENGTH_BYTES);
    const salt = digestFragment.subarray(DIGEST_LENGTH_BYTES);

    const valid = equalBytes(digest, createDigest(salt, secret));
    zeroize(digestFragment);

    if (!valid) {
      zeroize(secret);
      throw new MnemonicError('Invalid digest of the shared secret.', 'DIGEST_MISMATCH');
    }

    return secret;
  }
}

export type { ShareFragment, ShamirEngineConfig } from './types.js';
