/**
 * Passphrase cipher
 *
 * A 4-round Feistel network that encrypts the master secret before it is
 * split. The round function is PBKDF2-HMAC-SHA256 keyed by the round
 * number and passphrase and salted with the share identifier, so the same
 * passphrase under another identifier decrypts to a different value.
 *
 * There is no "no passphrase" mode: the empty passphrase runs through the
 * same network.
 */

import { pbkdf2 } from '@noble/hashes/pbkdf2';
import { sha256 } from '@noble/hashes/sha256';
import { concatBytes, utf8ToBytes } from '@noble/hashes/utils';
import {
  BASE_ITERATION_COUNT,
  CUSTOMIZATION_STRING,
  ID_LENGTH_BITS,
  MAX_ITERATION_EXPONENT,
  ROUND_COUNT,
} from '../constants.js';
import { MnemonicError } from '../errors.js';
import { bigIntToBytes, xorBytes, zeroize } from '../utils/bytes.js';

const MIN_PASSPHRASE_CHAR = 32;
const MAX_PASSPHRASE_CHAR = 126;

const ROUNDS = Array.from({ length: ROUND_COUNT }, (_, i) => i);

/**
 * Parameters binding a ciphertext to one split
 */
export interface CipherParams {
  /** Passphrase bytes (printable ASCII); empty for none */
  passphrase: Uint8Array;
  /** Key-stretching exponent, 0-31 */
  iterationExponent: number;
  /** 15-bit identifier of the split */
  identifier: number;
}

/**
 * Encode a passphrase, accepting printable ASCII only
 *
 * @throws {MnemonicError} INVALID_PASSPHRASE_ENCODING
 */
export function encodePassphrase(passphrase: string): Uint8Array {
  for (let i = 0; i < passphrase.length; i++) {
    const code = passphrase.charCodeAt(i);
    if (code < MIN_PASSPHRASE_CHAR || code > MAX_PASSPHRASE_CHAR) {
      throw new MnemonicError(
        'The passphrase must contain only printable ASCII characters (code points 32-126).',
        'INVALID_PASSPHRASE_ENCODING',
        { position: i }
      );
    }
  }
  return utf8ToBytes(passphrase);
}

/**
 * PBKDF2 iterations spent in each Feistel round
 */
export function roundIterations(iterationExponent: number): number {
  if (
    !Number.isInteger(iterationExponent) ||
    iterationExponent < 0 ||
    iterationExponent > MAX_ITERATION_EXPONENT
  ) {
    throw new MnemonicError(
      `Iteration exponent must be an integer between 0 and ${MAX_ITERATION_EXPONENT}.`,
      'INVALID_ITERATION_EXPONENT',
      { iterationExponent }
    );
  }
  return Math.floor((BASE_ITERATION_COUNT * 2 ** iterationExponent) / ROUND_COUNT);
}

/**
 * Salt prefix: customization string ‖ identifier (big-endian)
 */
export function cipherSalt(identifier: number): Uint8Array {
  return concatBytes(
    utf8ToBytes(CUSTOMIZATION_STRING),
    bigIntToBytes(BigInt(identifier), Math.ceil(ID_LENGTH_BITS / 8))
  );
}

function roundFunction(
  round: number,
  params: CipherParams,
  salt: Uint8Array,
  half: Uint8Array
): Uint8Array {
  return pbkdf2(
    sha256,
    concatBytes(Uint8Array.of(round), params.passphrase),
    concatBytes(salt, half),
    { c: roundIterations(params.iterationExponent), dkLen: half.length }
  );
}

function feistel(data: Uint8Array, params: CipherParams, rounds: readonly number[]): Uint8Array {
  if (data.length % 2 !== 0) {
    throw new MnemonicError(
      `The length of the secret (${data.length} bytes) must be a multiple of 2.`,
      'INVALID_SECRET_LENGTH',
      { length: data.length }
    );
  }

  const halfLength = data.length / 2;
  let left = data.slice(0, halfLength);
  let right = data.slice(halfLength);
  const salt = cipherSalt(params.identifier);

  for (const round of rounds) {
    const f = roundFunction(round, params, salt, right);
    const next = xorBytes(left, f);
    zeroize(f, left);
    left = right;
    right = next;
  }

  const result = concatBytes(right, left);
  zeroize(left, right);
  return result;
}

/**
 * Encrypt a master secret (rounds 0..3)
 */
export function encrypt(masterSecret: Uint8Array, params: CipherParams): Uint8Array {
  return feistel(masterSecret, params, ROUNDS);
}

/**
 * Decrypt an encrypted master secret (rounds 3..0)
 *
 * A wrong passphrase is not detected here; it yields a different secret.
 */
export function decrypt(encryptedSecret: Uint8Array, params: CipherParams): Uint8Array {
  return feistel(encryptedSecret, params, [...ROUNDS].reverse());
}
