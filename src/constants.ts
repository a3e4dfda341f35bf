/**
 * Protocol constants
 *
 * Bit widths, reserved fragment indices and cipher parameters shared by
 * every layer of the mnemonic share format.
 */

/** Bits encoded by one word */
export const RADIX_BITS = 10;

/** Number of words in the vocabulary */
export const RADIX = 1 << RADIX_BITS;

/** Bit length of the random identifier common to all shares of a split */
export const ID_LENGTH_BITS = 15;

/** Bit length of the iteration exponent field */
export const ITERATION_EXP_LENGTH_BITS = 5;

/** Words occupied by identifier + iteration exponent */
export const ID_EXP_LENGTH_WORDS = Math.ceil(
  (ID_LENGTH_BITS + ITERATION_EXP_LENGTH_BITS) / RADIX_BITS
);

/** Words of the fixed share header (identifier through member threshold) */
export const HEADER_LENGTH_WORDS = ID_EXP_LENGTH_WORDS + 2;

/** Maximum number of groups, and of members within a group */
export const MAX_SHARE_COUNT = 16;

/** Trailing RS1024 checksum words */
export const CHECKSUM_LENGTH_WORDS = 3;

/** Header plus checksum: every word that is not share value */
export const METADATA_LENGTH_WORDS = HEADER_LENGTH_WORDS + CHECKSUM_LENGTH_WORDS;

/** Bytes of the HMAC digest kept in the digest fragment */
export const DIGEST_LENGTH_BYTES = 4;

/** Customization string for the checksum and the cipher salt */
export const CUSTOMIZATION_STRING = 'shamir';

/**
 * Words at the start of a mnemonic that depend only on the identifier,
 * iteration exponent, group index, group threshold and group count.
 */
export const GROUP_PREFIX_LENGTH_WORDS = ID_EXP_LENGTH_WORDS + 1;

/** Smallest master secret accepted, in bits */
export const MIN_STRENGTH_BITS = 128;

export const MIN_MNEMONIC_LENGTH_WORDS =
  METADATA_LENGTH_WORDS + Math.ceil(MIN_STRENGTH_BITS / RADIX_BITS);

/** PBKDF2 iterations spent across all Feistel rounds at exponent 0 */
export const BASE_ITERATION_COUNT = 10000;

/** Feistel rounds */
export const ROUND_COUNT = 4;

/** Largest iteration exponent that fits its field */
export const MAX_ITERATION_EXPONENT = (1 << ITERATION_EXP_LENGTH_BITS) - 1;

/** x-coordinate of the fragment holding the shared secret */
export const SECRET_INDEX = 255;

/** x-coordinate of the fragment holding digest ‖ salt */
export const DIGEST_INDEX = 254;
