/**
 * Error taxonomy
 *
 * Every failure raised by the library is a MnemonicError carrying a code.
 * The category tells callers how to react: decode and set-consistency
 * errors can be answered by asking for another mnemonic, reconstruction
 * failures end the current attempt, the rest are usage errors.
 */

export enum ErrorCategory {
  /** Bad scheme, threshold or argument, rejected before any cryptography */
  INPUT_VALIDATION = 'INPUT_VALIDATION',
  /** Malformed or mistyped mnemonic */
  DECODE = 'DECODE',
  /** Mnemonic does not belong with the others */
  SET_CONSISTENCY = 'SET_CONSISTENCY',
  /** Shares were well-formed but do not reconstruct a secret */
  RECONSTRUCTION = 'RECONSTRUCTION',
  /** Passphrase cipher rejected its input */
  CIPHER = 'CIPHER',
}

const CATEGORY_BY_CODE = {
  INVALID_THRESHOLD: ErrorCategory.INPUT_VALIDATION,
  INVALID_SHARE_COUNT: ErrorCategory.INPUT_VALIDATION,
  INVALID_GROUP_CONFIG: ErrorCategory.INPUT_VALIDATION,
  INVALID_SECRET_STRENGTH: ErrorCategory.INPUT_VALIDATION,
  INVALID_SECRET_HEX: ErrorCategory.INPUT_VALIDATION,
  INVALID_ITERATION_EXPONENT: ErrorCategory.INPUT_VALIDATION,
  INVALID_SCHEME: ErrorCategory.INPUT_VALIDATION,
  INVALID_WORDLIST: ErrorCategory.INPUT_VALIDATION,
  EMPTY_MNEMONIC_SET: ErrorCategory.INPUT_VALIDATION,
  TOO_MANY_FRAGMENTS: ErrorCategory.INPUT_VALIDATION,
  DIVISION_BY_ZERO: ErrorCategory.INPUT_VALIDATION,
  INVALID_SESSION_STATE: ErrorCategory.INPUT_VALIDATION,

  UNKNOWN_WORD: ErrorCategory.DECODE,
  INVALID_WORD_COUNT: ErrorCategory.DECODE,
  INVALID_CHECKSUM: ErrorCategory.DECODE,
  INVALID_PADDING: ErrorCategory.DECODE,
  INVALID_SHARE_PARAMETERS: ErrorCategory.DECODE,

  MNEMONIC_SET_MISMATCH: ErrorCategory.SET_CONSISTENCY,
  DUPLICATE_MEMBER_INDEX: ErrorCategory.SET_CONSISTENCY,
  DUPLICATE_FRAGMENT_INDEX: ErrorCategory.SET_CONSISTENCY,
  FRAGMENT_LENGTH_MISMATCH: ErrorCategory.SET_CONSISTENCY,

  NOT_ENOUGH_FRAGMENTS: ErrorCategory.RECONSTRUCTION,
  NOT_ENOUGH_GROUPS: ErrorCategory.RECONSTRUCTION,
  DIGEST_MISMATCH: ErrorCategory.RECONSTRUCTION,

  INVALID_SECRET_LENGTH: ErrorCategory.CIPHER,
  INVALID_PASSPHRASE_ENCODING: ErrorCategory.CIPHER,
} as const satisfies Record<string, ErrorCategory>;

export type MnemonicErrorCode = keyof typeof CATEGORY_BY_CODE;

/**
 * Error raised by any layer of the share scheme
 */
export class MnemonicError extends Error {
  readonly category: ErrorCategory;

  constructor(
    message: string,
    public readonly code: MnemonicErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MnemonicError';
    this.category = CATEGORY_BY_CODE[code];
  }
}

export function isMnemonicError(value: unknown): value is MnemonicError {
  return value instanceof MnemonicError;
}

/**
 * True for errors a recovery session answers by asking for another mnemonic
 */
export function isRecoverableByReentry(error: MnemonicError): boolean {
  return (
    error.category === ErrorCategory.DECODE ||
    error.category === ErrorCategory.SET_CONSISTENCY
  );
}
