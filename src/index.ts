/**
 * shamir-mnemonic
 * Hierarchical Shamir secret sharing encoded as mnemonic word lists
 *
 * A master secret is encrypted with an optional passphrase, split into
 * groups, and each group's part is split again among its members:
 * - Any groupThreshold complete groups recover the secret
 * - A group is complete with memberThreshold of its member shares
 * - Every share is a checksummed list of words from a 1024-word vocabulary
 */

// =============================================================================
// Main API
// =============================================================================

export { ShamirMnemonic } from './shamir-mnemonic.js';
export type { ShamirMnemonicConfig } from './shamir-mnemonic.js';

// =============================================================================
// Errors
// =============================================================================

export {
  MnemonicError,
  ErrorCategory,
  isMnemonicError,
  isRecoverableByReentry,
} from './errors.js';
export type { MnemonicErrorCode } from './errors.js';

// =============================================================================
// Orchestration
// =============================================================================

export {
  generateMnemonics,
  combineMnemonics,
  decodeMnemonics,
  parseGenerateOptions,
  randomMasterSecret,
  GenerateOptionsSchema,
  MemberGroupSchema,
} from './mnemonic/index.js';
export type {
  GenerateOptions,
  MemberGroup,
  MnemonicContext,
} from './mnemonic/index.js';

// Interactive recovery
export { RecoverySession, RecoveryPhase } from './recovery/index.js';
export type { AcceptResult, GroupStatus, RecoveryStatus } from './recovery/index.js';

// =============================================================================
// Core Primitives
// =============================================================================

// Shares and their word encoding
export { Share, ShareCodec } from './share/index.js';
export type { CommonParameters, ShareParameters, ShareData } from './share/index.js';

export { Wordlist, loadWordlist, DEFAULT_WORDLIST_URL } from './wordlist/index.js';

// Shamir secret sharing over GF(256)
export { ShamirEngine, createDigest } from './shamir/index.js';
export type { ShareFragment, ShamirEngineConfig } from './shamir/index.js';
export { GF256 } from './utils/gf256.js';

// Passphrase encryption
export { encrypt, decrypt, encodePassphrase } from './cipher/index.js';
export type { CipherParams } from './cipher/index.js';

// RS1024 checksum
export { createChecksum, verifyChecksum } from './checksum/index.js';

// =============================================================================
// Utilities
// =============================================================================

export { secureRandom } from './utils/bytes.js';
export type { RandomSource } from './utils/bytes.js';
export * as constants from './constants.js';
