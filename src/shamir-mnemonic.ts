/**
 * Shamir Mnemonic - Hierarchical Secret Sharing as Words
 *
 * A unified API over the share scheme:
 * - Generate: encrypt a master secret and split it into groups of members
 * - Combine: recover the master secret from enough mnemonics
 * - Recover interactively: collect mnemonics one at a time
 *
 * Every mnemonic carries a checksum, so typing errors are caught before any
 * share is used.
 */

import { GF256 } from './utils/gf256.js';
import { secureRandom, type RandomSource } from './utils/bytes.js';
import { ShamirEngine } from './shamir/index.js';
import { ShareCodec, type Share } from './share/index.js';
import { loadWordlist, type Wordlist } from './wordlist/index.js';
import {
  combineMnemonics,
  generateMnemonics,
  randomMasterSecret,
  type GenerateOptions,
  type MnemonicContext,
} from './mnemonic/index.js';
import { RecoverySession } from './recovery/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Collaborators of a {@link ShamirMnemonic} instance
 */
export interface ShamirMnemonicConfig {
  /** Vocabulary; defaults to the bundled English wordlist */
  wordlist?: Wordlist;

  /** Source of randomness; defaults to the platform CSPRNG */
  randomBytes?: RandomSource;
}

// =============================================================================
// Main API
// =============================================================================

/**
 * @example
 * ```typescript
 * const sm = new ShamirMnemonic();
 * const masterSecret = sm.randomMasterSecret();
 *
 * // 2-of-3 single group
 * const [mnemonics] = sm.generate({
 *   groupThreshold: 1,
 *   groups: [{ memberThreshold: 2, memberCount: 3 }],
 *   masterSecret,
 *   passphrase: 'test-passphrase',
 * });
 *
 * const recovered = sm.combine(mnemonics.slice(1), 'test-passphrase');
 * ```
 */
export class ShamirMnemonic {
  readonly wordlist: Wordlist;
  readonly codec: ShareCodec;
  private readonly context: MnemonicContext;

  constructor(config: ShamirMnemonicConfig = {}) {
    const randomBytes = config.randomBytes ?? secureRandom;
    this.wordlist = config.wordlist ?? loadWordlist();
    this.codec = new ShareCodec(this.wordlist);
    this.context = {
      engine: new ShamirEngine({ field: new GF256(), randomBytes }),
      codec: this.codec,
      randomBytes,
    };
  }

  /**
   * Split a master secret into mnemonic shares, one list per group
   */
  generate(options: GenerateOptions): string[][] {
    return generateMnemonics(this.context, options);
  }

  /**
   * Recover the master secret from a set of mnemonics
   */
  combine(mnemonics: readonly string[], passphrase = ''): Uint8Array {
    return combineMnemonics(this.context, mnemonics, passphrase);
  }

  decode(mnemonic: string): Share {
    return this.codec.decode(mnemonic);
  }

  validate(mnemonic: string): boolean {
    return this.codec.validate(mnemonic);
  }

  /**
   * Start collecting mnemonics one at a time
   */
  createRecoverySession(): RecoverySession {
    return new RecoverySession(this.codec, (mnemonics, passphrase) =>
      this.combine(mnemonics, passphrase)
    );
  }

  randomMasterSecret(strengthBits?: number): Uint8Array {
    return randomMasterSecret(this.context.randomBytes, strengthBits);
  }
}
