/**
 * CLI commands
 *
 * Kept free of process globals: input and output go through a PromptIO so
 * that the commands can be driven by a script.
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { encodePassphrase } from '../cipher/index.js';
import { MIN_STRENGTH_BITS } from '../constants.js';
import { isMnemonicError, MnemonicError } from '../errors.js';
import type { MemberGroup } from '../mnemonic/index.js';
import type { RecoveryStatus } from '../recovery/index.js';
import type { ShamirMnemonic } from '../shamir-mnemonic.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Line-oriented terminal access
 */
export interface PromptIO {
  /** Ask a question; resolves to null at end of input */
  prompt(question: string): Promise<string | null>;
  /** Write a line to standard output */
  write(line: string): void;
  /** Write a line to standard error */
  error(line: string): void;
}

/**
 * Raw `create` arguments as they come from the command line
 */
export interface CreateArgs {
  scheme: string;
  groups?: string[];
  threshold?: string;
  exponent?: string;
  strength?: string;
  masterSecret?: string;
  passphrase?: string;
}

export interface Scheme {
  groupThreshold: number;
  groups: MemberGroup[];
}

export interface RecoverArgs {
  passphrasePrompt?: boolean;
}

const FINISHED = '✓';
const EMPTY = '✗';
const IN_PROGRESS = '⚬';

const GROUP_PATTERN = /^(\d+)of(\d+)$/i;

// =============================================================================
// Argument Parsing
// =============================================================================

function usageError(message: string, details?: Record<string, unknown>): MnemonicError {
  return new MnemonicError(message, 'INVALID_SCHEME', details);
}

/**
 * Parse a decimal integer option
 */
export function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw usageError(`Invalid value for ${name}: ${value}`, { [name]: value });
  }
  return parseInt(value, 10);
}

/**
 * Parse a `TofN` group, e.g. `3of5`
 */
export function parseGroupOption(value: string): MemberGroup {
  const match = GROUP_PATTERN.exec(value.trim());
  if (!match) {
    throw usageError(`Invalid group: ${value}. Expected the form TofN, e.g. 2of3.`, { group: value });
  }
  return { memberThreshold: parseInt(match[1], 10), memberCount: parseInt(match[2], 10) };
}

/**
 * Resolve a named scheme (single, TofN, master or custom) to groups
 *
 * @throws {MnemonicError} INVALID_SCHEME
 */
export function parseScheme(args: Pick<CreateArgs, 'scheme' | 'groups' | 'threshold'>): Scheme {
  const groupOptions = args.groups ?? [];
  const { scheme } = args;

  if ((groupOptions.length > 0 || args.threshold !== undefined) && scheme !== 'custom') {
    throw usageError("To use -g/-t, you must select the 'custom' scheme.", { scheme });
  }

  if (scheme === 'single') {
    return { groupThreshold: 1, groups: [{ memberThreshold: 1, memberCount: 1 }] };
  }

  if (scheme === 'master') {
    return {
      groupThreshold: 1,
      groups: [
        { memberThreshold: 1, memberCount: 1 },
        { memberThreshold: 3, memberCount: 5 },
      ],
    };
  }

  if (scheme === 'custom') {
    if (args.threshold === undefined) {
      throw usageError("Use '-t' to specify the number of groups required for recovery.");
    }
    if (groupOptions.length === 0) {
      throw usageError("Use '-g TofN' to add a T-of-N group to the collection.");
    }
    return {
      groupThreshold: parseInteger('threshold', args.threshold, 1),
      groups: groupOptions.map(parseGroupOption),
    };
  }

  if (scheme.includes('of')) {
    if (!GROUP_PATTERN.test(scheme)) {
      throw usageError(`Invalid scheme: ${scheme}`, { scheme });
    }
    return { groupThreshold: 1, groups: [parseGroupOption(scheme)] };
  }

  throw usageError(`Unknown scheme: ${scheme}`, { scheme });
}

/**
 * @throws {MnemonicError} INVALID_SECRET_HEX
 */
export function parseMasterSecret(hex: string): Uint8Array {
  const trimmed = hex.trim();
  if (trimmed.length === 0 || !/^([0-9a-fA-F]{2})+$/.test(trimmed)) {
    throw new MnemonicError('Secret bytes must be hex encoded', 'INVALID_SECRET_HEX');
  }
  return hexToBytes(trimmed.toLowerCase());
}

// =============================================================================
// create
// =============================================================================

/**
 * Split a master secret and print every group's mnemonics
 *
 * @returns Process exit code
 */
export function runCreate(sm: ShamirMnemonic, args: CreateArgs, io: PromptIO): number {
  try {
    if (args.passphrase && args.masterSecret === undefined) {
      throw usageError('Only use passphrase in conjunction with an explicit master secret');
    }

    const { groupThreshold, groups } = parseScheme(args);

    if (groups.some((g) => g.memberThreshold === 1 && g.memberCount > 1)) {
      io.write('1-of-X groups are not allowed.');
      io.write('Instead, set up a 1-of-1 group and give everyone the same share.');
      return 1;
    }

    const iterationExponent = parseInteger('exponent', args.exponent, 0);
    const masterSecret =
      args.masterSecret !== undefined
        ? parseMasterSecret(args.masterSecret)
        : sm.randomMasterSecret(parseInteger('strength', args.strength, MIN_STRENGTH_BITS));

    io.write(`Using master secret: ${bytesToHex(masterSecret)}`);

    const mnemonics = sm.generate({
      groupThreshold,
      groups,
      masterSecret,
      passphrase: args.passphrase ?? '',
      iterationExponent,
    });

    mnemonics.forEach((groupMnemonics, i) => {
      const { memberThreshold, memberCount } = groups[i];
      io.write(
        `Group ${i + 1} of ${mnemonics.length} - ${memberThreshold} of ${memberCount} shares required:`
      );
      groupMnemonics.forEach((mnemonic) => io.write(mnemonic));
    });

    return 0;
  } catch (error) {
    if (isMnemonicError(error)) {
      io.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

// =============================================================================
// recover
// =============================================================================

/**
 * Progress lines shown after each accepted share
 */
export function formatStatus(status: RecoveryStatus): string[] {
  const lines = [''];
  if (status.groupCount !== undefined && status.groupCount > 1) {
    lines.push(`Completed ${status.completedGroups} of ${status.groupThreshold} groups needed:`);
  }
  for (const group of status.groups) {
    if (group.collected === 0 || group.threshold === undefined) {
      lines.push(`${EMPTY} ${group.collected} shares from group ${group.prefix}`);
    } else {
      const mark = group.complete ? FINISHED : IN_PROGRESS;
      lines.push(
        `${mark} ${group.collected} of ${group.threshold} shares needed from group ${group.prefix}`
      );
    }
  }
  return lines;
}

async function promptPassphrase(io: PromptIO): Promise<string | null> {
  for (;;) {
    const passphrase = await io.prompt('Enter passphrase: ');
    if (passphrase === null) {
      return null;
    }
    const confirmation = await io.prompt('Repeat for confirmation: ');
    if (confirmation === null) {
      return null;
    }
    if (passphrase !== confirmation) {
      io.write('Error: The two entered values do not match.');
      continue;
    }
    try {
      encodePassphrase(passphrase);
      return passphrase;
    } catch (error) {
      if (isMnemonicError(error) && error.code === 'INVALID_PASSPHRASE_ENCODING') {
        io.write('Passphrase must be printable ASCII. Please try again.');
        continue;
      }
      throw error;
    }
  }
}

/**
 * Prompt for shares until enough groups are complete, then print the secret
 *
 * @returns Process exit code
 */
export async function runRecover(
  sm: ShamirMnemonic,
  args: RecoverArgs,
  io: PromptIO
): Promise<number> {
  const session = sm.createRecoverySession();

  while (!session.isComplete()) {
    const line = await io.prompt('Enter a recovery share: ');
    if (line === null) {
      session.cancel();
      io.error('Aborted!');
      return 1;
    }
    if (line.trim() === '') {
      continue;
    }

    const result = session.accept(line);
    if (!result.accepted) {
      io.write(`ERROR: ${result.error.message}`);
      continue;
    }
    formatStatus(result.status).forEach((statusLine) => io.write(statusLine));
  }

  let passphrase = '';
  if (args.passphrasePrompt) {
    const entered = await promptPassphrase(io);
    if (entered === null) {
      io.error('Aborted!');
      return 1;
    }
    passphrase = entered;
  }

  try {
    const masterSecret = session.recover(passphrase);
    io.write('SUCCESS!');
    io.write(`Your master secret is: ${bytesToHex(masterSecret)}`);
    return 0;
  } catch (error) {
    if (isMnemonicError(error)) {
      io.write(`ERROR: ${error.message}`);
      io.write('Recovery failed');
      return 1;
    }
    throw error;
  }
}
