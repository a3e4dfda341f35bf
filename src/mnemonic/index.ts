/**
 * Split/combine orchestration of mnemonic sets
 */

export {
  generateMnemonics,
  parseGenerateOptions,
  assertMasterSecret,
  randomIdentifier,
  randomMasterSecret,
} from './generate.js';
export { combineMnemonics, decodeMnemonics } from './combine.js';
export type { DecodedMnemonics } from './combine.js';
export { ShareGroups } from './groups.js';
export type { AddShareOutcome } from './groups.js';
export { GenerateOptionsSchema, MemberGroupSchema } from './types.js';
export type {
  GenerateOptions,
  ParsedGenerateOptions,
  MemberGroup,
  MnemonicContext,
} from './types.js';
