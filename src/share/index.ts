/**
 * Mnemonic shares: the entity and its word codec
 */

export { Share } from './share.js';
export { ShareCodec } from './codec.js';
export type { CommonParameters, ShareParameters, ShareData } from './types.js';
