/**
 * Interactive share recovery
 */

export { RecoverySession, isValidTransition } from './session.js';
export type { CombineFunction } from './session.js';
export { RecoveryPhase } from './types.js';
export type { AcceptResult, GroupStatus, RecoveryStatus } from './types.js';
