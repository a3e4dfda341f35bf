/**
 * Types and schemas for generating and combining mnemonic sets
 */

import { z } from 'zod';
import { MAX_ITERATION_EXPONENT, MAX_SHARE_COUNT } from '../constants.js';
import type { ShamirEngine } from '../shamir/index.js';
import type { ShareCodec } from '../share/index.js';
import type { RandomSource } from '../utils/bytes.js';

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * Schema for one group's member scheme (T of N)
 */
export const MemberGroupSchema = z
  .object({
    memberThreshold: z
      .number()
      .int()
      .min(1, 'Member threshold must be at least 1')
      .max(MAX_SHARE_COUNT, `Member threshold must not exceed ${MAX_SHARE_COUNT}`),
    memberCount: z
      .number()
      .int()
      .min(1, 'Member count must be at least 1')
      .max(MAX_SHARE_COUNT, `Member count must not exceed ${MAX_SHARE_COUNT}`),
  })
  .refine((group) => group.memberThreshold <= group.memberCount, {
    message: 'Member threshold cannot exceed member count',
  })
  .refine((group) => !(group.memberThreshold === 1 && group.memberCount > 1), {
    message:
      'Creating multiple member shares with member threshold 1 is not allowed. Use 1-of-1 member sharing instead.',
  });

export type MemberGroup = z.infer<typeof MemberGroupSchema>;

/**
 * Schema for a generate request
 */
export const GenerateOptionsSchema = z
  .object({
    groupThreshold: z.number().int().min(1, 'Group threshold must be at least 1'),
    groups: z
      .array(MemberGroupSchema)
      .min(1, 'At least one group is required')
      .max(MAX_SHARE_COUNT, `The number of groups must not exceed ${MAX_SHARE_COUNT}`),
    masterSecret: z.instanceof(Uint8Array),
    passphrase: z.string().default(''),
    iterationExponent: z
      .number()
      .int()
      .min(0, 'Iteration exponent must not be negative')
      .max(MAX_ITERATION_EXPONENT, `Iteration exponent must not exceed ${MAX_ITERATION_EXPONENT}`)
      .default(0),
  })
  .refine((options) => options.groupThreshold <= options.groups.length, {
    message: 'The requested group threshold must not exceed the number of groups',
    path: ['groupThreshold'],
  });

/** Caller-facing options; passphrase and iteration exponent are optional */
export type GenerateOptions = z.input<typeof GenerateOptionsSchema>;

/** Options after defaults are applied */
export type ParsedGenerateOptions = z.output<typeof GenerateOptionsSchema>;

// =============================================================================
// Context
// =============================================================================

/**
 * Process-wide collaborators used by generate and combine
 */
export interface MnemonicContext {
  engine: ShamirEngine;
  codec: ShareCodec;
  randomBytes: RandomSource;
}
