/**
 * Share entity
 *
 * One member fragment together with the hierarchy metadata needed to
 * recombine it. Shares are immutable values compared field by field.
 */

import { bytesToHex } from '@noble/hashes/utils';
import {
  ID_LENGTH_BITS,
  MAX_ITERATION_EXPONENT,
  MAX_SHARE_COUNT,
} from '../constants.js';
import { MnemonicError } from '../errors.js';
import { equalBytes } from '../utils/bytes.js';
import type { CommonParameters, ShareData } from './types.js';

function assertRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new MnemonicError(
      `${name} must be an integer between ${min} and ${max}, got ${value}`,
      'INVALID_SHARE_PARAMETERS',
      { [name]: value }
    );
  }
}

export class Share implements ShareData {
  readonly identifier: number;
  readonly iterationExponent: number;
  readonly groupIndex: number;
  readonly groupThreshold: number;
  readonly groupCount: number;
  readonly memberIndex: number;
  readonly memberThreshold: number;
  readonly value: Uint8Array;

  constructor(data: ShareData) {
    assertRange('identifier', data.identifier, 0, (1 << ID_LENGTH_BITS) - 1);
    assertRange('iterationExponent', data.iterationExponent, 0, MAX_ITERATION_EXPONENT);
    assertRange('groupIndex', data.groupIndex, 0, MAX_SHARE_COUNT - 1);
    assertRange('groupThreshold', data.groupThreshold, 1, MAX_SHARE_COUNT);
    assertRange('groupCount', data.groupCount, 1, MAX_SHARE_COUNT);
    assertRange('memberIndex', data.memberIndex, 0, MAX_SHARE_COUNT - 1);
    assertRange('memberThreshold', data.memberThreshold, 1, MAX_SHARE_COUNT);

    if (data.groupThreshold > data.groupCount) {
      throw new MnemonicError(
        'Invalid mnemonic. Group threshold cannot be greater than group count.',
        'INVALID_SHARE_PARAMETERS',
        { groupThreshold: data.groupThreshold, groupCount: data.groupCount }
      );
    }

    this.identifier = data.identifier;
    this.iterationExponent = data.iterationExponent;
    this.groupIndex = data.groupIndex;
    this.groupThreshold = data.groupThreshold;
    this.groupCount = data.groupCount;
    this.memberIndex = data.memberIndex;
    this.memberThreshold = data.memberThreshold;
    this.value = data.value.slice();
  }

  commonParameters(): CommonParameters {
    return {
      identifier: this.identifier,
      iterationExponent: this.iterationExponent,
      groupThreshold: this.groupThreshold,
      groupCount: this.groupCount,
    };
  }

  /**
   * True when both shares can belong to the same recovery attempt
   */
  hasCommonParameters(other: Share): boolean {
    return (
      this.identifier === other.identifier &&
      this.iterationExponent === other.iterationExponent &&
      this.groupThreshold === other.groupThreshold &&
      this.groupCount === other.groupCount
    );
  }

  equals(other: Share): boolean {
    return (
      this.hasCommonParameters(other) &&
      this.groupIndex === other.groupIndex &&
      this.memberIndex === other.memberIndex &&
      this.memberThreshold === other.memberThreshold &&
      equalBytes(this.value, other.value)
    );
  }

  /**
   * Hash key over the same fields as {@link equals}
   */
  key(): string {
    return [
      this.identifier,
      this.iterationExponent,
      this.groupIndex,
      this.groupThreshold,
      this.groupCount,
      this.memberIndex,
      this.memberThreshold,
      bytesToHex(this.value),
    ].join(':');
  }

  /**
   * Copy of this share placed in another group
   */
  withGroupIndex(groupIndex: number): Share {
    return new Share({ ...this.toData(), groupIndex });
  }

  toData(): ShareData {
    return {
      identifier: this.identifier,
      iterationExponent: this.iterationExponent,
      groupIndex: this.groupIndex,
      groupThreshold: this.groupThreshold,
      groupCount: this.groupCount,
      memberIndex: this.memberIndex,
      memberThreshold: this.memberThreshold,
      value: this.value,
    };
  }
}
