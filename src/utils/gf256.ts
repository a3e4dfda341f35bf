/**
 * GF(256) arithmetic for byte-wise secret sharing
 *
 * Elements are bytes; addition is XOR and multiplication goes through
 * discrete log/exp tables over the generator 3 with the reduction
 * polynomial x^8 + x^4 + x^3 + x + 1 (0x11B).
 */

import { MnemonicError } from '../errors.js';

const FIELD_ORDER = 255;
const REDUCTION_POLYNOMIAL = 0x11b;

/**
 * Precomputed GF(256) field.
 *
 * Build one instance per process and pass it to whatever needs field
 * arithmetic; the tables never change after construction.
 */
export class GF256 {
  private readonly expTable: Uint8Array;
  private readonly logTable: Uint8Array;

  constructor() {
    this.expTable = new Uint8Array(FIELD_ORDER);
    this.logTable = new Uint8Array(256);

    let poly = 1;
    for (let i = 0; i < FIELD_ORDER; i++) {
      this.expTable[i] = poly;
      this.logTable[poly] = i;
      // Multiply by the generator 3 = x + 1
      poly = (poly << 1) ^ poly;
      if (poly & 0x100) {
        poly ^= REDUCTION_POLYNOMIAL;
      }
    }
  }

  /**
   * a + b (and a - b, which is the same operation)
   */
  add(a: number, b: number): number {
    return a ^ b;
  }

  mul(a: number, b: number): number {
    if (a === 0 || b === 0) {
      return 0;
    }
    return this.expTable[(this.logTable[a] + this.logTable[b]) % FIELD_ORDER];
  }

  /**
   * a / b
   *
   * @throws {MnemonicError} DIVISION_BY_ZERO when b is 0
   */
  div(a: number, b: number): number {
    if (b === 0) {
      throw new MnemonicError('Division by zero in GF(256)', 'DIVISION_BY_ZERO', { a });
    }
    if (a === 0) {
      return 0;
    }
    return this.expTable[
      (this.logTable[a] - this.logTable[b] + FIELD_ORDER) % FIELD_ORDER
    ];
  }

  /**
   * Discrete exponent: generator^power
   */
  exp(power: number): number {
    return this.expTable[((power % FIELD_ORDER) + FIELD_ORDER) % FIELD_ORDER];
  }
}
