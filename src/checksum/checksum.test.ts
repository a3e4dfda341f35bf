/**
 * Tests for the RS1024 checksum
 */

import { describe, it, expect } from 'vitest';
import { assertChecksum, createChecksum, polymod, verifyChecksum } from './index.js';
import { catchMnemonicError } from '../__tests__/helpers.js';

describe('RS1024 checksum', () => {
  it('should compute known checksums', () => {
    expect(createChecksum([1, 2, 3, 4, 5])).toEqual([552, 299, 279]);
    expect(createChecksum([])).toEqual([413, 424, 113]);
  });

  it('should leave a residue of 1 after appending the checksum', () => {
    const data = [38, 576, 0, 0, 186, 131, 700];
    const values = [...Array.from('shamir', (c) => c.charCodeAt(0)), ...data, ...createChecksum(data)];
    expect(polymod(values)).toBe(1);
    expect(verifyChecksum([...data, ...createChecksum(data)])).toBe(true);
  });

  it('should depend on the customization string', () => {
    expect(createChecksum([1, 2, 3, 4, 5], 'other')).not.toEqual([552, 299, 279]);
  });

  it('should detect every single-symbol substitution', () => {
    const data = [1, 2, 3, 4, 5];
    const full = [...data, ...createChecksum(data)];

    for (let position = 0; position < full.length; position++) {
      for (const replacement of [0, 7, 512, 1023]) {
        if (replacement === full[position]) continue;
        const corrupted = [...full];
        corrupted[position] = replacement;
        expect(verifyChecksum(corrupted)).toBe(false);
      }
    }
  });

  it('should throw INVALID_CHECKSUM', () => {
    const error = catchMnemonicError(() => assertChecksum([1, 2, 3, 4, 5, 0, 0, 0]));
    expect(error.code).toBe('INVALID_CHECKSUM');
    expect(error.details).toEqual({ wordCount: 8 });
  });

  it('should accept a valid sequence', () => {
    expect(() => assertChecksum([1, 2, 3, 4, 5, 552, 299, 279])).not.toThrow();
  });
});
