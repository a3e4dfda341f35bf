/**
 * Tests for the passphrase cipher
 */

import { describe, it, expect } from 'vitest';
import { cipherSalt, decrypt, encodePassphrase, encrypt, roundIterations } from './index.js';
import { catchMnemonicError, fromHex, hex } from '../__tests__/helpers.js';

const masterSecret = fromHex('0f1e2d3c4b5a69788796a5b4c3d2e1f0');
const encryptedSecret = fromHex('ba20ebcf0ed48624dac5f6e3fe417325');

function params(passphrase: string, identifier = 1234, iterationExponent = 0) {
  return { passphrase: encodePassphrase(passphrase), identifier, iterationExponent };
}

describe('passphrase cipher', () => {
  it('should encrypt to a known value', () => {
    expect(hex(encrypt(masterSecret, params('test-passphrase')))).toBe(
      'ba20ebcf0ed48624dac5f6e3fe417325'
    );
  });

  it('should decrypt a known value', () => {
    expect(hex(decrypt(encryptedSecret, params('test-passphrase')))).toBe(
      '0f1e2d3c4b5a69788796a5b4c3d2e1f0'
    );
  });

  it('should decrypt to a different value with another passphrase', () => {
    expect(hex(decrypt(encryptedSecret, params('')))).toBe('618b3ed3d4823823d5e82a6520d0c662');
  });

  it('should bind the ciphertext to the identifier', () => {
    expect(hex(decrypt(encryptedSecret, params('test-passphrase', 4321)))).toBe(
      'd5da20e34b48bf61f24aacc4571a48c4'
    );
  });

  it('should round trip with the empty passphrase', () => {
    const secret = fromHex('000102030405060708090a0b0c0d0e0f1011121314151617');
    const encrypted = encrypt(secret, params(''));
    expect(encrypted).not.toEqual(secret);
    expect(decrypt(encrypted, params(''))).toEqual(secret);
  });

  it('should give different plaintexts for passphrases one letter apart', () => {
    const encrypted = encrypt(masterSecret, params('abc'));
    expect(decrypt(encrypted, params('abc'))).toEqual(masterSecret);
    expect(decrypt(encrypted, params('abd'))).not.toEqual(masterSecret);
  });

  it('should leave its input untouched', () => {
    const input = masterSecret.slice();
    encrypt(input, params('test-passphrase'));
    expect(input).toEqual(masterSecret);
  });

  it('should reject an odd-length secret', () => {
    expect(catchMnemonicError(() => encrypt(new Uint8Array(15), params(''))).code).toBe(
      'INVALID_SECRET_LENGTH'
    );
  });

  describe('encodePassphrase', () => {
    it('should accept printable ASCII', () => {
      expect(encodePassphrase(' ~AZaz09')).toEqual(Uint8Array.of(32, 126, 65, 90, 97, 122, 48, 57));
      expect(encodePassphrase('')).toEqual(new Uint8Array(0));
    });

    it('should reject control and non-ASCII characters', () => {
      expect(catchMnemonicError(() => encodePassphrase('tab\there')).code).toBe(
        'INVALID_PASSPHRASE_ENCODING'
      );
      expect(catchMnemonicError(() => encodePassphrase('café')).code).toBe(
        'INVALID_PASSPHRASE_ENCODING'
      );
    });
  });

  describe('roundIterations', () => {
    it('should scale with the iteration exponent', () => {
      expect(roundIterations(0)).toBe(2500);
      expect(roundIterations(1)).toBe(5000);
      expect(roundIterations(3)).toBe(20000);
    });

    it('should reject exponents outside 0-31', () => {
      expect(catchMnemonicError(() => roundIterations(32)).code).toBe('INVALID_ITERATION_EXPONENT');
      expect(catchMnemonicError(() => roundIterations(-1)).code).toBe('INVALID_ITERATION_EXPONENT');
    });
  });

  it('should build the salt from the customization string and identifier', () => {
    expect(hex(cipherSalt(0x1234))).toBe('7368616d69721234');
  });
});
