/**
 * Tests for the interactive recovery session
 */

import { describe, it, expect } from 'vitest';
import { RecoveryPhase, RecoverySession, isValidTransition } from './index.js';
import { ShamirMnemonic } from '../shamir-mnemonic.js';
import { Share } from '../share/index.js';
import { catchMnemonicError, fromHex, hex } from '../__tests__/helpers.js';

const MEMBERS = [
  'charity aluminum academic acid bucket promise hesitate scramble ancestor drink decent luxury stick elite romantic hour shame float glen ladle',
  'charity aluminum academic agency drift exhaust increase unhappy pitch flavor makeup work season lizard losing pharmacy welfare moisture theater answer',
  'charity aluminum academic always blanket install fawn depart sharp trial crunch spark total spill sled universe crisis loyalty spine born',
];

const SINGLE =
  'analysis merchant academic academic damage center process usher rainbow loan modern premium laden theory wavy born sharp scramble tendency result';

function prefixOf(mnemonic: string): string {
  return mnemonic.split(' ').slice(0, 3).join(' ');
}

describe('RecoverySession', () => {
  const sm = new ShamirMnemonic();

  describe('phase transitions', () => {
    it('should allow only forward transitions', () => {
      expect(isValidTransition(RecoveryPhase.EMPTY, RecoveryPhase.COLLECTING)).toBe(true);
      expect(isValidTransition(RecoveryPhase.COLLECTING, RecoveryPhase.COMPLETE)).toBe(true);
      expect(isValidTransition(RecoveryPhase.COLLECTING, RecoveryPhase.CANCELLED)).toBe(true);
      expect(isValidTransition(RecoveryPhase.EMPTY, RecoveryPhase.COMPLETE)).toBe(false);
      expect(isValidTransition(RecoveryPhase.COMPLETE, RecoveryPhase.CANCELLED)).toBe(false);
      expect(isValidTransition(RecoveryPhase.CANCELLED, RecoveryPhase.COLLECTING)).toBe(false);
    });
  });

  describe('single group', () => {
    it('should start empty', () => {
      const session = sm.createRecoverySession();
      expect(session.currentPhase).toBe(RecoveryPhase.EMPTY);
      expect(session.isComplete()).toBe(false);
      expect(session.status()).toEqual({
        phase: RecoveryPhase.EMPTY,
        completedGroups: 0,
        groups: [],
      });
    });

    it('should complete once the member threshold is reached', () => {
      const session = sm.createRecoverySession();

      const first = session.accept(MEMBERS[2]);
      expect(first.accepted).toBe(true);
      expect(session.currentPhase).toBe(RecoveryPhase.COLLECTING);
      expect(first.status.groups).toEqual([
        {
          groupIndex: 0,
          prefix: 'charity aluminum academic',
          collected: 1,
          threshold: 2,
          complete: false,
        },
      ]);
      expect(session.groupIsComplete(0)).toBe(false);

      const second = session.accept(MEMBERS[0]);
      expect(second.accepted).toBe(true);
      expect(session.currentPhase).toBe(RecoveryPhase.COMPLETE);
      expect(session.groupIsComplete(0)).toBe(true);
      expect(session.completedGroupCount()).toBe(1);
      expect(second.status.completedGroups).toBe(1);
      expect(second.status.phase).toBe(RecoveryPhase.COMPLETE);
      expect(session.mnemonics).toEqual([MEMBERS[2], MEMBERS[0]]);

      expect(hex(session.recover())).toBe('00112233445566778899aabbccddeeff');
    });

    it('should treat a repeated mnemonic as a no-op', () => {
      const session = sm.createRecoverySession();
      session.accept(MEMBERS[1]);
      const repeat = session.accept(`  ${MEMBERS[1]}  `);

      expect(repeat.accepted && repeat.duplicate).toBe(true);
      expect(session.mnemonics).toEqual([MEMBERS[1]]);
      expect(session.isComplete()).toBe(false);
    });

    it('should return decode errors without changing state', () => {
      const session = sm.createRecoverySession();
      const result = session.accept('academic acid');

      expect(result.accepted).toBe(false);
      if (!result.accepted) {
        expect(result.error.code).toBe('INVALID_WORD_COUNT');
      }
      expect(session.currentPhase).toBe(RecoveryPhase.EMPTY);
      expect(session.mnemonics).toEqual([]);
    });

    it('should reject a mnemonic of another set', () => {
      const session = sm.createRecoverySession();
      session.accept(MEMBERS[0]);
      const result = session.accept(SINGLE);

      expect(result.accepted).toBe(false);
      if (!result.accepted) {
        expect(result.error.code).toBe('MNEMONIC_SET_MISMATCH');
        expect(result.error.message).toBe('This mnemonic is not part of the current set.');
      }
      expect(session.mnemonics).toEqual([MEMBERS[0]]);
      expect(session.currentPhase).toBe(RecoveryPhase.COLLECTING);
    });

    it('should reject a different share for a held member index', () => {
      const session = sm.createRecoverySession();
      session.accept(MEMBERS[0]);

      const impostor = sm.codec.encode(
        new Share({ ...sm.decode(MEMBERS[0]).toData(), value: new Uint8Array(16) })
      );
      const result = session.accept(impostor);

      expect(result.accepted).toBe(false);
      if (!result.accepted) {
        expect(result.error.code).toBe('DUPLICATE_MEMBER_INDEX');
      }
      expect(session.status().groups[0].collected).toBe(1);
    });

    it('should not accept shares once complete', () => {
      const session = sm.createRecoverySession();
      session.accept(MEMBERS[0]);
      session.accept(MEMBERS[1]);
      expect(catchMnemonicError(() => session.accept(MEMBERS[2])).code).toBe(
        'INVALID_SESSION_STATE'
      );
    });

    it('should not recover before completion', () => {
      const session = sm.createRecoverySession();
      session.accept(MEMBERS[0]);
      expect(catchMnemonicError(() => session.recover()).code).toBe('INVALID_SESSION_STATE');
    });
  });

  describe('cancel', () => {
    it('should discard the collected mnemonics', () => {
      const session = sm.createRecoverySession();
      session.accept(MEMBERS[0]);
      session.cancel();

      expect(session.currentPhase).toBe(RecoveryPhase.CANCELLED);
      expect(session.mnemonics).toEqual([]);
      expect(catchMnemonicError(() => session.accept(MEMBERS[1])).code).toBe(
        'INVALID_SESSION_STATE'
      );
      expect(catchMnemonicError(() => session.recover()).code).toBe('INVALID_SESSION_STATE');
    });

    it('should be allowed only once', () => {
      const session = sm.createRecoverySession();
      session.cancel();
      expect(catchMnemonicError(() => session.cancel()).code).toBe('INVALID_SESSION_STATE');
    });
  });

  describe('several groups', () => {
    const masterSecret = fromHex('ffeeddccbbaa99887766554433221100');
    const groups = sm.generate({
      groupThreshold: 2,
      groups: [
        { memberThreshold: 1, memberCount: 1 },
        { memberThreshold: 2, memberCount: 3 },
        { memberThreshold: 2, memberCount: 2 },
      ],
      masterSecret,
      passphrase: 'test-passphrase',
    });

    it('should report every group of the split', () => {
      const session = sm.createRecoverySession();
      const result = session.accept(groups[1][2]);

      expect(result.status.groupThreshold).toBe(2);
      expect(result.status.groupCount).toBe(3);
      expect(result.status.groups.map((g) => g.prefix)).toEqual([
        prefixOf(groups[0][0]),
        prefixOf(groups[1][0]),
        prefixOf(groups[2][0]),
      ]);
      expect(result.status.groups.map((g) => [g.collected, g.threshold, g.complete])).toEqual([
        [0, undefined, false],
        [1, 2, false],
        [0, undefined, false],
      ]);
      expect(session.groupPrefix(2)).toBe(prefixOf(groups[2][1]));
    });

    it('should complete after enough groups and recover with the passphrase', () => {
      const session = sm.createRecoverySession();

      session.accept(groups[2][1]);
      session.accept(groups[1][0]);
      expect(session.completedGroupCount()).toBe(0);

      session.accept(groups[0][0]);
      expect(session.completedGroupCount()).toBe(1);
      expect(session.isComplete()).toBe(false);

      session.accept(groups[2][0]);
      expect(session.completedGroupCount()).toBe(2);
      expect(session.isComplete()).toBe(true);

      expect(session.recover('test-passphrase')).toEqual(masterSecret);
    });

    it('should reject a member threshold that disagrees within a group', () => {
      const session = sm.createRecoverySession();
      session.accept(groups[1][0]);

      const other = sm.codec.encode(
        new Share({ ...sm.decode(groups[1][1]).toData(), memberThreshold: 3 })
      );
      const result = session.accept(other);

      expect(result.accepted).toBe(false);
      if (!result.accepted) {
        expect(result.error.code).toBe('MNEMONIC_SET_MISMATCH');
      }
    });
  });

  it('should delegate recovery to the combine function', () => {
    const calls: Array<[readonly string[], string]> = [];
    const session = new RecoverySession(sm.codec, (mnemonics, passphrase) => {
      calls.push([mnemonics, passphrase]);
      return Uint8Array.of(1);
    });

    session.accept(SINGLE);
    expect(session.recover('test-passphrase')).toEqual(Uint8Array.of(1));
    expect(calls).toEqual([[[SINGLE], 'test-passphrase']]);
  });
});
