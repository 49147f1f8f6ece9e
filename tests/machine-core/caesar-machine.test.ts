import { describe, it, expect } from 'vitest';
import { caesarDecrypt, caesarEncrypt } from '@core/caesar';
import {
  ACCEPT_STATE,
  SCAN_STATE,
  buildCaesarMachine,
  runCaesarMachine,
} from '@core/caesar-machine';
import { lookupTransition } from '@core/turing-machine';

describe('buildCaesarMachine', () => {
  it('rewrites each letter and walks right', () => {
    const spec = buildCaesarMachine(3, 'encrypt');
    expect(lookupTransition(spec.transitions, SCAN_STATE, 'A')).toEqual({
      nextState: SCAN_STATE,
      write: 'D',
      move: 'R',
    });
    expect(lookupTransition(spec.transitions, SCAN_STATE, 'Y')?.write).toBe('B');
  });

  it('shifts backwards when decrypting', () => {
    const spec = buildCaesarMachine(3, 'decrypt');
    expect(lookupTransition(spec.transitions, SCAN_STATE, 'A')?.write).toBe('X');
  });

  it('accepts on the first blank', () => {
    const spec = buildCaesarMachine(1, 'encrypt');
    expect(lookupTransition(spec.transitions, SCAN_STATE, '_')).toEqual({
      nextState: ACCEPT_STATE,
      write: '_',
      move: 'R',
    });
    expect(spec.acceptStates).toEqual(new Set([ACCEPT_STATE]));
  });

  it('copies space and passthrough symbols but never overrides letters', () => {
    const spec = buildCaesarMachine(1, 'encrypt', 'A!');
    expect(lookupTransition(spec.transitions, SCAN_STATE, 'A')?.write).toBe('B');
    expect(lookupTransition(spec.transitions, SCAN_STATE, '!')?.write).toBe('!');
    expect(lookupTransition(spec.transitions, SCAN_STATE, ' ')?.write).toBe(' ');
    expect(lookupTransition(spec.transitions, SCAN_STATE, '?')).toBeUndefined();
  });
});

describe('runCaesarMachine', () => {
  it('encrypts through the engine', () => {
    const result = runCaesarMachine('HELLO WORLD', 3, 'encrypt');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.output).toBe('KHOOR ZRUOG');
      expect(result.outcome.steps).toBe(12);
      expect(result.outcome.haltReason).toBe('accepted');
      expect(result.outcome.finalState).toBe(ACCEPT_STATE);
    }
  });

  it('matches the arithmetic cipher', () => {
    const messages = ['MEET AT 10:30!', 'lower Case mix', 'A#B*C', '  PADDED  '];
    for (const message of messages) {
      for (const shift of [1, 7, 13, 26, 40]) {
        const enc = runCaesarMachine(message, shift, 'encrypt');
        const dec = runCaesarMachine(message, shift, 'decrypt');
        expect(enc.ok && enc.output).toBe(caesarEncrypt(message, shift));
        expect(dec.ok && dec.output).toBe(caesarDecrypt(message, shift));
      }
    }
  });

  it('handles the empty message in one step', () => {
    const result = runCaesarMachine('', 5, 'encrypt');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.output).toBe('');
      expect(result.outcome.steps).toBe(1);
    }
  });

  it('refuses messages containing the blank symbol', () => {
    const result = runCaesarMachine('A_B', 1, 'encrypt');
    expect(result).toEqual({
      ok: false,
      error: "Message contains the blank symbol '_' and cannot be placed on the tape",
    });
  });

  it('fails when the step budget is too small', () => {
    const result = runCaesarMachine('ABC', 1, 'encrypt', 2);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('Cipher machine stopped without accepting (max_steps after 2 steps)');
      expect(result.outcome?.output).toBe('BCC');
    }
  });

  it('accepts when the last allowed step reaches the accept state', () => {
    const result = runCaesarMachine('ABC', 1, 'encrypt', 4);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.output).toBe('BCD');
      expect(result.outcome.steps).toBe(4);
      expect(result.outcome.haltReason).toBe('accepted');
      expect(result.outcome.finalState).toBe(ACCEPT_STATE);
    }
  });
});
