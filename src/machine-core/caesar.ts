import { CIPHER_ALPHABET } from '@shared/constants';
import type { CipherMode } from '@shared/types';

export type KeyParseResult =
  | { ok: true; shift: number }
  | { ok: false; error: string };

/**
 * A key is either a decimal number used as-is, or a single letter giving its
 * 1-based alphabet position (A = 1 ... Z = 26). Numbers past the safe integer
 * range are reduced modulo the alphabet size.
 */
export function parseKey(key: string): KeyParseResult {
  const trimmed = key.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: 'Key is empty' };
  }

  if (/^\d+$/.test(trimmed)) {
    const shift = Number.parseInt(trimmed, 10);
    if (Number.isSafeInteger(shift)) {
      return { ok: true, shift };
    }
    return { ok: true, shift: Number(BigInt(trimmed) % BigInt(CIPHER_ALPHABET.length)) };
  }

  const index = CIPHER_ALPHABET.indexOf(trimmed.toUpperCase());
  if (trimmed.length !== 1 || index === -1) {
    return { ok: false, error: `Invalid key '${trimmed}': expected digits or a single letter` };
  }
  return { ok: true, shift: index + 1 };
}

export function shiftLetter(letter: string, shift: number): string {
  const pos = CIPHER_ALPHABET.indexOf(letter);
  if (pos === -1) {
    return letter;
  }
  const size = CIPHER_ALPHABET.length;
  return CIPHER_ALPHABET[(((pos + shift) % size) + size) % size];
}

function shiftMessage(message: string, shift: number): string {
  return Array.from(message, (char) => shiftLetter(char, shift)).join('');
}

/** Letters outside A-Z (spaces, digits, lower case) are copied unchanged. */
export function caesarEncrypt(message: string, shift: number): string {
  return shiftMessage(message, shift);
}

export function caesarDecrypt(message: string, shift: number): string {
  return shiftMessage(message, -shift);
}

export function applyCipher(mode: CipherMode, message: string, shift: number): string {
  return mode === 'encrypt' ? caesarEncrypt(message, shift) : caesarDecrypt(message, shift);
}
