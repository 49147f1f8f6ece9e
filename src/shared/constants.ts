export const API_PREFIX = '/api';

export const BLANK_SYMBOL = '_';

export const DEFAULT_MAX_STEPS = 100000;

export const MAX_TRACE_STEPS = 10000;

export const MAX_INPUT_LENGTH = 10000;

export const DIRECTIONS = ['L', 'R'] as const;

export const HALT_REASONS = [
  'accepted',
  'undefined_transition',
  'max_steps',
] as const;

export const CIPHER_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export const CIPHER_MODES = ['encrypt', 'decrypt'] as const;

export const CIPHER_ENGINES = ['arithmetic', 'machine'] as const;

export const CASE_FILES = {
  encrypt: 'encrypt-cases.txt',
  decrypt: 'decrypt-cases.txt',
} as const;

export const RESULT_FILES = {
  encrypt: 'encryption-result.txt',
  decrypt: 'decryption-result.txt',
  manual: 'manual-result.txt',
  document: 'turing-machine-specification.json',
} as const;

export const DEFAULT_ENCRYPT_CASES = [
  '3#MEET ME AT THE OLD BRIDGE',
  '1#HELLO WORLD',
  '5#TAPES AND HEADS',
  'D#THE QUICK FOX SLEEPS',
  '13#ROTATE THIS LINE',
  '7#STATES MOVE LEFT AND RIGHT',
  'B#BLANK SYMBOLS PAD THE TAPE',
  '10#ACCEPT OR HALT',
  'A#SHIFT BY ONE',
  'Z#FULL CIRCLE KEY',
] as const;
