// ---------------------------------------------------------------------------
// Caesar shift expressed as a transition table and run on the engine
// ---------------------------------------------------------------------------

import { BLANK_SYMBOL, CIPHER_ALPHABET, DEFAULT_MAX_STEPS } from '@shared/constants';
import type { CipherMode } from '@shared/types';
import { shiftLetter } from './caesar';
import {
  TuringMachine,
  buildTransitionTable,
  type MachineSpecification,
  type RunOutcome,
  type TransitionRule,
} from './turing-machine';

export const SCAN_STATE = 'q_scan';
export const ACCEPT_STATE = 'q_accept';

export type CaesarMachineResult =
  | { ok: true; output: string; outcome: RunOutcome }
  | { ok: false; error: string; outcome?: RunOutcome };

/**
 * One scanning state rewrites each letter in place and walks right; space and
 * every `passthrough` symbol are copied. The first blank moves to q_accept.
 */
export function buildCaesarMachine(
  shift: number,
  mode: CipherMode,
  passthrough: Iterable<string> = [],
): MachineSpecification {
  const signed = mode === 'encrypt' ? shift : -shift;
  const letters = Array.from(CIPHER_ALPHABET);
  const copied = new Set([' ', ...passthrough]);
  for (const letter of letters) {
    copied.delete(letter);
  }
  copied.delete(BLANK_SYMBOL);

  const rules: TransitionRule[] = [
    ...letters.map((letter) => ({
      state: SCAN_STATE,
      symbol: letter,
      nextState: SCAN_STATE,
      write: shiftLetter(letter, signed),
      move: 'R' as const,
    })),
    ...[...copied].map((symbol) => ({
      state: SCAN_STATE,
      symbol,
      nextState: SCAN_STATE,
      write: symbol,
      move: 'R' as const,
    })),
    { state: SCAN_STATE, symbol: BLANK_SYMBOL, nextState: ACCEPT_STATE, write: BLANK_SYMBOL, move: 'R' },
  ];

  return {
    states: new Set([SCAN_STATE, ACCEPT_STATE]),
    inputAlphabet: new Set([...letters, ...copied]),
    tapeAlphabet: new Set([...letters, ...copied, BLANK_SYMBOL]),
    initialState: SCAN_STATE,
    acceptStates: new Set([ACCEPT_STATE]),
    transitions: buildTransitionTable(rules),
  };
}

export function runCaesarMachine(
  message: string,
  shift: number,
  mode: CipherMode,
  maxSteps: number = DEFAULT_MAX_STEPS,
): CaesarMachineResult {
  if (message.includes(BLANK_SYMBOL)) {
    return {
      ok: false,
      error: `Message contains the blank symbol '${BLANK_SYMBOL}' and cannot be placed on the tape`,
    };
  }

  const machine = new TuringMachine(buildCaesarMachine(shift, mode, message));
  machine.loadTape(message);
  const outcome = machine.execute(maxSteps);

  if (outcome.haltReason !== 'accepted') {
    return {
      ok: false,
      error: `Cipher machine stopped without accepting (${outcome.haltReason} after ${outcome.steps} steps)`,
      outcome,
    };
  }
  return { ok: true, output: outcome.output, outcome };
}
