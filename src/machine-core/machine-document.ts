import { writeFile } from 'fs/promises';
import { BLANK_SYMBOL, CIPHER_ALPHABET } from '@shared/constants';
import type { Direction } from '@shared/types';
import { listTransitionRules, type MachineSpecification } from './turing-machine';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DocumentedTransition {
  from: [string, string];
  to: [string, string, Direction];
  description?: string;
}

export interface MachineDocument {
  description: string;
  type: string;
  states: { name: string; description?: string }[];
  inputAlphabet: string[];
  tapeAlphabet: string[];
  initialState: string;
  acceptStates: string[];
  blankSymbol: string;
  transitions: {
    format: string;
    rules: DocumentedTransition[];
  };
  operation?: {
    encryption: string;
    decryption: string;
    alphabetSize: number;
    spaces: string;
  };
}

const TRANSITION_FORMAT =
  '(current_state, symbol_read) -> (next_state, symbol_written, direction)';

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/**
 * Conceptual description of the cipher machine: the staged states and a
 * handful of sample transitions, for readers rather than for the engine.
 */
export function buildCipherMachineDocument(): MachineDocument {
  return {
    description: 'Turing machine for the Caesar cipher',
    type: 'Deterministic Turing machine',
    states: [
      { name: 'q0', description: 'Initial state, reads the key' },
      { name: 'q_scan', description: 'Scans the tape for the next character to process' },
      { name: 'q_process', description: 'Processes the current character' },
      { name: 'q_shift', description: 'Applies the Caesar shift' },
      { name: 'q_write', description: 'Writes the result to the tape' },
      { name: 'q_return', description: 'Returns for the next character' },
      { name: 'q_accept', description: 'Accepting state' },
    ],
    inputAlphabet: Array.from(CIPHER_ALPHABET),
    tapeAlphabet: Array.from(`${CIPHER_ALPHABET} ${BLANK_SYMBOL}#*0123456789`),
    initialState: 'q0',
    acceptStates: ['q_accept'],
    blankSymbol: BLANK_SYMBOL,
    transitions: {
      format: TRANSITION_FORMAT,
      rules: [
        { from: ['q0', '3'], to: ['q0', '3', 'R'], description: 'Read a key digit' },
        { from: ['q0', '#'], to: ['q_scan', BLANK_SYMBOL, 'R'], description: 'Found the separator' },
        { from: ['q_scan', 'A'], to: ['q_process', 'A', 'R'], description: 'Character to process' },
        { from: ['q_scan', ' '], to: ['q_scan', ' ', 'R'], description: 'Spaces are kept unchanged' },
        { from: ['q_process', 'A'], to: ['q_shift', 'D', 'L'], description: 'Apply the shift (A+3=D)' },
        { from: ['q_shift', 'D'], to: ['q_return', '*', 'L'], description: 'Mark as processed' },
        { from: ['q_return', BLANK_SYMBOL], to: ['q_scan', BLANK_SYMBOL, 'R'], description: 'Continue scanning' },
        { from: ['q_scan', BLANK_SYMBOL], to: ['q_accept', BLANK_SYMBOL, 'R'], description: 'Finish' },
      ],
    },
    operation: {
      encryption: 'E(x) = (x + k) mod 26',
      decryption: 'D(x) = (x - k) mod 26',
      alphabetSize: CIPHER_ALPHABET.length,
      spaces: 'Spaces are neither encrypted nor counted in the alphabet; they are kept literally',
    },
  };
}

/** Same document shape, generated from a concrete specification. */
export function describeMachine(
  spec: MachineSpecification,
  description = 'Turing machine',
): MachineDocument {
  return {
    description,
    type: 'Deterministic Turing machine',
    states: [...spec.states].map((name) => ({ name })),
    inputAlphabet: [...spec.inputAlphabet],
    tapeAlphabet: [...spec.tapeAlphabet],
    initialState: spec.initialState,
    acceptStates: [...spec.acceptStates],
    blankSymbol: BLANK_SYMBOL,
    transitions: {
      format: TRANSITION_FORMAT,
      rules: listTransitionRules(spec.transitions).map((rule): DocumentedTransition => ({
        from: [rule.state, rule.symbol],
        to: [rule.nextState, rule.write, rule.move],
      })),
    },
  };
}

export async function writeMachineDocument(
  filePath: string,
  doc: MachineDocument,
): Promise<void> {
  await writeFile(filePath, JSON.stringify(doc, null, 2), 'utf-8');
  console.warn(`[DOC] Machine specification saved to: ${filePath}`);
}
