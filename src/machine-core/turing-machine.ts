import { DEFAULT_MAX_STEPS } from '@shared/constants';
import type { Direction, HaltReason } from '@shared/types';
import { Tape, type TapeSymbol } from './tape';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type State = string;

export interface TransitionTarget {
  nextState: State;
  write: TapeSymbol;
  move: Direction;
}

export interface TransitionRule extends TransitionTarget {
  state: State;
  symbol: TapeSymbol;
}

/** state -> symbol under head -> target. Lookups compare both keys by value. */
export type TransitionTable = ReadonlyMap<State, ReadonlyMap<TapeSymbol, TransitionTarget>>;

export interface MachineSpecification {
  states: ReadonlySet<State>;
  inputAlphabet: ReadonlySet<TapeSymbol>;
  tapeAlphabet: ReadonlySet<TapeSymbol>;
  initialState: State;
  acceptStates: ReadonlySet<State>;
  transitions: TransitionTable;
}

export interface MachineSnapshot {
  state: State;
  head: number;
  tape: TapeSymbol[];
  steps: number;
}

export interface RunOutcome {
  output: string;
  steps: number;
  haltReason: HaltReason;
  finalState: State;
  head: number;
}

export interface Trace {
  frames: MachineSnapshot[];
  outcome: RunOutcome;
}

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

/**
 * Builds the lookup table. A later rule for the same (state, symbol) pair
 * replaces an earlier one; nothing else is checked.
 */
export function buildTransitionTable(rules: Iterable<TransitionRule>): TransitionTable {
  const table = new Map<State, Map<TapeSymbol, TransitionTarget>>();
  for (const { state, symbol, nextState, write, move } of rules) {
    let row = table.get(state);
    if (!row) {
      row = new Map();
      table.set(state, row);
    }
    row.set(symbol, { nextState, write, move });
  }
  return table;
}

export function lookupTransition(
  table: TransitionTable,
  state: State,
  symbol: TapeSymbol,
): TransitionTarget | undefined {
  return table.get(state)?.get(symbol);
}

export function listTransitionRules(table: TransitionTable): TransitionRule[] {
  const rules: TransitionRule[] = [];
  for (const [state, row] of table) {
    for (const [symbol, target] of row) {
      rules.push({ state, symbol, ...target });
    }
  }
  return rules;
}

// ---------------------------------------------------------------------------
// Machine
// ---------------------------------------------------------------------------

export class TuringMachine {
  private readonly tape = new Tape();
  private currentState: State;
  private stepCount = 0;
  private lastHalt: HaltReason | null = null;

  constructor(readonly specification: MachineSpecification) {
    this.currentState = specification.initialState;
  }

  get state(): State {
    return this.currentState;
  }

  get head(): number {
    return this.tape.head;
  }

  get steps(): number {
    return this.stepCount;
  }

  /** Reason of the most recent halt, or null if none has been observed since loading. */
  get haltReason(): HaltReason | null {
    return this.lastHalt;
  }

  loadTape(input: string): void {
    this.tape.load(input);
    this.currentState = this.specification.initialState;
    this.stepCount = 0;
    this.lastHalt = null;
  }

  /**
   * Performs one transition. Returns false when the machine halts, either
   * because it sits in an accept state (checked before the tape is read) or
   * because no rule matches (state, symbol under head).
   */
  step(): boolean {
    if (this.specification.acceptStates.has(this.currentState)) {
      this.lastHalt = 'accepted';
      return false;
    }

    const symbol = this.tape.read();
    const target = lookupTransition(this.specification.transitions, this.currentState, symbol);
    if (!target) {
      this.lastHalt = 'undefined_transition';
      return false;
    }

    this.tape.write(target.write);
    this.currentState = target.nextState;
    this.tape.move(target.move);
    this.stepCount += 1;
    return true;
  }

  run(maxSteps: number = DEFAULT_MAX_STEPS): string {
    return this.execute(maxSteps).output;
  }

  /**
   * Runs until the machine halts or `maxSteps` steps have been invoked.
   * Unlike `run`, the result says why execution stopped.
   */
  execute(maxSteps: number = DEFAULT_MAX_STEPS): RunOutcome {
    this.drive(maxSteps);
    return this.outcome();
  }

  /** Like `execute`, also recording a snapshot after loading and after every step. */
  trace(maxSteps: number = DEFAULT_MAX_STEPS): Trace {
    const frames = [this.snapshot()];
    this.drive(maxSteps, () => frames.push(this.snapshot()));
    return { frames, outcome: this.outcome() };
  }

  getTapeContent(): string {
    return this.tape.content();
  }

  snapshot(): MachineSnapshot {
    return {
      state: this.currentState,
      head: this.tape.head,
      tape: this.tape.symbols(),
      steps: this.stepCount,
    };
  }

  private drive(maxSteps: number, afterStep?: () => void): void {
    for (let invoked = 0; invoked < maxSteps; invoked += 1) {
      if (!this.step()) {
        return;
      }
      afterStep?.();
    }
    // Budget spent: a machine sitting in an accept state has still accepted.
    this.lastHalt = this.specification.acceptStates.has(this.currentState)
      ? 'accepted'
      : 'max_steps';
  }

  private outcome(): RunOutcome {
    return {
      output: this.tape.content(),
      steps: this.stepCount,
      haltReason: this.lastHalt ?? 'max_steps',
      finalState: this.currentState,
      head: this.tape.head,
    };
  }
}
