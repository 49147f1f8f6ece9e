import { z } from 'zod';
import { DIRECTIONS } from '@shared/constants';
import {
  buildTransitionTable,
  listTransitionRules,
  type MachineSpecification,
} from './turing-machine';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const symbolSchema = z
  .string()
  .refine((s) => Array.from(s).length === 1, { message: 'Symbols must be a single character' });

const stateSchema = z.string().min(1);

export const transitionRuleSchema = z.object({
  state: stateSchema,
  symbol: symbolSchema,
  nextState: stateSchema,
  write: symbolSchema,
  move: z.enum(DIRECTIONS),
});

export const machineDefinitionSchema = z.object({
  states: z.array(stateSchema),
  inputAlphabet: z.array(symbolSchema),
  tapeAlphabet: z.array(symbolSchema),
  initialState: stateSchema,
  acceptStates: z.array(stateSchema).default([]),
  transitions: z.array(transitionRuleSchema).default([]),
});

export type MachineDefinition = z.infer<typeof machineDefinitionSchema>;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export function parseMachineDefinition(
  input: unknown,
): { success: true; data: MachineDefinition } | { success: false; error: string } {
  const result = machineDefinitionSchema.safeParse(input);
  if (!result.success) {
    return { success: false, error: result.error.message };
  }
  return { success: true, data: result.data };
}

/**
 * Set membership of states and symbols is not cross-checked: a rule may name
 * a state outside `states` and the engine will still follow it.
 */
export function createSpecification(definition: MachineDefinition): MachineSpecification {
  return {
    states: new Set(definition.states),
    inputAlphabet: new Set(definition.inputAlphabet),
    tapeAlphabet: new Set(definition.tapeAlphabet),
    initialState: definition.initialState,
    acceptStates: new Set(definition.acceptStates),
    transitions: buildTransitionTable(definition.transitions),
  };
}

/** Inverse of `createSpecification`; sets are listed in insertion order. */
export function toDefinition(spec: MachineSpecification): MachineDefinition {
  return {
    states: [...spec.states],
    inputAlphabet: [...spec.inputAlphabet],
    tapeAlphabet: [...spec.tapeAlphabet],
    initialState: spec.initialState,
    acceptStates: [...spec.acceptStates],
    transitions: listTransitionRules(spec.transitions),
  };
}
