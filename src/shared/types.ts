import type { CIPHER_ENGINES, CIPHER_MODES, DIRECTIONS, HALT_REASONS } from './constants';

export type Direction = (typeof DIRECTIONS)[number];
export type HaltReason = (typeof HALT_REASONS)[number];
export type CipherMode = (typeof CIPHER_MODES)[number];
export type CipherEngine = (typeof CIPHER_ENGINES)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface MachineSnapshotRecord {
  state: string;
  head: number;
  tape: string[];
  steps: number;
}

export interface RunOutcomeRecord {
  output: string;
  steps: number;
  haltReason: HaltReason;
  finalState: string;
  head: number;
}

export interface TraceRecord {
  frames: MachineSnapshotRecord[];
  outcome: RunOutcomeRecord;
}

export interface CipherResultRecord {
  key: string;
  shift: number;
  input: string;
  output: string;
  engine: CipherEngine;
}
