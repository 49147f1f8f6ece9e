import { DEFAULT_MAX_STEPS } from '@shared/constants';
import type { CipherEngine, CipherMode, CipherResultRecord } from '@shared/types';
import { applyCipher, parseKey } from './caesar';
import { runCaesarMachine } from './caesar-machine';
import { parseCaseLine } from './test-cases';

export interface CipherJob {
  mode: CipherMode;
  key: string;
  message: string;
  engine?: CipherEngine;
  maxSteps?: number;
}

export type CipherJobResult =
  | { ok: true; value: CipherResultRecord }
  | { ok: false; error: string };

/**
 * Runs one encryption or decryption through the chosen engine: plain index
 * arithmetic, or the cipher transition table on the Turing machine.
 */
export function runCipherJob(job: CipherJob): CipherJobResult {
  const key = parseKey(job.key);
  if (!key.ok) {
    return { ok: false, error: key.error };
  }

  const engine = job.engine ?? 'arithmetic';
  let output: string;
  if (engine === 'machine') {
    const result = runCaesarMachine(job.message, key.shift, job.mode, job.maxSteps ?? DEFAULT_MAX_STEPS);
    if (!result.ok) {
      return { ok: false, error: result.error };
    }
    output = result.output;
  } else {
    output = applyCipher(job.mode, job.message, key.shift);
  }

  return {
    ok: true,
    value: { key: job.key, shift: key.shift, input: job.message, output, engine },
  };
}

export function runCipherLine(
  mode: CipherMode,
  line: string,
  engine?: CipherEngine,
  maxSteps?: number,
): CipherJobResult {
  const parsed = parseCaseLine(line);
  if (!parsed.ok) {
    return { ok: false, error: parsed.error };
  }
  return runCipherJob({
    mode,
    key: parsed.value.keyPart,
    message: parsed.value.message,
    engine,
    maxSteps,
  });
}
