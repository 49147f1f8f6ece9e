import path from 'path';
import { CASE_FILES, RESULT_FILES } from '@shared/constants';
import type { CipherEngine, CipherMode } from '@shared/types';
import { runCipherJob, runCipherLine } from '@core/cipher-runner';
import {
  formatCaseResult,
  formatManualResult,
  loadTestCases,
  saveResult,
} from '@core/test-cases';
import type { Prompt } from './prompt';

export interface MenuContext {
  prompt: Prompt;
  casesDir: string;
  outputDir: string;
  engine: CipherEngine;
  maxSteps: number;
}

const RULE = '='.repeat(60);
const DIVIDER = '-'.repeat(60);

const MODE_LABELS: Record<CipherMode, { title: string; verb: string; done: string }> = {
  encrypt: { title: 'ENCRYPTION', verb: 'encrypt', done: 'Encrypted message' },
  decrypt: { title: 'DECRYPTION', verb: 'decrypt', done: 'Decrypted message' },
};

/** Signed integers only; anything else is null. */
function parseChoice(answer: string): number | null {
  const trimmed = answer.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

function header(prompt: Prompt, title: string): void {
  prompt.print();
  prompt.print(RULE);
  prompt.print(title);
  prompt.print(RULE);
}

export function displayMenu(prompt: Prompt): void {
  prompt.print();
  prompt.print(RULE);
  prompt.print('    TURING MACHINE - CAESAR CIPHER');
  prompt.print(RULE);
  prompt.print();
  prompt.print('[1] Encrypt message');
  prompt.print('[2] Decrypt message');
  prompt.print('[3] Enter message manually');
  prompt.print('[4] View available test cases');
  prompt.print('[5] Exit');
  prompt.print(DIVIDER);
}

export async function showTestCases(prompt: Prompt, filePath: string): Promise<string[]> {
  const cases = await loadTestCases(filePath);
  if (cases.length > 0) {
    prompt.print();
    prompt.print(` Cases available in '${filePath}':`);
    prompt.print(DIVIDER);
    cases.forEach((line, i) => prompt.print(`[${i + 1}] ${line}`));
  }
  return cases;
}

export async function processCaseFile(mode: CipherMode, ctx: MenuContext): Promise<void> {
  const { prompt } = ctx;
  const labels = MODE_LABELS[mode];
  header(prompt, `MODE: ${labels.title}`);

  const cases = await showTestCases(prompt, path.join(ctx.casesDir, CASE_FILES[mode]));
  if (cases.length === 0) {
    return;
  }

  const choice = parseChoice(
    await prompt.ask(`\nSelect the number of the case to ${labels.verb} (0 to cancel): `),
  );
  if (choice === null) {
    prompt.print(' Invalid input');
    return;
  }
  if (choice === 0) {
    return;
  }
  if (choice < 0 || choice > cases.length) {
    prompt.print(' Invalid option');
    return;
  }

  const line = cases[choice - 1];
  const result = runCipherLine(mode, line, ctx.engine, ctx.maxSteps);
  if (!result.ok) {
    prompt.print(` Error: ${result.error}`);
    return;
  }

  const { key, shift, input, output } = result.value;
  prompt.print();
  prompt.print(DIVIDER);
  prompt.print('PROCESSING...');
  prompt.print(DIVIDER);
  prompt.print(`Full input:  ${line}`);
  prompt.print(`Key:         ${key} (shift = ${shift})`);
  prompt.print(`Message:     ${input}`);
  prompt.print(`\n Running Turing machine (${ctx.engine})...`);
  prompt.print(`\n✓ ${labels.done}: ${output}`);

  await saveResult(
    path.join(ctx.outputDir, RESULT_FILES[mode]),
    formatCaseResult({ mode, input: line, shift, message: input, output }),
  );
}

export async function processManualInput(ctx: MenuContext): Promise<void> {
  const { prompt } = ctx;
  header(prompt, 'MODE: MANUAL INPUT');
  prompt.print();
  prompt.print('[1] Encrypt');
  prompt.print('[2] Decrypt');

  const op = parseChoice(await prompt.ask('Select operation: '));
  if (op === null) {
    prompt.print(' Invalid input');
    return;
  }
  if (op !== 1 && op !== 2) {
    prompt.print(' Invalid option');
    return;
  }
  const mode: CipherMode = op === 1 ? 'encrypt' : 'decrypt';

  prompt.print('\nEnter the input as: KEY#MESSAGE');
  prompt.print('Example: 3#HELLO WORLD  or  D#HELLO WORLD');
  const entry = (await prompt.ask('Input: ')).trim();

  const separator = entry.indexOf('#');
  if (separator === -1) {
    prompt.print(" Wrong format: '#' must separate key and message");
    return;
  }
  const keyPart = entry.slice(0, separator).toUpperCase();
  const message = entry.slice(separator + 1).toUpperCase();

  const result = runCipherJob({
    mode,
    key: keyPart,
    message,
    engine: ctx.engine,
    maxSteps: ctx.maxSteps,
  });
  if (!result.ok) {
    prompt.print(` Error: ${result.error}`);
    return;
  }

  prompt.print();
  prompt.print(DIVIDER);
  prompt.print('PROCESSING...');
  prompt.print(DIVIDER);
  prompt.print(`Key: ${keyPart} (shift = ${result.value.shift})`);
  prompt.print(`Message: ${message}`);
  prompt.print(`\n✓ ${MODE_LABELS[mode].done}: ${result.value.output}`);

  await saveResult(
    path.join(ctx.outputDir, RESULT_FILES.manual),
    formatManualResult({ mode, keyPart, message, output: result.value.output }),
  );
}

export async function viewAllCases(ctx: MenuContext): Promise<void> {
  const { prompt } = ctx;
  header(prompt, 'AVAILABLE TEST CASES');

  prompt.print('\n ENCRYPTION CASES:');
  await showTestCases(prompt, path.join(ctx.casesDir, CASE_FILES.encrypt));

  prompt.print('\n DECRYPTION CASES:');
  await showTestCases(prompt, path.join(ctx.casesDir, CASE_FILES.decrypt));

  await prompt.ask('\nPress Enter to continue...');
}

/**
 * Menu loop. Returns when the user picks [5]; an error inside one option is
 * reported and the menu is shown again.
 */
export async function runMenu(ctx: MenuContext): Promise<void> {
  const { prompt } = ctx;
  for (;;) {
    displayMenu(prompt);
    const option = (await prompt.ask('Select an option: ')).trim();

    try {
      switch (option) {
        case '1':
          await processCaseFile('encrypt', ctx);
          break;
        case '2':
          await processCaseFile('decrypt', ctx);
          break;
        case '3':
          await processManualInput(ctx);
          break;
        case '4':
          await viewAllCases(ctx);
          break;
        case '5':
          prompt.print();
          prompt.print(RULE);
          prompt.print('Thanks for using the Turing Machine - Caesar Cipher');
          prompt.print(RULE);
          return;
        default:
          prompt.print(' Invalid option. Try again.');
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      prompt.print(` Unexpected error: ${message}`);
    }
  }
}
