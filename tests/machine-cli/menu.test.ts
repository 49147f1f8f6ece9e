import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, access } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { CipherEngine } from '@shared/types';
import {
  processCaseFile,
  processManualInput,
  runMenu,
  viewAllCases,
  type MenuContext,
} from '@cli/menu';
import type { Prompt } from '@cli/prompt';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function scriptedPrompt(answers: string[]): { prompt: Prompt; output: string[] } {
  const output: string[] = [];
  const queue = [...answers];
  return {
    output,
    prompt: {
      ask: async (question) => {
        output.push(question);
        const answer = queue.shift();
        if (answer === undefined) {
          throw new Error(`No scripted answer for: ${question}`);
        }
        return answer;
      },
      print: (line = '') => {
        output.push(line);
      },
    },
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

let dir: string;

function makeCtx(prompt: Prompt, engine: CipherEngine = 'arithmetic'): MenuContext {
  return { prompt, casesDir: dir, outputDir: dir, engine, maxSteps: 100000 };
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'tm-cli-'));
  await writeFile(path.join(dir, 'encrypt-cases.txt'), '3#HELLO WORLD\n1#AB', 'utf-8');
  await writeFile(path.join(dir, 'decrypt-cases.txt'), '3#KHOOR ZRUOG', 'utf-8');
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Case files
// ---------------------------------------------------------------------------

describe('processCaseFile', () => {
  it('encrypts the selected case and saves the result', async () => {
    const { prompt, output } = scriptedPrompt(['1']);
    await processCaseFile('encrypt', makeCtx(prompt));

    expect(output).toContain('[1] 3#HELLO WORLD');
    expect(output).toContain('[2] 1#AB');
    expect(output).toContain('\n✓ Encrypted message: KHOOR ZRUOG');
    expect(await readFile(path.join(dir, 'encryption-result.txt'), 'utf-8')).toBe(
      'Input: 3#HELLO WORLD\nKey: 3\nOriginal: HELLO WORLD\nEncrypted: KHOOR ZRUOG\n',
    );
  });

  it('decrypts through the machine engine', async () => {
    const { prompt, output } = scriptedPrompt(['1']);
    await processCaseFile('decrypt', makeCtx(prompt, 'machine'));

    expect(output).toContain('\n Running Turing machine (machine)...');
    expect(output).toContain('\n✓ Decrypted message: HELLO WORLD');
    expect(await readFile(path.join(dir, 'decryption-result.txt'), 'utf-8')).toBe(
      'Input: 3#KHOOR ZRUOG\nKey: 3\nEncrypted: KHOOR ZRUOG\nDecrypted: HELLO WORLD\n',
    );
  });

  it('cancels on 0 without writing a result', async () => {
    const { prompt } = scriptedPrompt(['0']);
    await processCaseFile('encrypt', makeCtx(prompt));
    expect(await fileExists(path.join(dir, 'encryption-result.txt'))).toBe(false);
  });

  it('reports out-of-range and non-numeric choices', async () => {
    const outOfRange = scriptedPrompt(['9']);
    await processCaseFile('encrypt', makeCtx(outOfRange.prompt));
    expect(outOfRange.output.at(-1)).toBe(' Invalid option');

    const negative = scriptedPrompt(['-1']);
    await processCaseFile('encrypt', makeCtx(negative.prompt));
    expect(negative.output.at(-1)).toBe(' Invalid option');

    const notNumeric = scriptedPrompt(['two']);
    await processCaseFile('encrypt', makeCtx(notNumeric.prompt));
    expect(notNumeric.output.at(-1)).toBe(' Invalid input');
  });

  it('returns without asking when the case file is missing', async () => {
    await rm(path.join(dir, 'decrypt-cases.txt'));
    const { prompt, output } = scriptedPrompt([]);
    await processCaseFile('decrypt', makeCtx(prompt));
    expect(output).not.toContain('[1] 3#KHOOR ZRUOG');
  });
});

// ---------------------------------------------------------------------------
// Manual input
// ---------------------------------------------------------------------------

describe('processManualInput', () => {
  it('upper-cases the entry and saves the manual result', async () => {
    const { prompt, output } = scriptedPrompt(['2', 'd#khoor']);
    await processManualInput(makeCtx(prompt));

    expect(output).toContain('Key: D (shift = 4)');
    expect(output).toContain('\n✓ Decrypted message: GDKKN');
    expect(await readFile(path.join(dir, 'manual-result.txt'), 'utf-8')).toBe(
      'Operation: Decryption\nInput: D#KHOOR\nResult: GDKKN\n',
    );
  });

  it('requires the separator', async () => {
    const { prompt, output } = scriptedPrompt(['1', 'HELLO']);
    await processManualInput(makeCtx(prompt));
    expect(output.at(-1)).toBe(" Wrong format: '#' must separate key and message");
  });

  it('rejects operations other than 1 and 2', async () => {
    const { prompt, output } = scriptedPrompt(['3']);
    await processManualInput(makeCtx(prompt));
    expect(output.at(-1)).toBe(' Invalid option');

    const negative = scriptedPrompt(['-1']);
    await processManualInput(makeCtx(negative.prompt));
    expect(negative.output.at(-1)).toBe(' Invalid option');
  });

  it('reports invalid keys', async () => {
    const { prompt, output } = scriptedPrompt(['1', 'KEY#HELLO']);
    await processManualInput(makeCtx(prompt));
    expect(output.at(-1)).toBe(" Error: Invalid key 'KEY': expected digits or a single letter");
  });
});

// ---------------------------------------------------------------------------
// Menu loop
// ---------------------------------------------------------------------------

describe('viewAllCases', () => {
  it('lists both files and waits for Enter', async () => {
    const { prompt, output } = scriptedPrompt(['']);
    await viewAllCases(makeCtx(prompt));
    expect(output).toContain('[1] 3#HELLO WORLD');
    expect(output).toContain('[1] 3#KHOOR ZRUOG');
    expect(output.at(-1)).toBe('\nPress Enter to continue...');
  });
});

describe('runMenu', () => {
  it('loops on invalid options until exit', async () => {
    const { prompt, output } = scriptedPrompt(['7', '5']);
    await runMenu(makeCtx(prompt));
    expect(output).toContain(' Invalid option. Try again.');
    expect(output).toContain('Thanks for using the Turing Machine - Caesar Cipher');
  });

  it('runs an option and returns to the menu', async () => {
    const { prompt, output } = scriptedPrompt(['1', '2', '5']);
    await runMenu(makeCtx(prompt));
    expect(output).toContain('\n✓ Encrypted message: BC');
    expect(output.filter((line) => line === '[5] Exit')).toHaveLength(2);
  });

  it('reports errors from an option and keeps going', async () => {
    const { prompt, output } = scriptedPrompt(['1', '1', '5']);
    await runMenu({ ...makeCtx(prompt), outputDir: path.join(dir, 'missing', 'dir') });
    expect(output.some((line) => line.startsWith(' Unexpected error: '))).toBe(true);
    expect(output).toContain('Thanks for using the Turing Machine - Caesar Cipher');
  });
});
