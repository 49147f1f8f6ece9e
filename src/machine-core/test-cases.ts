import { readFile, writeFile, access, mkdir } from 'fs/promises';
import path from 'path';
import { CASE_FILES, DEFAULT_ENCRYPT_CASES } from '@shared/constants';
import type { CipherMode } from '@shared/types';
import { caesarEncrypt, parseKey } from './caesar';

// --- Types ---

export interface CaseLine {
  raw: string;
  keyPart: string;
  message: string;
  shift: number;
}

export type CaseLineResult = { ok: true; value: CaseLine } | { ok: false; error: string };

export interface CaseResultEntry {
  mode: CipherMode;
  input: string;
  shift: number;
  message: string;
  output: string;
}

export interface ManualResultEntry {
  mode: CipherMode;
  keyPart: string;
  message: string;
  output: string;
}

// --- Parsing ---

/** Splits `key#message` at the first '#'; the message may itself contain '#'. */
export function parseCaseLine(line: string): CaseLineResult {
  const separator = line.indexOf('#');
  if (separator === -1) {
    return { ok: false, error: "Wrong format: '#' must separate key and message" };
  }

  const keyPart = line.slice(0, separator);
  const message = line.slice(separator + 1);
  const key = parseKey(keyPart);
  if (!key.ok) {
    return { ok: false, error: key.error };
  }
  return { ok: true, value: { raw: line, keyPart, message, shift: key.shift } };
}

// --- Files ---

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function loadTestCases(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      console.warn(`[CASES] File not found: '${filePath}'`);
      return [];
    }
    throw err;
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function saveResult(filePath: string, content: string): Promise<void> {
  await writeFile(filePath, content, 'utf-8');
  console.warn(`[CASES] Result saved to: ${filePath}`);
}

/** Encrypts every parseable line, keeping the key text as written. */
export function generateDecryptCases(encryptLines: readonly string[]): string[] {
  const lines: string[] = [];
  for (const line of encryptLines) {
    const parsed = parseCaseLine(line);
    if (!parsed.ok) {
      continue;
    }
    const { keyPart, message, shift } = parsed.value;
    lines.push(`${keyPart}#${caesarEncrypt(message, shift)}`);
  }
  return lines;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (err) {
    if (isMissingFile(err)) {
      return false;
    }
    throw err;
  }
}

/**
 * Writes the sample encrypt file if it is missing, then regenerates the
 * decrypt file from whatever the encrypt file holds.
 */
export async function ensureSampleFiles(
  dir: string,
): Promise<{ encryptFile: string; decryptFile: string }> {
  const encryptFile = path.join(dir, CASE_FILES.encrypt);
  const decryptFile = path.join(dir, CASE_FILES.decrypt);
  await mkdir(dir, { recursive: true });

  if (!(await exists(encryptFile))) {
    await writeFile(encryptFile, DEFAULT_ENCRYPT_CASES.join('\n'), 'utf-8');
    console.warn(`[CASES] Created '${encryptFile}'`);
  }

  const decryptCases = generateDecryptCases(await loadTestCases(encryptFile));
  await writeFile(decryptFile, decryptCases.join('\n'), 'utf-8');
  console.warn(`[CASES] Created/updated '${decryptFile}'`);

  return { encryptFile, decryptFile };
}

// --- Result text ---

export function formatCaseResult(entry: CaseResultEntry): string {
  if (entry.mode === 'encrypt') {
    return (
      `Input: ${entry.input}\nKey: ${entry.shift}\n` +
      `Original: ${entry.message}\nEncrypted: ${entry.output}\n`
    );
  }
  return (
    `Input: ${entry.input}\nKey: ${entry.shift}\n` +
    `Encrypted: ${entry.message}\nDecrypted: ${entry.output}\n`
  );
}

export function formatManualResult(entry: ManualResultEntry): string {
  const operation = entry.mode === 'encrypt' ? 'Encryption' : 'Decryption';
  return `Operation: ${operation}\nInput: ${entry.keyPart}#${entry.message}\nResult: ${entry.output}\n`;
}
