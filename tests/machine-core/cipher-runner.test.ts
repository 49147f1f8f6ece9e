import { describe, it, expect } from 'vitest';
import { runCipherJob, runCipherLine } from '@core/cipher-runner';

describe('runCipherLine', () => {
  it('encrypts with arithmetic by default', () => {
    expect(runCipherLine('encrypt', '3#HELLO WORLD')).toEqual({
      ok: true,
      value: { key: '3', shift: 3, input: 'HELLO WORLD', output: 'KHOOR ZRUOG', engine: 'arithmetic' },
    });
  });

  it('gives the same output through the machine', () => {
    expect(runCipherLine('decrypt', 'C#FDW', 'machine')).toEqual({
      ok: true,
      value: { key: 'C', shift: 3, input: 'FDW', output: 'CAT', engine: 'machine' },
    });
  });

  it('reports lines without a separator', () => {
    expect(runCipherLine('encrypt', 'HELLO').ok).toBe(false);
  });
});

describe('runCipherJob', () => {
  it('reports invalid keys', () => {
    expect(runCipherJob({ mode: 'encrypt', key: '??', message: 'HI' })).toEqual({
      ok: false,
      error: "Invalid key '??': expected digits or a single letter",
    });
  });

  it('copies the blank symbol with arithmetic', () => {
    const result = runCipherJob({ mode: 'encrypt', key: '1', message: 'A_B' });
    expect(result.ok && result.value.output).toBe('B_C');
  });

  it('refuses the blank symbol on the machine', () => {
    const result = runCipherJob({ mode: 'encrypt', key: '1', message: 'A_B', engine: 'machine' });
    expect(result.ok).toBe(false);
  });

  it('passes the step budget to the machine', () => {
    const result = runCipherJob({
      mode: 'encrypt',
      key: '1',
      message: 'ABCDEF',
      engine: 'machine',
      maxSteps: 3,
    });
    expect(result).toEqual({
      ok: false,
      error: 'Cipher machine stopped without accepting (max_steps after 3 steps)',
    });
  });

  it('keeps exact shifts for very long numeric keys', () => {
    const small = runCipherLine('encrypt', '100000000000000000001#A');
    expect(small.ok && small.value.output).toBe('X');

    const huge = runCipherLine('encrypt', `${'9'.repeat(400)}#HELLO WORLD`);
    expect(huge.ok && huge.value.shift).toBe(15);
    expect(huge.ok && huge.value.output).toBe('WTAAD LDGAS');
  });
});
