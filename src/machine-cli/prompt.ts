import { createInterface, type Interface } from 'node:readline/promises';

export interface Prompt {
  ask(question: string): Promise<string>;
  print(line?: string): void;
}

export interface ReadlinePrompt extends Prompt {
  readonly rl: Interface;
  close(): void;
}

export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ReadlinePrompt {
  const rl = createInterface({ input, output });
  return {
    rl,
    ask: (question) => rl.question(question),
    print: (line = '') => {
      output.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}
