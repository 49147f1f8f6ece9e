// machine-core: Pure logic (tape, transition engine, cipher, case files)
// No HTTP and no prompts. Only test-cases.ts and machine-document.ts touch the filesystem.

export const MACHINE_CORE_VERSION = '0.1.0';

export * from './tape';
export * from './turing-machine';
export * from './definition';
export * from './caesar';
export * from './caesar-machine';
export * from './test-cases';
export * from './cipher-runner';
export * from './machine-document';
