import 'dotenv/config';

export const config = {
  casesDir: process.env.CASES_DIR || 'cases',
  outputDir: process.env.OUTPUT_DIR || '.',
  maxSteps: parseInt(process.env.MAX_STEPS || '100000', 10),
  engine: process.env.CIPHER_ENGINE === 'machine' ? 'machine' : 'arithmetic',
} as const;
