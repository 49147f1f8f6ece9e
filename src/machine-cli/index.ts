import path from 'path';
import { RESULT_FILES } from '@shared/constants';
import { ensureSampleFiles } from '@core/test-cases';
import { buildCipherMachineDocument, writeMachineDocument } from '@core/machine-document';
import { config } from './config';
import { createReadlinePrompt } from './prompt';
import { runMenu } from './menu';

async function main() {
  await ensureSampleFiles(config.casesDir);
  await writeMachineDocument(
    path.join(config.outputDir, RESULT_FILES.document),
    buildCipherMachineDocument(),
  );

  const prompt = createReadlinePrompt();
  prompt.rl.on('SIGINT', () => {
    console.warn('\n\n  Interrupted by user');
    prompt.close();
    process.exit(0);
  });

  try {
    await runMenu({
      prompt,
      casesDir: config.casesDir,
      outputDir: config.outputDir,
      engine: config.engine,
      maxSteps: config.maxSteps,
    });
  } finally {
    prompt.close();
  }
}

main().catch((err) => {
  console.error('[CLI] Failed:', err);
  process.exit(1);
});
