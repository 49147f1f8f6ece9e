import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { API_PREFIX } from '@shared/constants';
import apiRouter from './routes/index';
import { ensureSampleFiles } from '@core/test-cases';

const app = express();
const server = createServer(app);

app.use(helmet());
app.use(cors({ origin: config.clientUrl, credentials: true }));
app.use(express.json({ limit: '1mb' }));
app.use(requestLogger);

app.use(API_PREFIX, apiRouter);

app.use(errorHandler);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received — shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

async function start() {
  const { encryptFile, decryptFile } = await ensureSampleFiles(config.casesDir);
  console.warn(`[CASES] Serving ${encryptFile} and ${decryptFile}`);

  server.listen(config.port, () => {
    console.warn(`[SERVER] Turing Cipher Lab API on port ${config.port}`);
    console.warn(
      `[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`,
    );
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});

export { app, server };
