import { Router } from 'express';
import { CIPHER_MODES } from '@shared/constants';
import type { ApiResponse, CipherMode, CipherResultRecord } from '@shared/types';
import { runCipherJob, runCipherLine } from '@core/cipher-runner';
import { buildCipherMachineDocument, type MachineDocument } from '@core/machine-document';
import { config } from '../config';
import { cipherRequestSchema } from '../schemas';

const router = Router();

function isCipherMode(value: string): value is CipherMode {
  return (CIPHER_MODES as readonly string[]).includes(value);
}

// GET /cipher/document -- conceptual description of the cipher machine
router.get('/document', (_req, res) => {
  const response: ApiResponse<MachineDocument> = {
    success: true,
    data: buildCipherMachineDocument(),
  };
  res.json(response);
});

// POST /cipher/:mode -- encrypt or decrypt a `key#message` line or a key/message pair
router.post('/:mode', (req, res) => {
  const { mode } = req.params;
  if (!isCipherMode(mode)) {
    return res
      .status(404)
      .json({ success: false, error: `Invalid mode. Must be one of: ${CIPHER_MODES.join(', ')}` });
  }

  const parsed = cipherRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.message });
  }

  const body = parsed.data;
  const result =
    'line' in body
      ? runCipherLine(mode, body.line, body.engine, config.maxSteps)
      : runCipherJob({
          mode,
          key: body.key,
          message: body.message,
          engine: body.engine,
          maxSteps: config.maxSteps,
        });

  if (!result.ok) {
    return res.status(400).json({ success: false, error: result.error });
  }

  const response: ApiResponse<CipherResultRecord> = { success: true, data: result.value };
  res.json(response);
});

export { router as cipherRouter };
