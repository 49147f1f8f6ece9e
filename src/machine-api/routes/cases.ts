import { Router } from 'express';
import path from 'path';
import { CASE_FILES } from '@shared/constants';
import type { ApiResponse } from '@shared/types';
import { loadTestCases } from '@core/test-cases';
import { config } from '../config';

const router = Router();

function isCaseKind(value: string): value is keyof typeof CASE_FILES {
  return Object.hasOwn(CASE_FILES, value);
}

// GET /cases/:kind -- sample lines from the cases directory
router.get('/:kind', async (req, res, next) => {
  const { kind } = req.params;
  if (!isCaseKind(kind)) {
    return res
      .status(404)
      .json({ success: false, error: `Unknown case file: ${kind}` });
  }

  try {
    const cases = await loadTestCases(path.resolve(config.casesDir, CASE_FILES[kind]));
    const response: ApiResponse<string[]> = { success: true, data: cases };
    res.json(response);
  } catch (err) {
    next(err);
  }
});

export { router as casesRouter };
