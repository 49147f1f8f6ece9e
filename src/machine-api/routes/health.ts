import { Router } from 'express';
import { MACHINE_CORE_VERSION } from '@core/index';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/health', (_req, res) => {
  const response: ApiResponse<{ status: string; coreVersion: string }> = {
    success: true,
    data: { status: 'ok', coreVersion: MACHINE_CORE_VERSION },
  };
  res.json(response);
});

export default router;
