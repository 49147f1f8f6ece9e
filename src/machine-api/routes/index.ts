import { Router } from 'express';
import healthRouter from './health';
import { machinesRouter } from './machines';
import { cipherRouter } from './cipher';
import { casesRouter } from './cases';

const router = Router();
router.use(healthRouter);
router.use('/machines', machinesRouter);
router.use('/cipher', cipherRouter);
router.use('/cases', casesRouter);

export default router;
