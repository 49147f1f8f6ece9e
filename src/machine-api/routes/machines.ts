import { Router } from 'express';
import { MAX_TRACE_STEPS } from '@shared/constants';
import type { ApiResponse, RunOutcomeRecord, TraceRecord } from '@shared/types';
import { createSpecification } from '@core/definition';
import { TuringMachine } from '@core/turing-machine';
import { describeMachine, type MachineDocument } from '@core/machine-document';
import { config } from '../config';
import { describeRequestSchema, runRequestSchema, traceRequestSchema } from '../schemas';

const router = Router();

// POST /machines/run -- load the input and run to a halt or the step budget
router.post('/run', (req, res) => {
  const parsed = runRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.message });
  }

  const { definition, input, maxSteps } = parsed.data;
  const machine = new TuringMachine(createSpecification(definition));
  machine.loadTape(input);

  const response: ApiResponse<RunOutcomeRecord> = {
    success: true,
    data: machine.execute(maxSteps ?? config.maxSteps),
  };
  res.json(response);
});

// POST /machines/trace -- same as run, with a snapshot per step
router.post('/trace', (req, res) => {
  const parsed = traceRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.message });
  }

  const { definition, input, maxSteps } = parsed.data;
  const machine = new TuringMachine(createSpecification(definition));
  machine.loadTape(input);

  const response: ApiResponse<TraceRecord> = {
    success: true,
    data: machine.trace(maxSteps ?? MAX_TRACE_STEPS),
  };
  res.json(response);
});

// POST /machines/describe -- human-readable document of a definition
router.post('/describe', (req, res) => {
  const parsed = describeRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.message });
  }

  const { definition, description } = parsed.data;
  const response: ApiResponse<MachineDocument> = {
    success: true,
    data: describeMachine(createSpecification(definition), description),
  };
  res.json(response);
});

export { router as machinesRouter };
