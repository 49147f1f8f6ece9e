import { z } from 'zod';
import {
  CIPHER_ENGINES,
  DEFAULT_MAX_STEPS,
  MAX_INPUT_LENGTH,
  MAX_TRACE_STEPS,
} from '@shared/constants';
import { machineDefinitionSchema } from '@core/definition';

export const runRequestSchema = z.object({
  definition: machineDefinitionSchema,
  input: z.string().max(MAX_INPUT_LENGTH),
  maxSteps: z.number().int().nonnegative().max(DEFAULT_MAX_STEPS).optional(),
});

export const traceRequestSchema = runRequestSchema.extend({
  maxSteps: z.number().int().nonnegative().max(MAX_TRACE_STEPS).optional(),
});

export const describeRequestSchema = z.object({
  definition: machineDefinitionSchema,
  description: z.string().optional(),
});

const engineSchema = z.enum(CIPHER_ENGINES).optional();

export const cipherRequestSchema = z.union([
  z.object({ line: z.string(), engine: engineSchema }),
  z.object({ key: z.string(), message: z.string(), engine: engineSchema }),
]);
