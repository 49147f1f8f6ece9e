import { describe, it, expect } from 'vitest';
import healthRouter from '../../../src/machine-api/routes/health';

describe('health router', () => {
  it('exports a router', () => {
    expect(healthRouter).toBeDefined();
    expect(healthRouter.stack).toBeDefined();
  });
});
