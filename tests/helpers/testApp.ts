import { Application } from 'express';

import { createApp } from '../../src/app';
import { HealthChecks } from '../../src/routes/health';

import { createTestLedger, TestLedger } from './testLedger';

export interface TestApp extends TestLedger {
  app: Application;
  clock: { now: number };
}

/**
 * App wired to in-memory stores and a clock the test moves by hand
 */
export const createTestApp = (healthChecks: HealthChecks = {}): TestApp => {
  const deps = createTestLedger();
  const clock = { now: 0 };
  const app = createApp({ ledger: deps.ledger, clock: () => clock.now, healthChecks });
  return { ...deps, app, clock };
};
