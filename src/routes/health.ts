import { Router, Request, Response } from 'express';

/**
 * Named dependency probes, e.g. { database: () => getDatabaseStatus().connected }
 */
export type HealthChecks = Record<string, () => boolean>;

const runChecks = (checks: HealthChecks): Record<string, { connected: boolean }> =>
  Object.fromEntries(
    Object.entries(checks).map(([name, check]) => [name, { connected: check() }])
  );

export const createHealthRoutes = (checks: HealthChecks): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const services = runChecks(checks);
    const isHealthy = Object.values(services).every((s) => s.connected);

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services,
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = Object.values(runChecks(checks)).every((s) => s.connected);

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
