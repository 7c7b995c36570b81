/**
 * @fileoverview Express router composition for the gateway HTTP API.
 *
 * Wires together the job, profile and device route registrations plus the health check.
 * Shared dependencies are passed into each registration helper.
 */

import { Router } from 'express';
import type { RouteDependencies } from './routes/route-helpers';
import { respond } from './routes/route-helpers';
import { registerJobRoutes } from './routes/job-routes';
import { registerProfileRoutes } from './routes/profile-routes';
import { registerDeviceRoutes } from './routes/device-routes';

export function createAPIRoutes(deps: RouteDependencies): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    await respond(res, deps, () => {
      const stats = deps.orchestrator.getStats();
      return {
        status: 'ok',
        uptimeSeconds: Math.round(process.uptime()),
        activeJobs: stats.activeJobs,
        jobPool: stats.pool,
        requestPool: deps.requestPool.getStats()
      };
    });
  });

  registerJobRoutes(router, deps);
  registerProfileRoutes(router, deps);
  registerDeviceRoutes(router, deps);

  return router;
}
