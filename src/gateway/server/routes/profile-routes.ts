/**
 * @fileoverview Read-only profile listing.
 */

import type { Router } from 'express';
import { respond, type RouteDependencies } from './route-helpers';

export function registerProfileRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/profiles', async (_req, res) => {
    await respond(res, deps, () => ({ profiles: deps.orchestrator.listProfiles() }));
  });
}
