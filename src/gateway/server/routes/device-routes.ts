/**
 * @fileoverview Device listing and the operator reconnect action.
 */

import type { Router } from 'express';
import { respond, type RouteDependencies } from './route-helpers';

export function registerDeviceRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/devices', async (_req, res) => {
    await respond(res, deps, () => ({ devices: deps.orchestrator.listDevices() }));
  });

  router.post('/devices/:deviceId/reconnect', async (req, res) => {
    await respond(res, deps, () => {
      const device = deps.orchestrator.reconnectDevice(req.params.deviceId);
      deps.logger.info(`Device ${device.id} reconnected by request`);
      return { device };
    });
  });
}
