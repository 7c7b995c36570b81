/**
 * @fileoverview Job submission, listing, status and cancellation routes.
 */

import type { Router } from 'express';
import { JobListQuerySchema, SubmitJobRequestSchema } from '../../schemas/gateway.schemas';
import { cancelJob, requireJob } from '../job-operations';
import { parseOrThrow, respond, type RouteDependencies } from './route-helpers';

export function registerJobRoutes(router: Router, deps: RouteDependencies): void {
  router.post('/jobs', async (req, res) => {
    await respond(res, deps, () => {
      const request = parseOrThrow(SubmitJobRequestSchema, req.body);
      const jobId = deps.orchestrator.submit(request);
      return { jobId, job: requireJob(deps.orchestrator, jobId) };
    }, 201);
  });

  router.get('/jobs', async (req, res) => {
    await respond(res, deps, () => {
      const query = parseOrThrow(JobListQuerySchema, req.query);
      const jobs = deps.orchestrator.list({
        states: query.state,
        deviceId: query.deviceId,
        active: query.active
      });
      return { jobs, totalCount: jobs.length };
    });
  });

  router.get('/jobs/:jobId', async (req, res) => {
    await respond(res, deps, () => ({ job: requireJob(deps.orchestrator, req.params.jobId) }));
  });

  router.post('/jobs/:jobId/cancel', async (req, res) => {
    await respond(res, deps, () => cancelJob(deps.orchestrator, req.params.jobId));
  });
}
