/**
 * @fileoverview Orchestrator calls shared by the REST routes and the WebSocket commands, so
 * both surfaces report the same errors for the same situation.
 */

import type { JobOrchestrator } from '../../managers/JobOrchestrator';
import type { WorkerPool } from '../../services/WorkerPool';
import type { JobSnapshot } from '../../types/job';
import { AppError, ErrorCode, jobNotFoundError } from '../../utils/error.utils';
import type { Logger } from '../../utils/logging';

/**
 * Dependencies handed to every gateway component
 */
export interface GatewayDependencies {
  readonly orchestrator: JobOrchestrator;
  /** Bounded pool every client request runs through */
  readonly requestPool: WorkerPool;
  readonly logger: Logger;
}

export function requireJob(orchestrator: JobOrchestrator, jobId: string): JobSnapshot {
  const job = orchestrator.status(jobId);
  if (!job) {
    throw jobNotFoundError(jobId);
  }
  return job;
}

/**
 * Cancel a job; unknown and terminal jobs become JOB_NOT_FOUND / ALREADY_TERMINAL errors
 */
export function cancelJob(orchestrator: JobOrchestrator, jobId: string): { pending: boolean } {
  const result = orchestrator.cancel(jobId);
  switch (result.outcome) {
    case 'ok':
      return { pending: result.pending };
    case 'not-found':
      throw jobNotFoundError(jobId);
    case 'already-terminal':
      throw new AppError(
        `Job ${jobId} is already ${result.state}`,
        ErrorCode.ALREADY_TERMINAL,
        { jobId, state: result.state }
      );
  }
}
