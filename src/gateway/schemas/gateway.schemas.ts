/**
 * @fileoverview Zod validation schemas for gateway requests and WebSocket commands.
 *
 * All data received from clients is validated here before it reaches the orchestrator.
 *
 * Key exports:
 * - SubmitJobRequestSchema: body of `POST /api/jobs` and the `SUBMIT` command
 * - JobListQuerySchema: query string of `GET /api/jobs`
 * - JobListFilterSchema: filter of the `LIST` command
 * - WebSocketCommandSchema: discriminated union of client commands
 */

import { z } from 'zod';

export const JobStateSchema = z.enum([
  'created',
  'slicing',
  'queued',
  'printing',
  'completed',
  'failed',
  'cancelled'
]);

export const SubmitJobRequestSchema = z.object({
  modelPath: z.string().min(1, 'modelPath is required'),
  slicerProfile: z.string().min(1).optional(),
  driverProfile: z.string().min(1).optional(),
  deviceId: z.string().min(1, 'deviceId is required')
}).strict();

export const JobListFilterSchema = z.object({
  states: z.array(JobStateSchema).optional(),
  deviceId: z.string().min(1).optional(),
  active: z.boolean().optional()
}).strict();

/**
 * `?state=queued,printing&deviceId=bot-1&active=true`
 */
export const JobListQuerySchema = z.object({
  state: z.string()
    .transform(value => value.split(',').map(part => part.trim()).filter(part => part.length > 0))
    .pipe(z.array(JobStateSchema))
    .optional(),
  deviceId: z.string().min(1).optional(),
  active: z.enum(['true', 'false']).transform(value => value === 'true').optional()
});

const RequestIdSchema = z.string().min(1).optional();
const JobIdsSchema = z.array(z.string().min(1)).optional();

export const WebSocketCommandSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('SUBSCRIBE'), requestId: RequestIdSchema, jobIds: JobIdsSchema }),
  z.object({ command: z.literal('UNSUBSCRIBE'), requestId: RequestIdSchema, jobIds: JobIdsSchema }),
  z.object({ command: z.literal('SUBMIT'), requestId: RequestIdSchema, job: SubmitJobRequestSchema }),
  z.object({ command: z.literal('CANCEL'), requestId: RequestIdSchema, jobId: z.string().min(1) }),
  z.object({ command: z.literal('STATUS'), requestId: RequestIdSchema, jobId: z.string().min(1) }),
  z.object({ command: z.literal('LIST'), requestId: RequestIdSchema, filter: JobListFilterSchema.optional() }),
  z.object({ command: z.literal('LIST_PROFILES'), requestId: RequestIdSchema }),
  z.object({ command: z.literal('LIST_DEVICES'), requestId: RequestIdSchema }),
  z.object({ command: z.literal('PING'), requestId: RequestIdSchema })
]);

export type ValidatedSubmitJobRequest = z.infer<typeof SubmitJobRequestSchema>;
export type ValidatedJobListFilter = z.infer<typeof JobListFilterSchema>;
export type WebSocketCommand = z.infer<typeof WebSocketCommandSchema>;
export type WebSocketCommandType = WebSocketCommand['command'];
