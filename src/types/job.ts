/**
 * @fileoverview Job state machine and job data types.
 *
 * States flow `created → slicing → queued → printing → completed`; `failed` and
 * `cancelled` are reachable from every non-terminal state. The transition table below is
 * the single source of truth used by the JobQueue.
 *
 * @module types/job
 */

import type { ErrorCode } from '../utils/error.utils';
import type { DriverProfile, SlicerProfile } from './profiles';

export type JobState =
  | 'created'
  | 'slicing'
  | 'queued'
  | 'printing'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const JOB_STATES: readonly JobState[] = [
  'created',
  'slicing',
  'queued',
  'printing',
  'completed',
  'failed',
  'cancelled'
];

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['completed', 'failed', 'cancelled']);

/**
 * Forward edges of the state graph; failed/cancelled are added for every non-terminal state
 */
const FORWARD_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  created: ['slicing'],
  slicing: ['queued'],
  queued: ['printing'],
  printing: ['completed'],
  completed: [],
  failed: [],
  cancelled: []
};

export function isTerminalState(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isLegalTransition(from: JobState, to: JobState): boolean {
  if (isTerminalState(from)) {
    return false;
  }
  if (to === 'failed' || to === 'cancelled') {
    return true;
  }
  return FORWARD_TRANSITIONS[from].includes(to);
}

/**
 * `model` inputs need a slicer; `toolpath` inputs are already machine instructions
 */
export type ModelKind = 'model' | 'toolpath';

export interface JobError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly diagnostics?: string;
}

export interface TransitionRecord {
  readonly from: JobState | null;
  readonly to: JobState;
  readonly at: string;
  readonly message?: string;
}

/**
 * Read-only view of a job handed out by the queue
 */
export interface JobSnapshot {
  readonly id: string;
  readonly modelPath: string;
  readonly modelKind: ModelKind;
  readonly slicerProfile: SlicerProfile;
  readonly driverProfile: DriverProfile;
  readonly deviceId: string;
  readonly state: JobState;
  readonly history: readonly TransitionRecord[];
  readonly error: JobError | null;
  readonly progress: number | null;
  readonly toolpathPath: string | null;
  /** 1-based position in the device wait list while waiting, otherwise null */
  readonly waitPosition: number | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface JobCreateParams {
  readonly modelPath: string;
  readonly modelKind: ModelKind;
  readonly slicerProfile: SlicerProfile;
  readonly driverProfile: DriverProfile;
  readonly deviceId: string;
}

export interface JobListFilter {
  readonly states?: readonly JobState[];
  readonly deviceId?: string;
  /** true: only non-terminal jobs, false: only terminal jobs */
  readonly active?: boolean;
}

/**
 * State change notification; creation is published with `oldState: null`
 */
export interface JobEvent {
  readonly jobId: string;
  readonly oldState: JobState | null;
  readonly newState: JobState;
  readonly timestamp: string;
  readonly message?: string;
}

export interface PrintProgress {
  readonly currentLine: number;
  readonly totalLines: number;
  readonly currentByte: number;
  readonly totalBytes: number;
  /** currentLine / totalLines, in [0, 1] */
  readonly fraction: number;
}

export interface JobProgressEvent extends PrintProgress {
  readonly jobId: string;
  readonly timestamp: string;
}

export interface SubmitJobRequest {
  readonly modelPath: string;
  readonly slicerProfile?: string;
  readonly driverProfile?: string;
  readonly deviceId: string;
}

export type CancelResult =
  | { readonly outcome: 'ok'; readonly pending: boolean }
  | { readonly outcome: 'not-found' }
  | { readonly outcome: 'already-terminal'; readonly state: JobState };
