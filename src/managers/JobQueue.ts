/**
 * @fileoverview Authoritative store of jobs and their lifecycle.
 *
 * Owns every Job record, enforces the state machine from types/job, keeps the per-device
 * FIFO wait lists, and publishes a JobEvent synchronously for every state change
 * (creation included, with `oldState: null`). Events, history records and errors are frozen;
 * other components only ever see snapshots.
 *
 * Events:
 * - 'job-event' (JobEvent)
 * - 'job-progress' (JobProgressEvent)
 */

import { EventEmitter } from 'events';
import { isLegalTransition, isTerminalState } from '../types/job';
import type {
  JobCreateParams,
  JobError,
  JobEvent,
  JobListFilter,
  JobProgressEvent,
  JobSnapshot,
  JobState,
  PrintProgress,
  TransitionRecord
} from '../types/job';
import { illegalTransitionError, jobNotFoundError } from '../utils/error.utils';
import { createSilentLogger, Logger } from '../utils/logging';

interface JobRecord extends JobCreateParams {
  readonly id: string;
  readonly sequence: number;
  readonly createdAt: string;
  state: JobState;
  history: TransitionRecord[];
  error: JobError | null;
  progress: number | null;
  toolpathPath: string | null;
  updatedAt: string;
}

export class JobQueue extends EventEmitter {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly waitLists = new Map<string, string[]>();
  private nextId = 1;
  private readonly logger: Logger;

  constructor(logger: Logger = createSilentLogger()) {
    super();
    this.logger = logger.child('Queue');
  }

  /**
   * Register a new job in state `created`
   */
  public create(params: JobCreateParams): JobSnapshot {
    const sequence = this.nextId++;
    const id = String(sequence);
    const now = new Date().toISOString();
    const created: TransitionRecord = { from: null, to: 'created', at: now };
    const record: JobRecord = {
      ...params,
      id,
      sequence,
      createdAt: now,
      updatedAt: now,
      state: 'created',
      history: [Object.freeze(created)],
      error: null,
      progress: null,
      toolpathPath: null
    };
    this.jobs.set(id, record);

    this.logger.info(`Job ${id} created for device ${params.deviceId} (${params.modelPath})`);
    this.publish({ jobId: id, oldState: null, newState: 'created', timestamp: now });
    return this.toSnapshot(record);
  }

  /**
   * Move a job to `to`; throws ILLEGAL_TRANSITION when the state graph forbids it
   */
  public transition(jobId: string, to: JobState, message?: string): JobSnapshot {
    const record = this.getRecord(jobId);
    const from = record.state;

    if (!isLegalTransition(from, to)) {
      const error = illegalTransitionError(jobId, from, to);
      this.logger.error(error.message);
      throw error;
    }

    const now = new Date().toISOString();
    record.state = to;
    record.updatedAt = now;
    record.history.push(Object.freeze(message ? { from, to, at: now, message } : { from, to, at: now }));
    if (to !== 'queued') {
      this.removeFromWaitList(jobId);
    }

    this.logger.info(`Job ${jobId}: ${from} -> ${to}${message ? ` (${message})` : ''}`);
    this.publish(message
      ? { jobId, oldState: from, newState: to, timestamp: now, message }
      : { jobId, oldState: from, newState: to, timestamp: now });
    return this.toSnapshot(record);
  }

  public setProgress(jobId: string, progress: PrintProgress): void {
    const record = this.getRecord(jobId);
    const timestamp = new Date().toISOString();
    record.progress = progress.fraction;
    record.updatedAt = timestamp;

    const event: JobProgressEvent = Object.freeze({ ...progress, jobId, timestamp });
    this.emit('job-progress', event);
  }

  public setToolpath(jobId: string, toolpathPath: string): void {
    const record = this.getRecord(jobId);
    record.toolpathPath = toolpathPath;
  }

  public setError(jobId: string, error: JobError): void {
    const record = this.getRecord(jobId);
    record.error = Object.freeze({ ...error });
  }

  /**
   * Place a queued job in its device's wait list; the list stays in submission order even
   * when slicing finishes out of order
   */
  public enqueueForDevice(jobId: string): number {
    const record = this.getRecord(jobId);
    const list = this.waitLists.get(record.deviceId) ?? [];
    if (!list.includes(jobId)) {
      const later = list.findIndex(other => this.getRecord(other).sequence > record.sequence);
      list.splice(later < 0 ? list.length : later, 0, jobId);
    }
    this.waitLists.set(record.deviceId, list);
    return list.indexOf(jobId) + 1;
  }

  /**
   * True while an earlier submission for the same device has not reached the wait list yet
   */
  public hasEarlierPending(jobId: string): boolean {
    const record = this.getRecord(jobId);
    for (const other of this.jobs.values()) {
      if (other.sequence >= record.sequence) {
        return false;
      }
      if (other.deviceId === record.deviceId && (other.state === 'created' || other.state === 'slicing')) {
        return true;
      }
    }
    return false;
  }

  public peekNextForDevice(deviceId: string): string | undefined {
    return this.waitLists.get(deviceId)?.[0];
  }

  public takeNextForDevice(deviceId: string): string | undefined {
    return this.waitLists.get(deviceId)?.shift();
  }

  public removeFromWaitList(jobId: string): boolean {
    const record = this.jobs.get(jobId);
    const list = record ? this.waitLists.get(record.deviceId) : undefined;
    const index = list ? list.indexOf(jobId) : -1;
    if (!list || index < 0) {
      return false;
    }
    list.splice(index, 1);
    return true;
  }

  /**
   * 1-based position in the device wait list, or null when the job is not waiting
   */
  public getWaitPosition(jobId: string): number | null {
    const record = this.jobs.get(jobId);
    const index = record ? (this.waitLists.get(record.deviceId) ?? []).indexOf(jobId) : -1;
    return index < 0 ? null : index + 1;
  }

  public has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  public get(jobId: string): JobSnapshot {
    return this.toSnapshot(this.getRecord(jobId));
  }

  /**
   * Snapshots in creation order, narrowed by the optional filter
   */
  public list(filter: JobListFilter = {}): JobSnapshot[] {
    return [...this.jobs.values()]
      .filter(record => !filter.states || filter.states.includes(record.state))
      .filter(record => !filter.deviceId || record.deviceId === filter.deviceId)
      .filter(record => filter.active === undefined || filter.active !== isTerminalState(record.state))
      .map(record => this.toSnapshot(record));
  }

  public countActive(): number {
    return this.list({ active: true }).length;
  }

  private getRecord(jobId: string): JobRecord {
    const record = this.jobs.get(jobId);
    if (!record) {
      throw jobNotFoundError(jobId);
    }
    return record;
  }

  /**
   * Every listener receives the same frozen event object
   */
  private publish(event: JobEvent): void {
    this.emit('job-event', Object.freeze(event));
  }

  private toSnapshot(record: JobRecord): JobSnapshot {
    return {
      id: record.id,
      modelPath: record.modelPath,
      modelKind: record.modelKind,
      slicerProfile: record.slicerProfile,
      driverProfile: record.driverProfile,
      deviceId: record.deviceId,
      state: record.state,
      history: [...record.history],
      error: record.error,
      progress: record.progress,
      toolpathPath: record.toolpathPath,
      waitPosition: this.getWaitPosition(record.id),
      createdAt: record.createdAt,
      updatedAt: record.updatedAt
    };
  }
}
