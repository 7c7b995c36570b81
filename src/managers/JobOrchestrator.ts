/**
 * @fileoverview Coordinates jobs from submission to a terminal state.
 *
 * Responsibilities:
 * - Validate submissions (profiles, device, model type, model file) before any job exists
 * - Run slicing on the job worker pool, then hand the toolpath to the device wait list
 * - Grant each device to one job at a time, in submission order, and stream the toolpath
 *   through the profile's driver
 * - Turn adapter failures into job state plus error detail; nothing here throws out of a
 *   background task
 * - Cooperative cancellation through one AbortController per job
 *
 * Events (forwarded for the gateway):
 * - 'job-event' (JobEvent)
 * - 'job-progress' (JobProgressEvent)
 * - 'device-changed' (DeviceChangedEvent)
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import type { DriverBackend, SlicerBackend } from '../types/backends';
import type { DeviceChangedEvent, DeviceStatus } from '../types/devices';
import type {
  CancelResult,
  JobEvent,
  JobListFilter,
  JobProgressEvent,
  JobSnapshot,
  ModelKind,
  SubmitJobRequest
} from '../types/job';
import { isTerminalState } from '../types/job';
import type { DriverKind, ProfileListing, SlicerKind } from '../types/profiles';
import {
  AppError,
  ErrorCode,
  deviceNotFoundError,
  isCancellation,
  toAppError
} from '../utils/error.utils';
import { createSilentLogger, Logger } from '../utils/logging';
import { WorkerPool } from '../services/WorkerPool';
import { DeviceHandle, DeviceManager } from './DeviceManager';
import { JobQueue } from './JobQueue';
import { ProfileRegistry } from './ProfileRegistry';

const MODEL_EXTENSIONS: Readonly<Record<string, ModelKind>> = {
  '.stl': 'model',
  '.obj': 'model',
  '.gcode': 'toolpath'
};

/**
 * Classify a model path by extension; throws UNSUPPORTED_MODEL for anything else
 */
export function classifyModel(modelPath: string): ModelKind {
  const extension = path.extname(modelPath).toLowerCase();
  const kind = MODEL_EXTENSIONS[extension];
  if (!kind) {
    throw new AppError(
      `Unsupported model type "${extension || '(none)'}" for ${modelPath}`,
      ErrorCode.UNSUPPORTED_MODEL,
      { modelPath, extension }
    );
  }
  return kind;
}

export interface JobOrchestratorOptions {
  readonly registry: ProfileRegistry;
  readonly devices: DeviceManager;
  readonly slicers: ReadonlyMap<SlicerKind, SlicerBackend>;
  readonly drivers: ReadonlyMap<DriverKind, DriverBackend>;
  /** Pool running slicer invocations and print streams */
  readonly pool: WorkerPool;
  /** Directory receiving generated toolpaths */
  readonly workDir: string;
  readonly queue?: JobQueue;
  readonly logger?: Logger;
}

export class JobOrchestrator extends EventEmitter {
  private readonly registry: ProfileRegistry;
  private readonly devices: DeviceManager;
  private readonly queue: JobQueue;
  private readonly slicers: ReadonlyMap<SlicerKind, SlicerBackend>;
  private readonly drivers: ReadonlyMap<DriverKind, DriverBackend>;
  private readonly pool: WorkerPool;
  private readonly workDir: string;
  private readonly logger: Logger;

  private readonly controllers = new Map<string, AbortController>();
  /** Jobs whose toolpath was generated here and must be removed once terminal */
  private readonly generatedToolpaths = new Map<string, string>();
  private readonly inFlight = new Set<Promise<void>>();
  private shuttingDown = false;

  constructor(options: JobOrchestratorOptions) {
    super();
    this.registry = options.registry;
    this.devices = options.devices;
    this.queue = options.queue ?? new JobQueue(options.logger);
    this.slicers = options.slicers;
    this.drivers = options.drivers;
    this.pool = options.pool;
    this.workDir = options.workDir;
    this.logger = (options.logger ?? createSilentLogger()).child('Orchestrator');

    this.queue.on('job-event', (event: JobEvent) => this.emit('job-event', event));
    this.queue.on('job-progress', (event: JobProgressEvent) => this.emit('job-progress', event));
    this.devices.on('device-changed', (event: DeviceChangedEvent) => {
      this.emit('device-changed', event);
      if (event.available) {
        this.pumpDevice(event.deviceId);
      }
    });
    this.devices.on('device-released', (deviceId: string) => this.pumpDevice(deviceId));
  }

  /**
   * Validate and register a job, then schedule its slicing; returns the new job id
   */
  public submit(request: SubmitJobRequest): string {
    if (this.shuttingDown) {
      throw new AppError('Daemon is shutting down', ErrorCode.UNKNOWN);
    }

    const slicerProfile = this.registry.resolveSlicer(request.slicerProfile);
    const driverProfile = this.registry.resolveDriver(request.driverProfile);
    if (!this.devices.has(request.deviceId)) {
      throw deviceNotFoundError(request.deviceId);
    }
    const modelKind = classifyModel(request.modelPath);
    const modelPath = path.resolve(request.modelPath);
    const stats = fs.statSync(modelPath, { throwIfNoEntry: false });
    if (!stats) {
      throw new AppError(`Model file not found: ${modelPath}`, ErrorCode.FILE_NOT_FOUND, { modelPath });
    }
    if (!stats.isFile()) {
      throw new AppError(`Model path is not a file: ${modelPath}`, ErrorCode.FILE_NOT_FOUND, { modelPath });
    }

    const job = this.queue.create({
      modelPath,
      modelKind,
      slicerProfile,
      driverProfile,
      deviceId: request.deviceId
    });
    this.controllers.set(job.id, new AbortController());
    this.schedule(job.id, () => this.runSlicing(job.id));
    return job.id;
  }

  public cancel(jobId: string): CancelResult {
    if (!this.queue.has(jobId)) {
      return { outcome: 'not-found' };
    }
    const job = this.queue.get(jobId);
    if (isTerminalState(job.state)) {
      return { outcome: 'already-terminal', state: job.state };
    }

    this.controllers.get(jobId)?.abort();

    if (job.state === 'printing') {
      this.logger.info(`Job ${jobId}: cancellation forwarded to the driver`);
      return { outcome: 'ok', pending: true };
    }

    this.queue.transition(jobId, 'cancelled', 'Cancelled by request');
    if (job.state === 'queued') {
      this.finalize(jobId);
    }
    this.pumpDevice(job.deviceId);
    return { outcome: 'ok', pending: false };
  }

  public status(jobId: string): JobSnapshot | null {
    return this.queue.has(jobId) ? this.queue.get(jobId) : null;
  }

  public list(filter: JobListFilter = {}): JobSnapshot[] {
    return this.queue.list(filter);
  }

  public listProfiles(): ProfileListing {
    return this.registry.list();
  }

  public listDevices(): DeviceStatus[] {
    return this.devices.list();
  }

  /**
   * Make a disconnected device available again and resume its wait list
   */
  public reconnectDevice(deviceId: string): DeviceStatus {
    return this.devices.markAvailable(deviceId);
  }

  public getStats(): { activeJobs: number; pool: ReturnType<WorkerPool['getStats']> } {
    return { activeJobs: this.queue.countActive(), pool: this.pool.getStats() };
  }

  /**
   * Cancel every active job and wait for in-flight work to settle
   */
  public async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const active = this.queue.list({ active: true });
    this.logger.info(`Shutting down with ${active.length} active job(s)`);
    active.forEach(job => this.cancel(job.id));

    await Promise.allSettled([...this.inFlight]);
    this.pool.close();
    await this.devices.releaseAll();
  }

  private schedule(jobId: string, work: () => Promise<void>): void {
    const task = this.pool.run(work)
      .catch((error: unknown) => {
        try {
          this.handleFailure(jobId, error);
        } catch (inner) {
          this.logger.error(`Job ${jobId}: unhandled failure: ${toAppError(inner).message}`);
        }
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async runSlicing(jobId: string): Promise<void> {
    const job = this.queue.get(jobId);
    if (job.state !== 'created') {
      this.finalize(jobId);
      return;
    }
    this.queue.transition(jobId, 'slicing');

    try {
      let toolpathPath = job.modelPath;
      if (job.modelKind === 'model') {
        const backend = this.slicers.get(job.slicerProfile.kind);
        if (!backend) {
          throw new AppError(`No slicer backend for ${job.slicerProfile.kind}`, ErrorCode.UNKNOWN);
        }
        await fs.promises.mkdir(this.workDir, { recursive: true });
        const outputPath = path.join(this.workDir, `${jobId}.gcode`);
        this.generatedToolpaths.set(jobId, outputPath);

        const result = await backend.slice({
          jobId,
          modelPath: job.modelPath,
          outputPath,
          profile: job.slicerProfile,
          signal: this.signalFor(jobId)
        });
        toolpathPath = result.toolpathPath;
      }

      if (isTerminalState(this.queue.get(jobId).state)) {
        return;
      }
      this.queue.setToolpath(jobId, toolpathPath);
      this.queue.transition(jobId, 'queued');
      const position = this.queue.enqueueForDevice(jobId);
      this.logger.debug(`Job ${jobId}: waiting for ${job.deviceId} at position ${position}`);
    } catch (error) {
      this.handleFailure(jobId, error);
    } finally {
      this.finalize(jobId);
      this.pumpDevice(job.deviceId);
    }
  }

  /**
   * Start the next waiting job on a free device. Synchronous, so acquisition order is the
   * wait-list order.
   */
  private pumpDevice(deviceId: string): void {
    if (this.shuttingDown) {
      return;
    }
    const nextId = this.queue.peekNextForDevice(deviceId);
    if (!nextId || this.queue.hasEarlierPending(nextId)) {
      return;
    }
    const handle = this.devices.tryAcquire(deviceId, nextId);
    if (!handle) {
      return;
    }

    this.queue.takeNextForDevice(deviceId);
    this.queue.transition(nextId, 'printing');
    this.schedule(nextId, () => this.runPrinting(nextId, handle));
  }

  private async runPrinting(jobId: string, handle: DeviceHandle): Promise<void> {
    try {
      const job = this.queue.get(jobId);
      const driver = this.drivers.get(job.driverProfile.kind);
      if (!driver) {
        throw new AppError(`No driver backend for ${job.driverProfile.kind}`, ErrorCode.UNKNOWN);
      }
      if (!job.toolpathPath) {
        throw new AppError(`Job ${jobId} has no toolpath`, ErrorCode.UNKNOWN);
      }

      const progress = driver.print({
        jobId,
        toolpathPath: job.toolpathPath,
        handle,
        profile: job.driverProfile,
        signal: this.signalFor(jobId)
      });
      for await (const report of progress) {
        this.queue.setProgress(jobId, report);
      }
      this.queue.transition(jobId, 'completed');
    } catch (error) {
      this.handleFailure(jobId, error);
    } finally {
      this.finalize(jobId);
      await handle.release();
    }
  }

  private handleFailure(jobId: string, error: unknown): void {
    const appError = toAppError(error);
    const job = this.queue.get(jobId);

    if (isTerminalState(job.state)) {
      this.logger.debug(`Job ${jobId}: ignoring ${appError.code} after ${job.state}`);
      return;
    }
    if (appError.code === ErrorCode.DEVICE_DISCONNECTED) {
      this.devices.markUnavailable(job.deviceId, appError.message);
    }

    const cancelRequested = this.controllers.get(jobId)?.signal.aborted ?? false;
    if (isCancellation(appError)) {
      this.queue.transition(jobId, 'cancelled', 'Cancelled by request');
      return;
    }
    if (cancelRequested) {
      // Cancellation was requested but the abort did not finish cleanly
      this.queue.setError(jobId, { code: appError.code, message: appError.message });
      this.logger.warn(`Job ${jobId}: cancellation interrupted: ${appError.message}`);
      this.queue.transition(jobId, 'cancelled', `Cancelled by request (${appError.message})`);
      return;
    }

    const diagnostics = appError.context?.diagnostics;
    this.queue.setError(jobId, typeof diagnostics === 'string'
      ? { code: appError.code, message: appError.message, diagnostics }
      : { code: appError.code, message: appError.message });
    this.logger.error(`Job ${jobId} failed: ${appError.message}`);
    this.queue.transition(jobId, 'failed', appError.message);
  }

  private signalFor(jobId: string): AbortSignal {
    const controller = this.controllers.get(jobId) ?? new AbortController();
    this.controllers.set(jobId, controller);
    return controller.signal;
  }

  /**
   * Release per-job resources once the job is terminal
   */
  private finalize(jobId: string): void {
    if (!isTerminalState(this.queue.get(jobId).state)) {
      return;
    }
    this.controllers.delete(jobId);

    const toolpathPath = this.generatedToolpaths.get(jobId);
    if (toolpathPath) {
      this.generatedToolpaths.delete(jobId);
      fs.promises.rm(toolpathPath, { force: true }).catch((error: unknown) => {
        this.logger.warn(`Job ${jobId}: could not remove toolpath ${toolpathPath}: ${toAppError(error).message}`);
      });
    }
  }
}
