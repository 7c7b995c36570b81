/**
 * Shared fixtures for unit tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseConfig } from '../managers/ConfigManager';
import { DeviceManager } from '../managers/DeviceManager';
import { JobOrchestrator } from '../managers/JobOrchestrator';
import { ProfileRegistry } from '../managers/ProfileRegistry';
import type { ConveyorConfigInput } from '../schemas/config.schemas';
import { WorkerPool } from '../services/WorkerPool';
import type { DriverBackend, SlicerBackend } from '../types/backends';
import type { JobCreateParams } from '../types/job';
import type { DriverKind, SlicerKind } from '../types/profiles';
import { AppError } from '../utils/error.utils';
import { ControlledDriverBackend, ControlledSlicerBackend, createFakeConnectionFactory } from './fakes';

export function createTestRegistry(input: ConveyorConfigInput = {}): ProfileRegistry {
  return new ProfileRegistry(parseConfig(input));
}

export function createJobParams(overrides: Partial<JobCreateParams> = {}): JobCreateParams {
  const registry = createTestRegistry();
  return {
    modelPath: '/models/cube.stl',
    modelKind: 'model',
    slicerProfile: registry.resolveSlicer(),
    driverProfile: registry.resolveDriver(),
    deviceId: 'bot-1',
    ...overrides
  };
}

/**
 * Resolves after pending microtasks and one macrotask turn
 */
export function flushAsync(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Poll `predicate` on short timers until it holds
 */
export async function waitFor(predicate: () => boolean, attempts = 200): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    if (predicate()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
  throw new Error('condition was not met in time');
}

/**
 * Await a promise expected to reject with an AppError and return that error
 */
export async function captureRejection(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
}

export interface OrchestratorFixture {
  readonly orchestrator: JobOrchestrator;
  readonly devices: DeviceManager;
  readonly slicer: ControlledSlicerBackend;
  readonly driver: ControlledDriverBackend;
  /** An existing .stl file to submit */
  readonly modelFile: string;
  readonly rootDir: string;
  cleanup(): Promise<void>;
}

/**
 * Orchestrator over controlled backends and one fake device, `bot-1`
 */
export function createOrchestratorFixture(options: { autoSlice?: boolean } = {}): OrchestratorFixture {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conveyor-fixture-'));
  const modelFile = path.join(rootDir, 'cube.stl');
  fs.writeFileSync(modelFile, 'solid cube\nendsolid cube\n');

  const devices = new DeviceManager(
    [{ id: 'bot-1', port: '/dev/ttyACM0', baudRate: 115200 }],
    createFakeConnectionFactory().factory
  );
  const slicer = new ControlledSlicerBackend(options.autoSlice ?? true);
  const driver = new ControlledDriverBackend();
  const orchestrator = new JobOrchestrator({
    registry: createTestRegistry(),
    devices,
    slicers: new Map<SlicerKind, SlicerBackend>([['miracle-grue', slicer]]),
    drivers: new Map<DriverKind, DriverBackend>([['makerbot', driver]]),
    pool: new WorkerPool('jobs', 2),
    workDir: path.join(rootDir, 'work')
  });

  return {
    orchestrator,
    devices,
    slicer,
    driver,
    modelFile,
    rootDir,
    cleanup: async () => {
      await orchestrator.shutdown();
      fs.rmSync(rootDir, { recursive: true, force: true });
    }
  };
}
