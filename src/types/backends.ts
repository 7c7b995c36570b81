/**
 * @fileoverview Capability contracts for slicer and driver backends.
 *
 * Key exports:
 * - SlicerBackend: model + settings -> toolpath file, cancellable through an AbortSignal
 * - DriverBackend: toolpath + device handle -> lazy, finite stream of progress reports
 * - SpawnFunction: child process factory injected into slicer backends
 *
 * @module types/backends
 */

import type { ChildProcess, SpawnOptions } from 'child_process';
import type { DriverProfile, SlicerProfile } from './profiles';
import type { PrintProgress } from './job';
import type { DeviceHandle } from '../managers/DeviceManager';

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface SliceRequest<P extends SlicerProfile = SlicerProfile> {
  readonly jobId: string;
  readonly modelPath: string;
  readonly outputPath: string;
  readonly profile: P;
  readonly signal: AbortSignal;
}

export interface SliceResult {
  readonly toolpathPath: string;
}

export interface SlicerBackend {
  readonly kind: SlicerProfile['kind'];
  slice(request: SliceRequest): Promise<SliceResult>;
}

export interface PrintRequest<P extends DriverProfile = DriverProfile> {
  readonly jobId: string;
  readonly toolpathPath: string;
  readonly handle: DeviceHandle;
  readonly profile: P;
  readonly signal: AbortSignal;
}

export interface DriverBackend {
  readonly kind: DriverProfile['kind'];
  print(request: PrintRequest): AsyncIterable<PrintProgress>;
}
