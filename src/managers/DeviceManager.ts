/**
 * @fileoverview Registry of configured printers and exclusive access to each of them.
 *
 * A device is held by at most one job at a time. The orchestrator obtains a DeviceHandle
 * through tryAcquire(); the handle opens the physical connection lazily and release()
 * closes it before the device is offered to the next waiting job. A lost connection
 * marks the device unavailable until an operator reconnects it.
 *
 * Events:
 * - 'device-changed' (DeviceChangedEvent): availability changed
 * - 'device-released' (deviceId): a holder released the device
 */

import { EventEmitter } from 'events';
import type { ConveyorConfig } from '../types/config';
import type {
  DeviceChangedEvent,
  DeviceConnection,
  DeviceConnectionFactory,
  DeviceDescriptor,
  DeviceStatus
} from '../types/devices';
import { deviceNotFoundError, toAppError } from '../utils/error.utils';
import { createSilentLogger, Logger } from '../utils/logging';

interface DeviceEntry {
  readonly descriptor: DeviceDescriptor;
  holder: DeviceHandle | null;
  available: boolean;
  unavailableReason: string | null;
}

/**
 * Exclusive claim on one device for one job
 */
export class DeviceHandle {
  private connection: DeviceConnection | null = null;
  private releasePromise: Promise<void> | null = null;

  constructor(
    public readonly device: DeviceDescriptor,
    public readonly jobId: string,
    private readonly openConnection: DeviceConnectionFactory,
    private readonly onReleased: (handle: DeviceHandle) => void
  ) {}

  public get deviceId(): string {
    return this.device.id;
  }

  public isReleased(): boolean {
    return this.releasePromise !== null;
  }

  /**
   * Open (once) and return the connection to the device
   */
  public async connect(): Promise<DeviceConnection> {
    if (this.isReleased()) {
      throw new Error(`Handle for device ${this.deviceId} was already released`);
    }
    if (!this.connection) {
      this.connection = await this.openConnection(this.device);
    }
    return this.connection;
  }

  /**
   * Close the connection and give the device back; repeated calls are no-ops
   */
  public release(): Promise<void> {
    if (!this.releasePromise) {
      this.releasePromise = this.closeAndRelease();
    }
    return this.releasePromise;
  }

  private async closeAndRelease(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    try {
      await connection?.close();
    } finally {
      this.onReleased(this);
    }
  }
}

export class DeviceManager extends EventEmitter {
  private readonly devices = new Map<string, DeviceEntry>();
  private readonly logger: Logger;

  constructor(
    descriptors: readonly DeviceDescriptor[],
    private readonly connectionFactory: DeviceConnectionFactory,
    logger: Logger = createSilentLogger()
  ) {
    super();
    this.logger = logger.child('Devices');
    for (const descriptor of descriptors) {
      this.devices.set(descriptor.id, {
        descriptor,
        holder: null,
        available: true,
        unavailableReason: null
      });
    }
  }

  /**
   * Descriptors for the configured devices, with the driver-wide default baud rate filled in
   */
  public static descriptorsFromConfig(config: ConveyorConfig): DeviceDescriptor[] {
    return config.devices.map(device => ({
      id: device.id,
      port: device.port,
      baudRate: device.baudRate ?? config.makerbotDriver.baudRate
    }));
  }

  public has(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  public list(): DeviceStatus[] {
    return [...this.devices.values()].map(entry => this.toStatus(entry));
  }

  public getStatus(deviceId: string): DeviceStatus {
    return this.toStatus(this.getEntry(deviceId));
  }

  /**
   * Claim the device for `jobId`; null while it is held by another job or unavailable
   */
  public tryAcquire(deviceId: string, jobId: string): DeviceHandle | null {
    const entry = this.getEntry(deviceId);
    if (entry.holder || !entry.available) {
      return null;
    }

    const handle = new DeviceHandle(entry.descriptor, jobId, this.connectionFactory, released => {
      this.handleReleased(released);
    });
    entry.holder = handle;
    this.logger.debug(`Device ${deviceId} acquired by job ${jobId}`);
    return handle;
  }

  public markUnavailable(deviceId: string, reason: string): void {
    const entry = this.getEntry(deviceId);
    if (!entry.available) {
      return;
    }
    entry.available = false;
    entry.unavailableReason = reason;
    this.logger.warn(`Device ${deviceId} marked unavailable: ${reason}`);
    this.emitChanged(entry);
  }

  /**
   * Operator action: make a device usable again after a disconnect
   */
  public markAvailable(deviceId: string): DeviceStatus {
    const entry = this.getEntry(deviceId);
    if (!entry.available) {
      entry.available = true;
      entry.unavailableReason = null;
      this.logger.info(`Device ${deviceId} marked available`);
      this.emitChanged(entry);
    }
    return this.toStatus(entry);
  }

  /**
   * Release every outstanding handle; used during shutdown
   */
  public async releaseAll(): Promise<void> {
    const holders = [...this.devices.values()]
      .map(entry => entry.holder)
      .filter((holder): holder is DeviceHandle => holder !== null);

    const results = await Promise.allSettled(holders.map(holder => holder.release()));
    results.forEach(result => {
      if (result.status === 'rejected') {
        this.logger.warn('Failed to close device connection:', toAppError(result.reason).message);
      }
    });
  }

  private handleReleased(handle: DeviceHandle): void {
    const entry = this.devices.get(handle.deviceId);
    if (!entry || entry.holder !== handle) {
      return;
    }
    entry.holder = null;
    this.logger.debug(`Device ${handle.deviceId} released by job ${handle.jobId}`);
    this.emit('device-released', handle.deviceId);
  }

  private getEntry(deviceId: string): DeviceEntry {
    const entry = this.devices.get(deviceId);
    if (!entry) {
      throw deviceNotFoundError(deviceId);
    }
    return entry;
  }

  private emitChanged(entry: DeviceEntry): void {
    const event: DeviceChangedEvent = {
      deviceId: entry.descriptor.id,
      available: entry.available,
      reason: entry.unavailableReason
    };
    this.emit('device-changed', event);
  }

  private toStatus(entry: DeviceEntry): DeviceStatus {
    return {
      ...entry.descriptor,
      available: entry.available,
      holderJobId: entry.holder?.jobId ?? null,
      unavailableReason: entry.unavailableReason
    };
  }
}
