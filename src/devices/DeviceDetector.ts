/**
 * @fileoverview Serial port presence polling for the configured devices.
 *
 * Lists the host's serial ports every `intervalMs` and keeps DeviceManager availability in
 * step with them: a device whose port disappears is marked unavailable, and is made
 * available again once the port is back. A device that went unavailable for another
 * reason (a lost connection during a print) has its port blacklisted for `blacklistMs`;
 * after that it comes back on its own when the port is still listed.
 * DeviceManager.markAvailable() clears both states at once.
 */

import { SerialPort } from 'serialport';
import type { DeviceManager } from '../managers/DeviceManager';
import type { DeviceChangedEvent } from '../types/devices';
import { toAppError } from '../utils/error.utils';
import { createSilentLogger, Logger } from '../utils/logging';

/** Lists the serial ports currently attached to the host */
export type PortLister = () => Promise<ReadonlyArray<{ readonly path: string }>>;

export interface DeviceDetectorOptions {
  readonly intervalMs: number;
  readonly blacklistMs: number;
  readonly listPorts?: PortLister;
  readonly now?: () => number;
  readonly logger?: Logger;
}

export class DeviceDetector {
  private readonly listPorts: PortLister;
  private readonly now: () => number;
  private readonly logger: Logger;
  /** Devices this detector made unavailable and will restore */
  private readonly managed = new Set<string>();
  /** Port path -> time the blacklist entry expires */
  private readonly blacklist = new Map<string, number>();
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly devices: DeviceManager,
    private readonly options: DeviceDetectorOptions
  ) {
    this.listPorts = options.listPorts ?? (() => SerialPort.list());
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createSilentLogger()).child('Detector');
    this.devices.on('device-changed', (event: DeviceChangedEvent) => this.onDeviceChanged(event));
  }

  public start(): void {
    if (this.running || this.options.intervalMs <= 0) {
      return;
    }
    this.running = true;
    this.schedule(0);
  }

  /**
   * Stop polling; resolves once an in-progress poll has finished
   */
  public async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.polling;
  }

  public isBlacklisted(port: string): boolean {
    return this.blacklist.has(port);
  }

  /**
   * Run one detection pass
   */
  public async poll(): Promise<void> {
    const listed = new Set((await this.listPorts()).map(port => port.path));
    const now = this.now();

    for (const [port, until] of this.blacklist) {
      if (until <= now) {
        this.blacklist.delete(port);
        this.logger.debug(`Removed ${port} from the blacklist`);
      }
    }

    for (const status of this.devices.list()) {
      const present = listed.has(status.port) && !this.blacklist.has(status.port);
      if (!present && status.available) {
        this.managed.add(status.id);
        this.devices.markUnavailable(status.id, `Port ${status.port} not attached`);
      } else if (present && !status.available && this.managed.has(status.id)) {
        this.logger.info(`Device ${status.id} attached on ${status.port}`);
        this.devices.markAvailable(status.id);
      }
    }
  }

  private onDeviceChanged(event: DeviceChangedEvent): void {
    const { port } = this.devices.getStatus(event.deviceId);
    if (event.available) {
      this.managed.delete(event.deviceId);
      this.blacklist.delete(port);
      return;
    }
    if (this.managed.has(event.deviceId)) {
      return;
    }
    this.managed.add(event.deviceId);
    this.blacklist.set(port, this.now() + this.options.blacklistMs);
    this.logger.debug(`Blacklisted ${port} for ${this.options.blacklistMs}ms`);
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.polling = this.poll()
        .catch((error: unknown) => {
          this.logger.warn('Port detection failed:', toAppError(error).message);
        })
        .finally(() => {
          this.polling = null;
          if (this.running) {
            this.schedule(this.options.intervalMs);
          }
        });
    }, delayMs);
  }
}
