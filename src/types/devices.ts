/**
 * @fileoverview Device descriptors, status, and the connection contract used by drivers.
 *
 * @module types/devices
 */

export interface DeviceDescriptor {
  readonly id: string;
  /** Serial port path, e.g. /dev/ttyACM0 */
  readonly port: string;
  readonly baudRate: number;
}

export interface DeviceStatus extends DeviceDescriptor {
  readonly available: boolean;
  readonly holderJobId: string | null;
  readonly unavailableReason: string | null;
}

/**
 * Open, line-oriented link to one physical printer.
 * `write` rejects with DEVICE_DISCONNECTED once the link is lost.
 */
export interface DeviceConnection {
  readonly deviceId: string;
  /** False once the link is lost or closed */
  isOpen(): boolean;
  write(line: string): Promise<void>;
  /** Releases the underlying port even after the link was lost; repeated calls are no-ops */
  close(): Promise<void>;
}

export type DeviceConnectionFactory = (device: DeviceDescriptor) => Promise<DeviceConnection>;

export interface DeviceChangedEvent {
  readonly deviceId: string;
  readonly available: boolean;
  readonly reason: string | null;
}
