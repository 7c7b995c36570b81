/**
 * @fileoverview Serial-port implementation of DeviceConnection.
 *
 * Wraps a `serialport` SerialPort opened on demand. Writes wait for the OS buffer to drain
 * so that progress reports track what actually reached the printer. Once the port emits
 * 'close' or 'error', or a write fails, the connection is considered lost and further
 * writes reject with DEVICE_DISCONNECTED. close() still releases a port that remains open.
 *
 * @module devices/SerialDeviceConnection
 */

import { SerialPort } from 'serialport';
import type { DeviceConnection, DeviceDescriptor } from '../types/devices';
import { deviceDisconnectedError } from '../utils/error.utils';

type ErrorCallback = (error: Error | null) => void;

/**
 * The part of SerialPort this connection relies on
 */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  write(data: string, callback: (error: Error | null | undefined) => void): boolean;
  drain(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  on(event: 'close' | 'error', listener: (error?: Error) => void): unknown;
}

export type SerialPortFactory = (device: DeviceDescriptor) => SerialPortLike;

const createSerialPort: SerialPortFactory = (device) =>
  new SerialPort({ path: device.port, baudRate: device.baudRate, autoOpen: false });

export class SerialDeviceConnection implements DeviceConnection {
  private lostReason: string | null = null;

  private constructor(
    public readonly deviceId: string,
    private readonly port: SerialPortLike
  ) {
    port.on('close', () => {
      this.lostReason = this.lostReason ?? 'port closed';
    });
    port.on('error', (error) => {
      this.lostReason = error?.message ?? 'port error';
    });
  }

  /**
   * Open the device's serial port
   */
  public static open(device: DeviceDescriptor, createPort: SerialPortFactory = createSerialPort): Promise<SerialDeviceConnection> {
    const port = createPort(device);

    return new Promise((resolve, reject) => {
      port.open((error) => {
        if (error) {
          reject(deviceDisconnectedError(device.id, error.message));
          return;
        }
        resolve(new SerialDeviceConnection(device.id, port));
      });
    });
  }

  public isOpen(): boolean {
    return this.lostReason === null && this.port.isOpen;
  }

  public write(line: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(deviceDisconnectedError(this.deviceId, this.lostReason ?? 'port not open'));
    }

    return new Promise((resolve, reject) => {
      this.port.write(`${line}\n`, (writeError) => {
        if (writeError) {
          this.lostReason = writeError.message;
          reject(deviceDisconnectedError(this.deviceId, writeError.message));
          return;
        }
        this.port.drain((drainError) => {
          if (drainError) {
            this.lostReason = drainError.message;
            reject(deviceDisconnectedError(this.deviceId, drainError.message));
            return;
          }
          resolve();
        });
      });
    });
  }

  /**
   * Closes the port whenever it is still open, including after a lost link
   */
  public close(): Promise<void> {
    this.lostReason = this.lostReason ?? 'closed';
    if (!this.port.isOpen) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.port.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * DeviceConnectionFactory backed by real serial ports
 */
export function openSerialConnection(device: DeviceDescriptor): Promise<SerialDeviceConnection> {
  return SerialDeviceConnection.open(device);
}
