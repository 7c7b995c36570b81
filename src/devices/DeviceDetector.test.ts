/**
 * @fileoverview Tests for DeviceDetector
 * Tests attach/detach tracking, blacklisting after a lost connection, and operator reconnects
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { DeviceDetector } from './DeviceDetector';
import { DeviceManager } from '../managers/DeviceManager';
import { FakeDeviceConnection } from '../__tests__/fakes';
import type { DeviceDescriptor } from '../types/devices';

describe('DeviceDetector', () => {
  const descriptors: DeviceDescriptor[] = [
    { id: 'bot-1', port: '/dev/ttyACM0', baudRate: 115200 },
    { id: 'bot-2', port: '/dev/ttyACM1', baudRate: 115200 }
  ];
  let ports: string[];
  let clock: number;
  let devices: DeviceManager;
  let detector: DeviceDetector;

  beforeEach(() => {
    ports = ['/dev/ttyACM0', '/dev/ttyACM1'];
    clock = 1000;
    devices = new DeviceManager(descriptors, async (device) => new FakeDeviceConnection(device.id));
    detector = new DeviceDetector(devices, {
      intervalMs: 10000,
      blacklistMs: 30000,
      listPorts: async () => ports.map(port => ({ path: port })),
      now: () => clock
    });
  });

  it('should leave attached devices available', async () => {
    await detector.poll();

    expect(devices.list().map(status => status.available)).toEqual([true, true]);
  });

  it('should mark a device unavailable while its port is detached', async () => {
    ports = ['/dev/ttyACM1'];
    await detector.poll();

    expect(devices.getStatus('bot-1')).toMatchObject({
      available: false,
      unavailableReason: 'Port /dev/ttyACM0 not attached'
    });
    expect(devices.getStatus('bot-2').available).toBe(true);

    ports = ['/dev/ttyACM0', '/dev/ttyACM1'];
    await detector.poll();

    expect(devices.getStatus('bot-1')).toMatchObject({ available: true, unavailableReason: null });
  });

  it('should keep a disconnected device out until its blacklist entry expires', async () => {
    devices.markUnavailable('bot-1', 'Device bot-1 disconnected: write EIO');
    expect(detector.isBlacklisted('/dev/ttyACM0')).toBe(true);

    clock += 29999;
    await detector.poll();
    expect(devices.getStatus('bot-1').available).toBe(false);

    clock += 1;
    await detector.poll();
    expect(detector.isBlacklisted('/dev/ttyACM0')).toBe(false);
    expect(devices.getStatus('bot-1').available).toBe(true);
  });

  it('should clear the blacklist when an operator reconnects the device', async () => {
    devices.markUnavailable('bot-2', 'Device bot-2 disconnected: cable unplugged');

    devices.markAvailable('bot-2');

    expect(detector.isBlacklisted('/dev/ttyACM1')).toBe(false);
    await detector.poll();
    expect(devices.getStatus('bot-2').available).toBe(true);
  });

  it('should not poll when detection is disabled', async () => {
    let listed = 0;
    const disabled = new DeviceDetector(devices, {
      intervalMs: 0,
      blacklistMs: 30000,
      listPorts: async () => {
        listed++;
        return [];
      }
    });

    disabled.start();
    await disabled.stop();

    expect(listed).toBe(0);
    expect(devices.getStatus('bot-1').available).toBe(true);
  });
});
