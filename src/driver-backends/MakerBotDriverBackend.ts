/**
 * @fileoverview MakerBot driver backend: streams toolpath lines to a printer connection.
 *
 * The connection is obtained from the job's DeviceHandle. A failed write surfaces as
 * DEVICE_DISCONNECTED and ends the print. On cancellation the profile's abort sequence is
 * sent (cool down, lower the platform, disable steppers) before the connection closes; a
 * link lost during that sequence also surfaces as DEVICE_DISCONNECTED.
 */

import type { DriverProfile, MakerBotDriverProfile } from '../types/profiles';
import type { PrintRequest } from '../types/backends';
import { deviceDisconnectedError, toAppError } from '../utils/error.utils';
import { BaseDriverBackend, PrintSink } from './BaseDriverBackend';

export class MakerBotDriverBackend extends BaseDriverBackend<MakerBotDriverProfile> {
  public readonly kind = 'makerbot';

  protected isProfile(profile: DriverProfile): profile is MakerBotDriverProfile {
    return profile.kind === 'makerbot';
  }

  protected async openSink(request: PrintRequest<MakerBotDriverProfile>): Promise<PrintSink> {
    const { handle, profile, jobId } = request;
    const connection = await handle.connect();
    this.logger.debug(`Job ${jobId}: connected to ${handle.deviceId} as ${profile.machineProfile}`);

    return {
      write: (line) => connection.write(line),
      abort: async () => {
        for (const line of profile.abortSequence) {
          if (!connection.isOpen()) {
            throw deviceDisconnectedError(handle.deviceId, 'connection lost while sending the abort sequence');
          }
          try {
            await connection.write(line);
          } catch (error) {
            this.logger.warn(`Job ${jobId}: abort sequence interrupted: ${toAppError(error).message}`);
            throw error;
          }
        }
      },
      close: () => connection.close()
    };
  }
}
