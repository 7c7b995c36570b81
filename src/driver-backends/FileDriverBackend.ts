/**
 * @fileoverview Print-to-file driver backend.
 *
 * Writes the assembled toolpath to `<outputDir>/<jobId>.gcode` instead of a device. A
 * cancelled print removes its partial output file.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DriverProfile, FileDriverProfile } from '../types/profiles';
import type { PrintRequest } from '../types/backends';
import { BaseDriverBackend, PrintSink } from './BaseDriverBackend';

export function outputPathFor(profile: FileDriverProfile, jobId: string): string {
  return path.resolve(profile.outputDir, `${jobId}.gcode`);
}

export class FileDriverBackend extends BaseDriverBackend<FileDriverProfile> {
  public readonly kind = 'file';

  protected isProfile(profile: DriverProfile): profile is FileDriverProfile {
    return profile.kind === 'file';
  }

  protected async openSink(request: PrintRequest<FileDriverProfile>): Promise<PrintSink> {
    const filePath = outputPathFor(request.profile, request.jobId);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const stream = fs.createWriteStream(filePath, { encoding: 'utf8' });
    let closed = false;

    const end = (): Promise<void> => {
      if (closed) {
        return Promise.resolve();
      }
      closed = true;
      return new Promise((resolve, reject) => {
        stream.once('error', reject);
        stream.end(() => resolve());
      });
    };

    this.logger.debug(`Job ${request.jobId}: writing toolpath to ${filePath}`);

    return {
      write: (line) => new Promise((resolve, reject) => {
        stream.write(`${line}\n`, (error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
      abort: async () => {
        await end();
        await fs.promises.rm(filePath, { force: true });
      },
      close: end
    };
  }
}
