/**
 * @fileoverview Abstract base class for driver backends.
 *
 * A driver turns a toolpath into a lazy, finite stream of progress reports:
 * - The toolpath is read and wrapped with the profile's start/end sequences unless
 *   `skipStartEnd` is set; blank lines are dropped
 * - Each line goes to a PrintSink opened by the concrete backend
 * - Progress is yielded at most every `pollIntervalMs` and always after the last line
 * - On abort the sink's abort routine runs before CANCEL_REQUESTED is thrown
 * - The sink is closed on every exit path, including a consumer that stops iterating
 */

import * as fs from 'fs';
import type { DriverProfile } from '../types/profiles';
import type { DriverBackend, PrintRequest } from '../types/backends';
import type { PrintProgress } from '../types/job';
import { AppError, ErrorCode, cancelRequestedError } from '../utils/error.utils';
import { createSilentLogger, Logger } from '../utils/logging';

export interface DriverBackendOptions {
  readonly logger?: Logger;
  /** Clock used for progress throttling */
  readonly now?: () => number;
}

/**
 * Destination of the toolpath lines for one print
 */
export interface PrintSink {
  write(line: string): Promise<void>;
  /**
   * Leave the target in a safe state after a mid-stream cancellation; rejects with
   * DEVICE_DISCONNECTED when the link is lost before that completes
   */
  abort(): Promise<void>;
  close(): Promise<void>;
}

export interface ToolpathLines {
  readonly lines: readonly string[];
  readonly totalBytes: number;
}

function lineBytes(line: string): number {
  return Buffer.byteLength(line, 'utf8') + 1;
}

/**
 * Wrap toolpath text with start/end sequences and drop blank lines
 */
export function assembleToolpath(
  content: string,
  profile: Pick<DriverProfile, 'skipStartEnd' | 'startSequence' | 'endSequence'>
): ToolpathLines {
  const body = content.split(/\r?\n/);
  const all = profile.skipStartEnd ? body : [...profile.startSequence, ...body, ...profile.endSequence];
  const lines = all.map(line => line.trim()).filter(line => line.length > 0);
  return {
    lines,
    totalBytes: lines.reduce((sum, line) => sum + lineBytes(line), 0)
  };
}

export abstract class BaseDriverBackend<P extends DriverProfile> implements DriverBackend {
  public abstract readonly kind: P['kind'];

  protected readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: DriverBackendOptions = {}) {
    this.logger = (options.logger ?? createSilentLogger()).child('Driver');
    this.now = options.now ?? Date.now;
  }

  protected abstract isProfile(profile: DriverProfile): profile is P;

  /**
   * Open the destination for the toolpath lines
   */
  protected abstract openSink(request: PrintRequest<P>): Promise<PrintSink>;

  public print(request: PrintRequest): AsyncIterable<PrintProgress> {
    return this.stream(request);
  }

  private async *stream(request: PrintRequest): AsyncGenerator<PrintProgress, void, undefined> {
    const { profile, jobId, signal } = request;
    if (!this.isProfile(profile)) {
      throw new AppError(
        `Profile ${profile.name} (${profile.kind}) cannot be used by the ${this.kind} driver`,
        ErrorCode.VALIDATION,
        { profile: profile.name, kind: profile.kind }
      );
    }

    const content = await fs.promises.readFile(request.toolpathPath, 'utf8');
    const { lines, totalBytes } = assembleToolpath(content, profile);
    const totalLines = lines.length;

    if (signal.aborted) {
      throw cancelRequestedError(jobId);
    }

    const sink = await this.openSink({ ...request, profile });
    this.logger.info(`Job ${jobId}: streaming ${totalLines} lines with ${profile.name}`);

    try {
      let currentByte = 0;
      let lastReport = this.now();

      for (let index = 0; index < totalLines; index++) {
        if (signal.aborted) {
          this.logger.info(`Job ${jobId}: cancelled at line ${index} of ${totalLines}`);
          await sink.abort();
          throw cancelRequestedError(jobId);
        }

        const line = lines[index];
        await sink.write(line);
        currentByte += lineBytes(line);

        const isLast = index === totalLines - 1;
        const now = this.now();
        if (!isLast && now - lastReport >= profile.pollIntervalMs) {
          lastReport = now;
          yield progressOf(index + 1, totalLines, currentByte, totalBytes);
        }
      }

      yield progressOf(totalLines, totalLines, totalBytes, totalBytes);
      this.logger.info(`Job ${jobId}: toolpath streamed`);
    } finally {
      await sink.close();
    }
  }
}

function progressOf(currentLine: number, totalLines: number, currentByte: number, totalBytes: number): PrintProgress {
  return {
    currentLine,
    totalLines,
    currentByte,
    totalBytes,
    fraction: totalLines === 0 ? 1 : currentLine / totalLines
  };
}
