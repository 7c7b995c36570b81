/**
 * @fileoverview Abstract base class for slicer backends that wrap an external executable.
 *
 * Provides the process plumbing shared by every slicer:
 * - Scratch directory for generated inputs (start/end sequences, configs), removed on
 *   every exit path
 * - Child process supervision through an injectable spawn function
 * - Combined stdout/stderr capture; each line is logged at debug and the last
 *   DIAGNOSTIC_LINE_LIMIT lines are kept as diagnostics
 * - Cancellation: SIGTERM on abort, SIGKILL once the grace period elapses
 * - Output collection: the produced file must exist and be non-empty
 *
 * Subclasses implement:
 * - isProfile(): narrow the generic profile to the backend's own variant
 * - buildInvocation(): command, arguments and the path the tool writes to
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { spawn as nodeSpawn } from 'child_process';
import type { SlicerProfile } from '../types/profiles';
import type { SliceRequest, SliceResult, SlicerBackend, SpawnFunction } from '../types/backends';
import {
  AppError,
  ErrorCode,
  cancelRequestedError,
  sliceFailedError
} from '../utils/error.utils';
import { createSilentLogger, Logger } from '../utils/logging';

export const DIAGNOSTIC_LINE_LIMIT = 200;

export interface SlicerBackendOptions {
  readonly cancelGracePeriodMs: number;
  readonly spawn?: SpawnFunction;
  readonly logger?: Logger;
  /** Parent directory for scratch files; defaults to the OS temp directory */
  readonly scratchRoot?: string;
}

/**
 * Process to run for one slicing request
 */
export interface SlicerInvocation {
  readonly command: string;
  readonly args: readonly string[];
  /** File the tool writes; moved to the requested output path when it differs */
  readonly producedPath: string;
  readonly cwd?: string;
}

/**
 * Bounded ring of the most recent output lines
 */
export class DiagnosticBuffer {
  private readonly lines: string[] = [];
  private partial = '';

  constructor(private readonly limit: number = DIAGNOSTIC_LINE_LIMIT) {}

  /**
   * Append raw output; returns the complete lines it contained
   */
  public push(chunk: string): string[] {
    const parts = (this.partial + chunk).split(/\r?\n/);
    this.partial = parts.pop() ?? '';
    parts.forEach(line => this.keep(line));
    return parts;
  }

  /**
   * Flush a trailing line that had no newline
   */
  public flush(): string | null {
    if (!this.partial) {
      return null;
    }
    const line = this.partial;
    this.partial = '';
    this.keep(line);
    return line;
  }

  public toString(): string {
    return this.lines.join('\n');
  }

  private keep(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.limit) {
      this.lines.shift();
    }
  }
}

export abstract class BaseSlicerBackend<P extends SlicerProfile> implements SlicerBackend {
  public abstract readonly kind: P['kind'];

  protected readonly logger: Logger;
  private readonly spawnProcess: SpawnFunction;
  private readonly cancelGracePeriodMs: number;
  private readonly scratchRoot: string;

  constructor(options: SlicerBackendOptions) {
    this.cancelGracePeriodMs = options.cancelGracePeriodMs;
    this.spawnProcess = options.spawn ?? nodeSpawn;
    this.scratchRoot = options.scratchRoot ?? os.tmpdir();
    this.logger = (options.logger ?? createSilentLogger()).child('Slicer');
  }

  protected abstract isProfile(profile: SlicerProfile): profile is P;

  /**
   * Write any generated inputs into `scratchDir` and describe the process to run
   */
  protected abstract buildInvocation(request: SliceRequest<P>, scratchDir: string): Promise<SlicerInvocation>;

  public async slice(request: SliceRequest): Promise<SliceResult> {
    const { profile } = request;
    if (!this.isProfile(profile)) {
      throw new AppError(
        `Profile ${profile.name} (${profile.kind}) cannot be used by the ${this.kind} slicer`,
        ErrorCode.VALIDATION,
        { profile: profile.name, kind: profile.kind }
      );
    }
    if (request.signal.aborted) {
      throw cancelRequestedError(request.jobId);
    }

    const scratchDir = await fs.promises.mkdtemp(path.join(this.scratchRoot, `conveyor-${request.jobId}-`));
    try {
      const invocation = await this.buildInvocation({ ...request, profile }, scratchDir);
      this.logger.info(`Job ${request.jobId}: slicing ${request.modelPath} with ${profile.name}`);
      this.logger.debug(`Job ${request.jobId}: ${invocation.command} ${invocation.args.join(' ')}`);

      const diagnostics = await this.runProcess(request.jobId, invocation, request.signal);
      await this.collectOutput(invocation.producedPath, request.outputPath, diagnostics);

      this.logger.info(`Job ${request.jobId}: toolpath written to ${request.outputPath}`);
      return { toolpathPath: request.outputPath };
    } finally {
      await fs.promises.rm(scratchDir, { recursive: true, force: true });
    }
  }

  /**
   * Run the tool to completion; resolves with the captured diagnostics
   */
  private runProcess(jobId: string, invocation: SlicerInvocation, signal: AbortSignal): Promise<string> {
    const diagnostics = new DiagnosticBuffer();
    const logLines = (chunk: Buffer | string): void => {
      diagnostics.push(chunk.toString()).forEach(line => this.logger.debug(`[${jobId}] ${line}`));
    };

    return new Promise((resolve, reject) => {
      let settled = false;
      let aborted = false;
      let exited = false;
      let killTimer: NodeJS.Timeout | null = null;

      const child = this.spawnProcess(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      const onAbort = (): void => {
        aborted = true;
        this.logger.info(`Job ${jobId}: terminating slicer process`);
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (!exited) {
            this.logger.warn(`Job ${jobId}: slicer ignored SIGTERM, sending SIGKILL`);
            child.kill('SIGKILL');
          }
        }, this.cancelGracePeriodMs);
      };

      const finish = (error: AppError | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal.removeEventListener('abort', onAbort);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        if (error) {
          reject(error);
        } else {
          resolve(diagnostics.toString());
        }
      };

      child.stdout?.on('data', logLines);
      child.stderr?.on('data', logLines);

      child.on('error', (error: Error) => {
        finish(sliceFailedError(
          `Failed to start slicer ${invocation.command}: ${error.message}`,
          diagnostics.toString(),
          { command: invocation.command },
          error
        ));
      });

      child.on('exit', () => {
        exited = true;
      });

      child.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
        const tail = diagnostics.flush();
        if (tail !== null) {
          this.logger.debug(`[${jobId}] ${tail}`);
        }

        if (aborted) {
          finish(cancelRequestedError(jobId));
        } else if (code !== 0) {
          const reason = code === null ? `signal ${String(exitSignal)}` : `code ${code}`;
          finish(sliceFailedError(`Slicer exited with ${reason}`, diagnostics.toString(), {
            exitCode: code,
            signal: exitSignal
          }));
        } else {
          finish(null);
        }
      });

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private async collectOutput(producedPath: string, outputPath: string, diagnostics: string): Promise<void> {
    const stats = await fs.promises.stat(producedPath).catch(() => null);
    if (!stats || stats.size === 0) {
      throw sliceFailedError('Slicer produced no output', diagnostics, { producedPath });
    }

    if (path.resolve(producedPath) !== path.resolve(outputPath)) {
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await moveFile(producedPath, outputPath);
    }
  }
}

/**
 * rename(), falling back to copy + unlink across filesystems
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.promises.rename(from, to);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      await fs.promises.copyFile(from, to);
      await fs.promises.unlink(from);
      return;
    }
    throw error;
  }
}

/**
 * Write a sequence of G-code lines to `filePath`, newline-terminated
 */
export async function writeSequenceFile(filePath: string, lines: readonly string[]): Promise<string> {
  await fs.promises.writeFile(filePath, lines.map(line => `${line}\n`).join(''), 'utf8');
  return filePath;
}
