/**
 * @fileoverview Tests for MiracleGrueBackend and the shared slicer process plumbing
 * Tests argument construction, generated config, diagnostics capture, failures and cancellation
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MiracleGrueBackend } from './MiracleGrueBackend';
import { DiagnosticBuffer } from './BaseSlicerBackend';
import { createFakeSpawn } from '../__tests__/fakes';
import { captureRejection, createTestRegistry } from '../__tests__/helpers';
import type { MiracleGrueProfile, SlicerProfile } from '../types/profiles';
import { ErrorCode } from '../utils/error.utils';

function miracleGrueProfile(overrides: Partial<MiracleGrueProfile> = {}): MiracleGrueProfile {
  const profile = createTestRegistry().resolveSlicer('MiracleGrue');
  if (profile.kind !== 'miracle-grue') {
    throw new Error('expected the built-in Miracle Grue profile');
  }
  return { ...profile, ...overrides };
}

describe('MiracleGrueBackend', () => {
  let workDir: string;
  let scratchRoot: string;
  let modelPath: string;
  let outputPath: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mg-test-'));
    scratchRoot = path.join(workDir, 'scratch');
    fs.mkdirSync(scratchRoot);
    modelPath = path.join(workDir, 'cube.stl');
    fs.writeFileSync(modelPath, 'solid cube\nendsolid cube\n');
    outputPath = path.join(workDir, 'out', '1.gcode');
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should run the executable with config, output, start, end and input arguments', async () => {
    const seen: { config?: unknown; start?: string; end?: string } = {};
    const { spawn, calls } = createFakeSpawn((child, call) => {
      seen.config = JSON.parse(fs.readFileSync(call.args[1], 'utf8'));
      seen.start = fs.readFileSync(call.args[5], 'utf8');
      seen.end = fs.readFileSync(call.args[7], 'utf8');
      fs.mkdirSync(path.dirname(call.args[3]), { recursive: true });
      fs.writeFileSync(call.args[3], 'G1 X0 Y0\n');
      child.finish(0);
    });
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 1000, spawn, scratchRoot });
    const profile = miracleGrueProfile({
      executable: '/opt/mg/miracle_grue',
      startSequence: ['M104 S220'],
      endSequence: ['M18']
    });

    const result = await backend.slice({
      jobId: '1',
      modelPath,
      outputPath,
      profile,
      signal: new AbortController().signal
    });

    expect(result).toEqual({ toolpathPath: outputPath });
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('/opt/mg/miracle_grue');
    const args = calls[0].args;
    expect(args.filter((_, index) => index % 2 === 0).slice(0, 4)).toEqual(['-c', '-o', '-s', '-e']);
    expect(args[3]).toBe(outputPath);
    expect(args[8]).toBe(modelPath);
    expect(seen.start).toBe('M104 S220\n');
    expect(seen.end).toBe('M18\n');
    expect(seen.config).toMatchObject({
      doRaft: false,
      doSupport: false,
      infillDensity: 0.1,
      layerH: 0.27,
      nbOfShells: 1
    });
    expect(fs.readdirSync(scratchRoot)).toEqual([]);
  });

  it('should overlay slicing settings on the base config file', async () => {
    const basePath = path.join(workDir, 'base.config');
    fs.writeFileSync(basePath, JSON.stringify({ layerH: 0.5, firstLayerZ: 0.11 }));
    let config: unknown;
    const { spawn } = createFakeSpawn((child, call) => {
      config = JSON.parse(fs.readFileSync(call.args[1], 'utf8'));
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.writeFileSync(outputPath, 'G1\n');
      child.finish(0);
    });
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 1000, spawn, scratchRoot });

    await backend.slice({
      jobId: '2',
      modelPath,
      outputPath,
      profile: miracleGrueProfile({ configPath: basePath }),
      signal: new AbortController().signal
    });

    expect(config).toMatchObject({ firstLayerZ: 0.11, layerH: 0.27 });
  });

  it('should fail with the captured output when the slicer exits non-zero', async () => {
    const { spawn } = createFakeSpawn((child) => {
      child.writeOutput('loading mesh\n');
      child.stderr.write('mesh is not manifold\n');
      child.finish(3);
    });
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 1000, spawn, scratchRoot });

    const error = await captureRejection(backend.slice({
      jobId: '3',
      modelPath,
      outputPath,
      profile: miracleGrueProfile(),
      signal: new AbortController().signal
    }));

    expect(error.code).toBe(ErrorCode.SLICE_FAILED);
    expect(error.message).toBe('Slicer exited with code 3');
    expect(error.context?.diagnostics).toBe('loading mesh\nmesh is not manifold');
    expect(fs.readdirSync(scratchRoot)).toEqual([]);
  });

  it('should fail when the executable cannot be started', async () => {
    const { spawn } = createFakeSpawn((child) => {
      child.emit('error', new Error('spawn miracle_grue ENOENT'));
    });
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 1000, spawn, scratchRoot });

    const error = await captureRejection(backend.slice({
      jobId: '4',
      modelPath,
      outputPath,
      profile: miracleGrueProfile(),
      signal: new AbortController().signal
    }));

    expect(error.code).toBe(ErrorCode.SLICE_FAILED);
    expect(error.message).toBe('Failed to start slicer miracle_grue: spawn miracle_grue ENOENT');
  });

  it('should fail when the slicer succeeds without writing a toolpath', async () => {
    const { spawn } = createFakeSpawn((child) => {
      child.finish(0);
    });
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 1000, spawn, scratchRoot });

    const error = await captureRejection(backend.slice({
      jobId: '5',
      modelPath,
      outputPath,
      profile: miracleGrueProfile(),
      signal: new AbortController().signal
    }));

    expect(error.code).toBe(ErrorCode.SLICE_FAILED);
    expect(error.message).toBe('Slicer produced no output');
  });

  it('should terminate the process on abort and escalate to SIGKILL after the grace period', async () => {
    const controller = new AbortController();
    const { spawn, calls } = createFakeSpawn((child) => {
      controller.abort();
      // Exit only once SIGKILL arrives
      const poll = setInterval(() => {
        if (child.killSignals.includes('SIGKILL')) {
          clearInterval(poll);
          child.finish(null, 'SIGKILL');
        }
      }, 5);
    });
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 20, spawn, scratchRoot });

    const error = await captureRejection(backend.slice({
      jobId: '6',
      modelPath,
      outputPath,
      profile: miracleGrueProfile(),
      signal: controller.signal
    }));

    expect(error.code).toBe(ErrorCode.CANCEL_REQUESTED);
    expect(calls[0].child.killSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(fs.readdirSync(scratchRoot)).toEqual([]);
  });

  it('should not start a process for an already aborted request', async () => {
    const controller = new AbortController();
    controller.abort();
    const { spawn, calls } = createFakeSpawn((child) => child.finish(0));
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 20, spawn, scratchRoot });

    const error = await captureRejection(backend.slice({
      jobId: '7',
      modelPath,
      outputPath,
      profile: miracleGrueProfile(),
      signal: controller.signal
    }));

    expect(error.code).toBe(ErrorCode.CANCEL_REQUESTED);
    expect(calls).toHaveLength(0);
  });

  it('should reject a profile of another slicer kind', async () => {
    const { spawn } = createFakeSpawn((child) => child.finish(0));
    const backend = new MiracleGrueBackend({ cancelGracePeriodMs: 20, spawn, scratchRoot });
    const skeinforge: SlicerProfile = createTestRegistry().resolveSlicer('Skeinforge');

    const error = await captureRejection(backend.slice({
      jobId: '8',
      modelPath,
      outputPath,
      profile: skeinforge,
      signal: new AbortController().signal
    }));

    expect(error.code).toBe(ErrorCode.VALIDATION);
  });
});

describe('DiagnosticBuffer', () => {
  it('should keep only the most recent lines', () => {
    const buffer = new DiagnosticBuffer(3);

    buffer.push('one\ntwo\nthr');
    buffer.push('ee\nfour\nfive');
    expect(buffer.flush()).toBe('five');

    expect(buffer.toString()).toBe('three\nfour\nfive');
  });

  it('should return complete lines and hold back a partial one', () => {
    const buffer = new DiagnosticBuffer();

    expect(buffer.push('a\r\nb')).toEqual(['a']);
    expect(buffer.push('c\n')).toEqual(['bc']);
    expect(buffer.flush()).toBeNull();
  });
});
