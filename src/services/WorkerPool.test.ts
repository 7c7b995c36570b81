/**
 * @fileoverview Tests for WorkerPool
 * Tests concurrency bound, FIFO admission, error propagation and drain/close behaviour
 */

import { describe, it, expect } from '@jest/globals';
import { WorkerPool } from './WorkerPool';
import { AppError, ErrorCode } from '../utils/error.utils';

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    open = resolve;
  });
  return { promise, open };
}

describe('WorkerPool', () => {
  it('should reject a non-positive size', () => {
    expect(() => new WorkerPool('bad', 0)).toThrow(AppError);
  });

  it('should never run more tasks than its size', async () => {
    const pool = new WorkerPool('test', 2);
    const gates = [createGate(), createGate(), createGate()];
    let running = 0;
    let peak = 0;

    const results = gates.map((gate, index) => pool.run(async () => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
      return index;
    }));

    await Promise.resolve();
    expect(pool.getStats().active).toBe(2);
    expect(pool.getStats().pending).toBe(1);

    gates.forEach(gate => gate.open());
    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2]);
    expect(peak).toBe(2);
    expect(pool.getStats().completed).toBe(3);
  });

  it('should start waiting tasks in submission order', async () => {
    const pool = new WorkerPool('fifo', 1);
    const started: string[] = [];

    await Promise.all(['a', 'b', 'c'].map(label => pool.run(async () => {
      started.push(label);
    })));

    expect(started).toEqual(['a', 'b', 'c']);
  });

  it('should propagate task failures and count them', async () => {
    const pool = new WorkerPool('failing', 1);

    await expect(pool.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(pool.run(async () => 'next')).resolves.toBe('next');
    expect(pool.getStats().failed).toBe(1);
    expect(pool.getStats().completed).toBe(1);
  });

  it('should resolve drain once all tasks have settled', async () => {
    const pool = new WorkerPool('drain', 1);
    const gate = createGate();
    let finished = false;

    const task = pool.run(async () => {
      await gate.promise;
      finished = true;
    });
    const drained = pool.drain();

    gate.open();
    await drained;
    await task;
    expect(finished).toBe(true);
  });

  it('should refuse new work after close', async () => {
    const pool = new WorkerPool('closed', 1);
    pool.close();

    await expect(pool.run(async () => 1)).rejects.toMatchObject({ code: ErrorCode.UNKNOWN });
  });
});
