/**
 * @fileoverview Tests for JobQueue
 * Tests id assignment, the transition table, wait lists, filtering and event publication
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { JobQueue } from './JobQueue';
import type { JobEvent, JobProgressEvent } from '../types/job';
import { ErrorCode } from '../utils/error.utils';
import { createJobParams } from '../__tests__/helpers';

describe('JobQueue', () => {
  let queue: JobQueue;
  let events: JobEvent[];

  beforeEach(() => {
    queue = new JobQueue();
    events = [];
    queue.on('job-event', (event: JobEvent) => events.push(event));
  });

  describe('create', () => {
    it('should assign increasing ids and start in created', () => {
      const first = queue.create(createJobParams());
      const second = queue.create(createJobParams());

      expect(first.id).toBe('1');
      expect(second.id).toBe('2');
      expect(first.state).toBe('created');
      expect(first.history).toEqual([{ from: null, to: 'created', at: first.createdAt }]);
      expect(first.progress).toBeNull();
      expect(first.waitPosition).toBeNull();
    });

    it('should publish creation with a null old state', () => {
      const job = queue.create(createJobParams());

      expect(events).toEqual([
        { jobId: job.id, oldState: null, newState: 'created', timestamp: job.createdAt }
      ]);
    });
  });

  describe('transition', () => {
    it('should follow the forward path and record history', () => {
      const job = queue.create(createJobParams());

      queue.transition(job.id, 'slicing');
      queue.transition(job.id, 'queued');
      queue.transition(job.id, 'printing');
      const done = queue.transition(job.id, 'completed', 'finished');

      expect(done.state).toBe('completed');
      expect(done.history.map(record => record.to)).toEqual([
        'created', 'slicing', 'queued', 'printing', 'completed'
      ]);
      expect(done.history[4].message).toBe('finished');
      expect(events.map(event => [event.oldState, event.newState])).toEqual([
        [null, 'created'],
        ['created', 'slicing'],
        ['slicing', 'queued'],
        ['queued', 'printing'],
        ['printing', 'completed']
      ]);
      expect(events[4].message).toBe('finished');
    });

    it('should allow failed and cancelled from any non-terminal state', () => {
      const a = queue.create(createJobParams());
      const b = queue.create(createJobParams());
      queue.transition(b.id, 'slicing');

      expect(queue.transition(a.id, 'cancelled').state).toBe('cancelled');
      expect(queue.transition(b.id, 'failed').state).toBe('failed');
    });

    it('should reject skipping states', () => {
      const job = queue.create(createJobParams());

      expect(() => queue.transition(job.id, 'printing')).toThrow('Illegal transition');
      expect(queue.get(job.id).state).toBe('created');
    });

    it('should reject leaving a terminal state and publish nothing', () => {
      const job = queue.create(createJobParams());
      queue.transition(job.id, 'cancelled');
      const before = events.length;

      let caught: unknown;
      try {
        queue.transition(job.id, 'failed');
      } catch (error) {
        caught = error;
      }

      expect(caught).toMatchObject({ code: ErrorCode.ILLEGAL_TRANSITION });
      expect(events).toHaveLength(before);
    });

    it('should throw JOB_NOT_FOUND for unknown jobs', () => {
      expect(() => queue.get('42')).toThrow('Job 42 not found');
    });
  });

  describe('wait lists', () => {
    function queuedJob(deviceId = 'bot-1'): string {
      const job = queue.create(createJobParams({ deviceId }));
      queue.transition(job.id, 'slicing');
      queue.transition(job.id, 'queued');
      queue.enqueueForDevice(job.id);
      return job.id;
    }

    it('should report 1-based positions in arrival order per device', () => {
      const a = queuedJob();
      const b = queuedJob();
      const other = queuedJob('bot-2');

      expect(queue.get(a).waitPosition).toBe(1);
      expect(queue.get(b).waitPosition).toBe(2);
      expect(queue.get(other).waitPosition).toBe(1);
      expect(queue.peekNextForDevice('bot-1')).toBe(a);
    });

    it('should hand out jobs first in first out', () => {
      const a = queuedJob();
      const b = queuedJob();

      expect(queue.takeNextForDevice('bot-1')).toBe(a);
      expect(queue.get(b).waitPosition).toBe(1);
      expect(queue.takeNextForDevice('bot-1')).toBe(b);
      expect(queue.takeNextForDevice('bot-1')).toBeUndefined();
    });

    it('should drop a job from the wait list when it is cancelled', () => {
      const a = queuedJob();
      const b = queuedJob();

      queue.transition(a, 'cancelled');

      expect(queue.get(a).waitPosition).toBeNull();
      expect(queue.get(b).waitPosition).toBe(1);
    });

    it('should keep submission order when slicing finishes out of order', () => {
      const first = queue.create(createJobParams());
      const second = queue.create(createJobParams());
      for (const id of [first.id, second.id]) {
        queue.transition(id, 'slicing');
      }

      expect(queue.hasEarlierPending(second.id)).toBe(true);
      expect(queue.hasEarlierPending(first.id)).toBe(false);

      queue.transition(second.id, 'queued');
      queue.enqueueForDevice(second.id);
      queue.transition(first.id, 'queued');
      queue.enqueueForDevice(first.id);

      expect(queue.hasEarlierPending(second.id)).toBe(false);
      expect(queue.peekNextForDevice('bot-1')).toBe(first.id);
      expect(queue.get(second.id).waitPosition).toBe(2);
    });

    it('should ignore pending jobs for other devices', () => {
      const other = queue.create(createJobParams({ deviceId: 'bot-2' }));
      const mine = queue.create(createJobParams());

      expect(queue.hasEarlierPending(mine.id)).toBe(false);
      expect(queue.get(other.id).state).toBe('created');
    });

    it('should not enqueue the same job twice', () => {
      const a = queuedJob();

      expect(queue.enqueueForDevice(a)).toBe(1);
      expect(queue.takeNextForDevice('bot-1')).toBe(a);
      expect(queue.takeNextForDevice('bot-1')).toBeUndefined();
    });
  });

  describe('list', () => {
    it('should filter by state, device and activity', () => {
      const a = queue.create(createJobParams());
      const b = queue.create(createJobParams({ deviceId: 'bot-2' }));
      queue.transition(b.id, 'cancelled');

      expect(queue.list().map(job => job.id)).toEqual([a.id, b.id]);
      expect(queue.list({ states: ['cancelled'] }).map(job => job.id)).toEqual([b.id]);
      expect(queue.list({ deviceId: 'bot-1' }).map(job => job.id)).toEqual([a.id]);
      expect(queue.list({ active: true }).map(job => job.id)).toEqual([a.id]);
      expect(queue.list({ active: false }).map(job => job.id)).toEqual([b.id]);
      expect(queue.countActive()).toBe(1);
    });
  });

  it('should record progress and publish a progress event', () => {
    const job = queue.create(createJobParams());
    const received: JobProgressEvent[] = [];
    queue.on('job-progress', (event: JobProgressEvent) => received.push(event));

    queue.setProgress(job.id, { currentLine: 5, totalLines: 10, currentByte: 40, totalBytes: 80, fraction: 0.5 });

    expect(queue.get(job.id).progress).toBe(0.5);
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ jobId: job.id, currentLine: 5, totalLines: 10, fraction: 0.5 });
  });

  it('should keep toolpath and error details on the snapshot', () => {
    const job = queue.create(createJobParams());

    queue.setToolpath(job.id, '/tmp/1.gcode');
    queue.setError(job.id, { code: ErrorCode.SLICE_FAILED, message: 'exit 1', diagnostics: 'bad mesh' });

    expect(queue.get(job.id)).toMatchObject({
      toolpathPath: '/tmp/1.gcode',
      error: { code: ErrorCode.SLICE_FAILED, message: 'exit 1', diagnostics: 'bad mesh' }
    });
  });

  describe('immutability', () => {
    it('should hand every listener the same frozen event', () => {
      const seen: JobEvent[] = [];
      queue.on('job-event', (event: JobEvent) => {
        Reflect.set(event, 'newState', 'failed');
      });
      queue.on('job-event', (event: JobEvent) => seen.push(event));

      queue.create(createJobParams());

      expect(Object.isFrozen(events[0])).toBe(true);
      expect(seen[0]).toBe(events[0]);
      expect(seen[0].newState).toBe('created');
    });

    it('should freeze progress events', () => {
      const job = queue.create(createJobParams());
      const received: JobProgressEvent[] = [];
      queue.on('job-progress', (event: JobProgressEvent) => received.push(event));

      queue.setProgress(job.id, { currentLine: 1, totalLines: 2, currentByte: 8, totalBytes: 16, fraction: 0.5 });

      expect(Object.isFrozen(received[0])).toBe(true);
      expect(Reflect.set(received[0], 'fraction', 1)).toBe(false);
    });

    it('should not let snapshot holders rewrite history or errors', () => {
      const job = queue.create(createJobParams());
      queue.transition(job.id, 'slicing');
      queue.setError(job.id, { code: ErrorCode.SLICE_FAILED, message: 'exit 1' });
      const snapshot = queue.get(job.id);

      expect(Reflect.set(snapshot.history[0], 'to', 'completed')).toBe(false);
      expect(Reflect.set(snapshot.history[1], 'to', 'completed')).toBe(false);
      expect(snapshot.error !== null && Reflect.set(snapshot.error, 'message', 'rewritten')).toBe(false);

      const current = queue.get(job.id);
      expect(current.history.map(record => record.to)).toEqual(['created', 'slicing']);
      expect(current.error?.message).toBe('exit 1');
    });

    it('should not share the history array between snapshots', () => {
      const job = queue.create(createJobParams());
      const before = queue.get(job.id);

      queue.transition(job.id, 'slicing');

      expect(before.history).toHaveLength(1);
    });
  });
});
