import { describe, it, expect } from 'vitest';
import { TimelineRecorder } from '../../src/engine/TimelineRecorder.js';

describe('TimelineRecorder', () => {
  it('should coalesce consecutive units of one task', () => {
    const recorder = new TimelineRecorder(1);
    recorder.record(0, 'A', 0);
    recorder.record(0, 'A', 1);
    recorder.record(0, 'A', 2);
    recorder.closeTask(0, 'A', 'completed');

    expect(recorder.intervals()).toEqual([{ taskId: 'A', start: 0, end: 3, core: 0, reason: 'completed' }]);
  });

  it('should close an interval when another task takes the core', () => {
    const recorder = new TimelineRecorder(1);
    recorder.record(0, null, 0);
    recorder.record(0, 'A', 1);
    recorder.record(0, 'B', 2);

    expect(recorder.intervals()).toEqual([
      { taskId: null, start: 0, end: 1, core: 0, reason: 'idle' },
      { taskId: 'A', start: 1, end: 2, core: 0, reason: 'preempted' },
      { taskId: 'B', start: 2, end: 3, core: 0, reason: 'open' },
    ]);
  });

  it('should break the interval after an explicit close even for the same task', () => {
    const recorder = new TimelineRecorder(1);
    recorder.record(0, 'A', 0);
    recorder.closeTask(0, 'A', 'quantum');
    recorder.record(0, 'A', 1);

    expect(recorder.intervals().map((interval) => [interval.start, interval.end, interval.reason])).toEqual([
      [0, 1, 'quantum'],
      [1, 2, 'open'],
    ]);
  });

  it('should only close the interval of the named task', () => {
    const recorder = new TimelineRecorder(1);
    recorder.record(0, 'A', 0);

    expect(recorder.closeTask(0, 'B', 'blocked')).toBe(false);
    expect(recorder.closeTask(0, 'A', 'blocked')).toBe(true);
    expect(recorder.closeTask(0, 'A', 'blocked')).toBe(false);
  });

  it('should hand out newly closed intervals once', () => {
    const recorder = new TimelineRecorder(2);
    recorder.record(0, 'A', 0);
    recorder.record(1, 'B', 0);
    recorder.closeTask(1, 'B', 'completed');

    expect(recorder.takeClosed()).toEqual([{ taskId: 'B', start: 0, end: 1, core: 1, reason: 'completed' }]);
    expect(recorder.takeClosed()).toEqual([]);
  });

  it('should close open task and idle intervals differently', () => {
    const recorder = new TimelineRecorder(2);
    recorder.record(0, 'A', 0);
    recorder.record(1, null, 0);
    recorder.closeAll('cancelled');

    expect(recorder.intervals()).toEqual([
      { taskId: 'A', start: 0, end: 1, core: 0, reason: 'cancelled' },
      { taskId: null, start: 0, end: 1, core: 1, reason: 'idle' },
    ]);
  });
});
