import { describe, it, expect } from 'vitest';
import type { ExecutionInterval } from '../../src/core/types.js';
import { computeMetrics } from '../../src/metrics/MetricsCollector.js';

describe('computeMetrics', () => {
  it('should derive per-task and aggregate metrics from a timeline', () => {
    const tasks = [
      { id: 'A', arrival: 0, burst: 4 },
      { id: 'B', arrival: 1, burst: 2 },
    ];
    const timeline: ExecutionInterval[] = [
      { taskId: 'A', start: 0, end: 4, core: 0, reason: 'completed' },
      { taskId: 'B', start: 4, end: 6, core: 0, reason: 'completed' },
    ];

    const metrics = computeMetrics(tasks, timeline, { cores: 1 });

    expect(metrics.tasks).toEqual([
      { taskId: 'A', arrival: 0, burst: 4, deadline: null, completion: 4, turnaround: 4, waiting: 0, response: 0, deadlineMissed: false },
      { taskId: 'B', arrival: 1, burst: 2, deadline: null, completion: 6, turnaround: 5, waiting: 3, response: 3, deadlineMissed: false },
    ]);
    expect(metrics.totalTime).toBe(6);
    expect(metrics.completedTasks).toBe(2);
    expect(metrics.utilization).toBe(1);
    expect(metrics.coreUtilization).toEqual([1]);
    expect(metrics.throughput).toBeCloseTo(2 / 6);
    expect(metrics.averageWaiting).toBe(1.5);
    expect(metrics.averageTurnaround).toBe(4.5);
    expect(metrics.averageResponse).toBe(1.5);
    expect(metrics.preemptions).toBe(0);
    expect(metrics.contextSwitches).toBe(1);
    // 19 + 23 + 27 + 31 + 35 + 35
    expect(metrics.energy).toBeCloseTo(170);
    expect(metrics.peakTemperature).toBeCloseTo(100);
    expect(metrics.averageTemperature).toBeCloseTo(100);
  });

  it('should count idle stretches against utilization', () => {
    const timeline: ExecutionInterval[] = [
      { taskId: null, start: 0, end: 2, core: 0, reason: 'idle' },
      { taskId: 'A', start: 2, end: 4, core: 0, reason: 'completed' },
    ];

    const metrics = computeMetrics([{ id: 'A', arrival: 2, burst: 2 }], timeline, { cores: 1 });

    expect(metrics.utilization).toBe(0.5);
    expect(metrics.coreUtilization).toEqual([0.5]);
    expect(metrics.tasks[0].waiting).toBe(0);
    // idle, idle, then 19 + 23
    expect(metrics.energy).toBeCloseTo(2 + 2 + 19 + 23);
  });

  it('should count preemptions and quantum expiries', () => {
    const timeline: ExecutionInterval[] = [
      { taskId: 'A', start: 0, end: 1, core: 0, reason: 'preempted' },
      { taskId: 'B', start: 1, end: 3, core: 0, reason: 'quantum' },
      { taskId: 'B', start: 3, end: 4, core: 0, reason: 'completed' },
      { taskId: 'A', start: 4, end: 6, core: 0, reason: 'completed' },
    ];

    const metrics = computeMetrics(
      [
        { id: 'A', arrival: 0, burst: 3 },
        { id: 'B', arrival: 1, burst: 3 },
      ],
      timeline,
      { cores: 1 }
    );

    expect(metrics.preemptions).toBe(2);
    // A -> B, B -> A; B -> B is not a switch
    expect(metrics.contextSwitches).toBe(2);
    expect(metrics.tasks.map((task) => task.completion)).toEqual([6, 4]);
  });

  it('should flag late and hopeless tasks as missed', () => {
    const timeline: ExecutionInterval[] = [
      { taskId: 'A', start: 0, end: 3, core: 0, reason: 'completed' },
      { taskId: 'B', start: 3, end: 4, core: 0, reason: 'open' },
    ];

    const metrics = computeMetrics(
      [
        { id: 'A', arrival: 0, burst: 3, deadline: 2 },
        { id: 'B', arrival: 0, burst: 3, deadline: 5 },
        { id: 'C', arrival: 0, burst: 1, deadline: 9 },
      ],
      timeline,
      { cores: 1 }
    );

    expect(metrics.tasks.map((task) => task.deadlineMissed)).toEqual([true, true, false]);
    expect(metrics.tasks[1].completion).toBeNull();
    expect(metrics.tasks[1].response).toBe(3);
    expect(metrics.tasks[2].response).toBeNull();
    expect(metrics.missedDeadlines).toBe(2);
    expect(metrics.missRatio).toBeCloseTo(2 / 3);
    expect(metrics.averageWaiting).toBe(0);
  });

  it('should report per-core utilization', () => {
    const timeline: ExecutionInterval[] = [
      { taskId: 'A', start: 0, end: 4, core: 0, reason: 'completed' },
      { taskId: 'B', start: 0, end: 2, core: 1, reason: 'completed' },
      { taskId: null, start: 2, end: 4, core: 1, reason: 'idle' },
    ];

    const metrics = computeMetrics(
      [
        { id: 'A', arrival: 0, burst: 4 },
        { id: 'B', arrival: 0, burst: 2 },
      ],
      timeline,
      { cores: 2 }
    );

    expect(metrics.coreUtilization).toEqual([1, 0.5]);
    expect(metrics.utilization).toBe(0.75);
  });

  it('should return zeros for an empty timeline', () => {
    const metrics = computeMetrics([], [], { cores: 1 });

    expect(metrics.totalTime).toBe(0);
    expect(metrics.utilization).toBe(0);
    expect(metrics.throughput).toBe(0);
    expect(metrics.energy).toBe(0);
    expect(metrics.peakTemperature).toBe(20);
    expect(metrics.averageTemperature).toBe(20);
  });
});
