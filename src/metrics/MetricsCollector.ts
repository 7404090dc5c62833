import type { CoreModelConfig } from '../config/schema';
import type { ExecutionInterval, MetricsSnapshot, TaskMetrics, TaskSpec } from '../core/types';
import { CoreStatusModel, DEFAULT_CORE_MODEL } from './CoreStatusModel';

/**
 * Task fields the metrics depend on
 */
export type MetricsTaskInput = Pick<TaskSpec, 'id' | 'arrival' | 'burst' | 'deadline'>;

export interface MetricsOptions {
  cores: number;
  coreModel?: CoreModelConfig;
}

interface TaskTrace {
  executed: number;
  firstStart: number | null;
  lastEnd: number;
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

/**
 * Derive every metric from the task descriptors and the interval log
 *
 * Nothing is accumulated between calls: the same inputs always give the same
 * snapshot, whether the run is finished or not.
 */
export function computeMetrics(
  tasks: readonly MetricsTaskInput[],
  timeline: readonly ExecutionInterval[],
  options: MetricsOptions
): MetricsSnapshot {
  const cores = options.cores;
  const model = options.coreModel ?? DEFAULT_CORE_MODEL;
  const totalTime = timeline.reduce((max, interval) => Math.max(max, interval.end), 0);

  const traces = new Map<string, TaskTrace>();
  const busyTicks = new Array<number>(cores).fill(0);
  const occupancy = Array.from({ length: cores }, () => new Array<boolean>(totalTime).fill(false));
  let preemptions = 0;

  for (const interval of timeline) {
    if (interval.reason === 'preempted' || interval.reason === 'quantum') {
      preemptions++;
    }
    if (interval.taskId === null) {
      continue;
    }

    const duration = interval.end - interval.start;
    busyTicks[interval.core] += duration;
    for (let t = interval.start; t < interval.end; t++) {
      occupancy[interval.core][t] = true;
    }

    const trace = traces.get(interval.taskId) ?? { executed: 0, firstStart: null, lastEnd: 0 };
    trace.executed += duration;
    trace.firstStart = trace.firstStart === null ? interval.start : Math.min(trace.firstStart, interval.start);
    trace.lastEnd = Math.max(trace.lastEnd, interval.end);
    traces.set(interval.taskId, trace);
  }

  const taskMetrics: TaskMetrics[] = tasks.map((task) => {
    const trace = traces.get(task.id);
    const executed = trace?.executed ?? 0;
    const completion = trace !== undefined && executed === task.burst ? trace.lastEnd : null;
    const turnaround = completion !== null ? completion - task.arrival : null;
    const remaining = task.burst - executed;

    let deadlineMissed = false;
    if (task.deadline !== undefined) {
      deadlineMissed = completion !== null ? completion > task.deadline : totalTime + remaining > task.deadline;
    }

    return {
      taskId: task.id,
      arrival: task.arrival,
      burst: task.burst,
      deadline: task.deadline ?? null,
      completion,
      turnaround,
      waiting: turnaround !== null ? turnaround - task.burst : null,
      response: trace !== undefined && trace.firstStart !== null ? trace.firstStart - task.arrival : null,
      deadlineMissed,
    };
  });

  const completed = taskMetrics.filter((metrics) => metrics.completion !== null);
  const missedDeadlines = taskMetrics.filter((metrics) => metrics.deadlineMissed).length;
  const totalBusy = busyTicks.reduce((sum, ticks) => sum + ticks, 0);

  // Replay each core through the hardware model, one tick at a time
  let energy = 0;
  let peakTemperature = model.ambientTemperature;
  const finalTemperatures: number[] = [];
  for (let core = 0; core < cores; core++) {
    const status = new CoreStatusModel(model);
    let temperature = model.ambientTemperature;
    for (let t = 0; t < totalTime; t++) {
      const reading = status.record(occupancy[core][t]);
      energy += reading.power;
      temperature = reading.temperature;
      peakTemperature = Math.max(peakTemperature, temperature);
    }
    finalTemperatures.push(temperature);
  }

  let contextSwitches = 0;
  for (let core = 0; core < cores; core++) {
    let previous: string | null = null;
    const busy = timeline
      .filter((interval) => interval.core === core && interval.taskId !== null)
      .sort((a, b) => a.start - b.start);
    for (const interval of busy) {
      if (previous !== null && interval.taskId !== previous) {
        contextSwitches++;
      }
      previous = interval.taskId;
    }
  }

  return {
    tasks: taskMetrics,
    totalTime,
    completedTasks: completed.length,
    utilization: totalTime > 0 ? totalBusy / (totalTime * cores) : 0,
    coreUtilization: busyTicks.map((ticks) => (totalTime > 0 ? ticks / totalTime : 0)),
    throughput: totalTime > 0 ? completed.length / totalTime : 0,
    averageWaiting: average(completed.map((metrics) => metrics.waiting ?? 0)),
    averageTurnaround: average(completed.map((metrics) => metrics.turnaround ?? 0)),
    averageResponse: average(completed.map((metrics) => metrics.response ?? 0)),
    missedDeadlines,
    missRatio: tasks.length > 0 ? missedDeadlines / tasks.length : 0,
    preemptions,
    contextSwitches,
    energy,
    peakTemperature,
    averageTemperature: average(finalTemperatures),
  };
}
