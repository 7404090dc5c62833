import type { PolicyName, TaskView } from '../core/types';
import type { SchedulingPolicy, SelectionContext } from './types';

/**
 * Deterministic order: key, then arrival, then id
 */
export function compareTasks(a: TaskView, keyA: number, b: TaskView, keyB: number): number {
  if (keyA !== keyB) {
    return keyA < keyB ? -1 : 1;
  }
  if (a.arrival !== b.arrival) {
    return a.arrival - b.arrival;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

/**
 * Base class for policies that pick the candidate with the smallest key
 */
export abstract class OrderingPolicy implements SchedulingPolicy {
  abstract readonly name: PolicyName;
  abstract readonly preemptive: boolean;
  readonly quantum: number | null = null;

  /**
   * Ordering key; smaller runs first
   */
  protected abstract key(task: TaskView, time: number): number;

  select(context: SelectionContext): TaskView | undefined {
    let best: TaskView | undefined;
    let bestKey = Number.POSITIVE_INFINITY;

    for (const task of context.candidates) {
      const taskKey = this.key(task, context.time);
      if (best === undefined || compareTasks(task, taskKey, best, bestKey) < 0) {
        best = task;
        bestKey = taskKey;
      }
    }

    return best;
  }
}
