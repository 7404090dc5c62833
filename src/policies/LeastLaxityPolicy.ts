import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * Laxity = deadline - now - remaining; negative means the deadline is already lost
 */
export function laxityOf(task: TaskView, time: number): number {
  if (task.deadline === undefined) {
    return Number.POSITIVE_INFINITY;
  }
  return task.deadline - time - task.remaining;
}

/**
 * Least Laxity First, recomputed every tick
 */
export class LeastLaxityPolicy extends OrderingPolicy {
  readonly name = 'LLF' as const;
  readonly preemptive = true;

  protected key(task: TaskView, time: number): number {
    return laxityOf(task, time);
  }
}
