import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * Earliest Deadline First; tasks without a deadline come last
 */
export class EdfPolicy extends OrderingPolicy {
  readonly name = 'EDF' as const;
  readonly preemptive = true;

  protected key(task: TaskView): number {
    return task.deadline ?? Number.POSITIVE_INFINITY;
  }
}
