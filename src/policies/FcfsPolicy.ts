import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * First-Come, First-Served
 */
export class FcfsPolicy extends OrderingPolicy {
  readonly name = 'FCFS' as const;
  readonly preemptive = false;

  protected key(task: TaskView): number {
    return task.arrival;
  }
}
