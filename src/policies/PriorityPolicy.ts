import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * Static priority (lower number = more urgent), preemptive or not
 */
export class PriorityPolicy extends OrderingPolicy {
  readonly name = 'PRIORITY' as const;

  constructor(readonly preemptive: boolean = false) {
    super();
  }

  protected key(task: TaskView): number {
    return task.priority;
  }
}
