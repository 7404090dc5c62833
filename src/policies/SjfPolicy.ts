import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * Shortest Job First, by original burst
 */
export class SjfPolicy extends OrderingPolicy {
  readonly name = 'SJF' as const;
  readonly preemptive = false;

  protected key(task: TaskView): number {
    return task.burst;
  }
}
