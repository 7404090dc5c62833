import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * Shortest Remaining Time First
 */
export class SrtfPolicy extends OrderingPolicy {
  readonly name = 'SRTF' as const;
  readonly preemptive = true;

  protected key(task: TaskView): number {
    return task.remaining;
  }
}
