import type { TaskView } from '../core/types';
import { OrderingPolicy } from './OrderingPolicy';

/**
 * Rate Monotonic: shorter period = higher priority; aperiodic tasks come last
 */
export class RateMonotonicPolicy extends OrderingPolicy {
  readonly name = 'RMS' as const;
  readonly preemptive = true;

  protected key(task: TaskView): number {
    return task.period ?? Number.POSITIVE_INFINITY;
  }
}
