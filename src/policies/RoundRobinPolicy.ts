import { InvalidConfigError } from '../core/errors';
import type { TaskView } from '../core/types';
import type { SchedulingPolicy, SelectionContext } from './types';

/**
 * Round Robin: the head of the ready queue runs for at most one quantum
 */
export class RoundRobinPolicy implements SchedulingPolicy {
  readonly name = 'RR' as const;
  readonly preemptive = false;
  readonly quantum: number;

  constructor(quantum: number) {
    if (!Number.isInteger(quantum) || quantum <= 0) {
      throw new InvalidConfigError(`Round Robin quantum must be a positive integer, got ${quantum}`);
    }
    this.quantum = quantum;
  }

  select(context: SelectionContext): TaskView | undefined {
    return context.candidates[0];
  }
}
