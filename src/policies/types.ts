import type { PolicyName, TaskView } from '../core/types';

/**
 * What a policy sees when asked for the next task on one core
 */
export interface SelectionContext {
  time: number;
  /** Ready tasks in queue order, plus the running task when it may be preempted */
  candidates: readonly TaskView[];
  running: TaskView | null;
}

/**
 * Common capability of every scheduling policy
 */
export interface SchedulingPolicy {
  readonly name: PolicyName;
  /** Re-evaluated every tick while a task is running */
  readonly preemptive: boolean;
  /** Time slice, for policies that rotate the ready queue */
  readonly quantum: number | null;

  /**
   * Choose the next task, or undefined when there is no candidate
   */
  select(context: SelectionContext): TaskView | undefined;
}
