import type { DelegatePolicyName, TaskView } from '../core/types';
import type { SchedulingPolicy, SelectionContext } from './types';

/**
 * Adaptive policy: orders nothing itself, forwards to the active delegate
 *
 * The active delegate is reassigned only by the adaptive controller at
 * decision-window boundaries.
 */
export class HybridPolicy implements SchedulingPolicy {
  readonly name = 'HYBRID' as const;
  private active: SchedulingPolicy;
  private activeName: DelegatePolicyName;

  constructor(
    private readonly delegates: Record<DelegatePolicyName, SchedulingPolicy>,
    initial: DelegatePolicyName
  ) {
    this.active = delegates[initial];
    this.activeName = initial;
  }

  get preemptive(): boolean {
    return this.active.preemptive;
  }

  get quantum(): number | null {
    return this.active.quantum;
  }

  /**
   * Name of the delegate currently in charge
   */
  get current(): DelegatePolicyName {
    return this.activeName;
  }

  /**
   * Hand control to another delegate
   */
  assign(name: DelegatePolicyName): void {
    this.active = this.delegates[name];
    this.activeName = name;
  }

  select(context: SelectionContext): TaskView | undefined {
    return this.active.select(context);
  }
}
