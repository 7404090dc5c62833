import type { ExecutionInterval, MetricsSnapshot } from './types';

/**
 * Base class for every error the simulator reports
 */
export class SchedulerError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
    this.name = 'SchedulerError';
  }
}

/**
 * Error thrown when task or resource descriptors are malformed
 */
export class InvalidTaskSetError extends SchedulerError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message, 'INVALID_TASK_SET');
    this.name = 'InvalidTaskSetError';
  }
}

/**
 * Error thrown when policy or simulation parameters are invalid
 */
export class InvalidConfigError extends SchedulerError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

/**
 * Timeline and metrics of a run that stopped before finishing
 */
export interface PartialRun {
  timeline: ExecutionInterval[];
  metrics: MetricsSnapshot;
}

/**
 * Error thrown when a run exceeds its tick ceiling
 */
export class SimulationDivergenceError extends SchedulerError {
  constructor(
    readonly maxTicks: number,
    readonly partial: PartialRun
  ) {
    super(`Simulation did not terminate within ${maxTicks} ticks`, 'SIMULATION_DIVERGENCE');
    this.name = 'SimulationDivergenceError';
  }
}

/**
 * Error thrown when deadlock resolution fails to break a wait-for cycle
 */
export class DeadlockUnresolvedError extends SchedulerError {
  constructor(readonly cycle: string[]) {
    super(`Deadlock could not be resolved: ${cycle.join(' -> ')}`, 'DEADLOCK_UNRESOLVED');
    this.name = 'DeadlockUnresolvedError';
  }
}
