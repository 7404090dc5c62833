import type { DelegatePolicyName, PolicyName } from '../core/types';
import { EdfPolicy } from './EdfPolicy';
import { FcfsPolicy } from './FcfsPolicy';
import { HybridPolicy } from './HybridPolicy';
import { LeastLaxityPolicy } from './LeastLaxityPolicy';
import { PriorityPolicy } from './PriorityPolicy';
import { RateMonotonicPolicy } from './RateMonotonicPolicy';
import { RoundRobinPolicy } from './RoundRobinPolicy';
import { SjfPolicy } from './SjfPolicy';
import { SrtfPolicy } from './SrtfPolicy';
import type { SchedulingPolicy } from './types';

/**
 * Parameters shared by every policy constructor
 */
export interface PolicyOptions {
  quantum: number;
  /** PRIORITY sub-mode */
  preemptive: boolean;
  /** HYBRID only: delegate in charge before the first decision */
  initialPolicy?: DelegatePolicyName;
}

/**
 * Descriptions shown by `policies` listings
 */
export const POLICY_DESCRIPTIONS: Record<PolicyName, string> = {
  FCFS: 'First-Come, First-Served (non-preemptive)',
  SJF: 'Shortest Job First by original burst (non-preemptive)',
  SRTF: 'Shortest Remaining Time First (preemptive)',
  EDF: 'Earliest Deadline First (preemptive)',
  RR: 'Round Robin with a fixed quantum',
  PRIORITY: 'Static priority, lower number first (configurable preemption)',
  RMS: 'Rate Monotonic, shorter period first (preemptive)',
  LLF: 'Least Laxity First (preemptive)',
  HYBRID: 'Adaptive: rule table picks a delegate every decision window',
};

/**
 * Build a non-adaptive policy
 */
export function createDelegatePolicy(name: DelegatePolicyName, options: PolicyOptions): SchedulingPolicy {
  switch (name) {
    case 'FCFS':
      return new FcfsPolicy();
    case 'SJF':
      return new SjfPolicy();
    case 'SRTF':
      return new SrtfPolicy();
    case 'EDF':
      return new EdfPolicy();
    case 'RR':
      return new RoundRobinPolicy(options.quantum);
    case 'PRIORITY':
      return new PriorityPolicy(options.preemptive);
    case 'RMS':
      return new RateMonotonicPolicy();
    case 'LLF':
      return new LeastLaxityPolicy();
  }
}

/**
 * Build the hybrid policy with one instance of every delegate
 */
export function createHybridPolicy(options: PolicyOptions): HybridPolicy {
  const delegates: Record<DelegatePolicyName, SchedulingPolicy> = {
    FCFS: createDelegatePolicy('FCFS', options),
    SJF: createDelegatePolicy('SJF', options),
    SRTF: createDelegatePolicy('SRTF', options),
    EDF: createDelegatePolicy('EDF', options),
    RR: createDelegatePolicy('RR', options),
    PRIORITY: createDelegatePolicy('PRIORITY', options),
    RMS: createDelegatePolicy('RMS', options),
    LLF: createDelegatePolicy('LLF', options),
  };
  return new HybridPolicy(delegates, options.initialPolicy ?? 'PRIORITY');
}

/**
 * Build any policy by name
 */
export function createPolicy(name: PolicyName, options: PolicyOptions): SchedulingPolicy {
  if (name === 'HYBRID') {
    return createHybridPolicy(options);
  }
  return createDelegatePolicy(name, options);
}
