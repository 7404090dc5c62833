import type { AdaptiveRule, RuleCondition } from '../config/schema';
import type { DelegatePolicyName } from '../core/types';

/**
 * Rolling metrics gathered over one decision window
 */
export interface WindowMetrics {
  windowStart: number;
  windowEnd: number;
  /** Ready tasks across all cores at the window boundary */
  readyQueueLength: number;
  /** Deadline misses in the window over deadline-bound tasks active in it */
  missRate: number;
  preemptions: number;
  /** Coefficient of variation of remaining work among ready tasks */
  burstSpread: number;
  /** Busy core-ticks over all core-ticks in the window */
  utilization: number;
}

/**
 * Outcome of evaluating the rule table
 */
export interface RuleDecision {
  policy: DelegatePolicyName;
  rule: string;
}

/**
 * Default rule table: deadline pressure wins over queue pressure
 */
export const DEFAULT_ADAPTIVE_RULES: AdaptiveRule[] = [
  {
    name: 'deadline-pressure',
    policy: 'EDF',
    when: [{ metric: 'missRate', op: 'gt', value: 0.2 }],
  },
  {
    name: 'queue-pressure',
    policy: 'SRTF',
    when: [
      { metric: 'readyQueueLength', op: 'gt', value: 4 },
      { metric: 'burstSpread', op: 'gt', value: 0.5 },
    ],
  },
];

function holds(condition: RuleCondition, metrics: WindowMetrics): boolean {
  const actual = metrics[condition.metric];
  switch (condition.op) {
    case 'gt':
      return actual > condition.value;
    case 'gte':
      return actual >= condition.value;
    case 'lt':
      return actual < condition.value;
    case 'lte':
      return actual <= condition.value;
  }
}

/**
 * Pick the delegate for the next window; pure in (rules, fallback, metrics)
 */
export function selectPolicy(
  rules: readonly AdaptiveRule[],
  fallback: DelegatePolicyName,
  metrics: WindowMetrics
): RuleDecision {
  for (const rule of rules) {
    if (rule.when.every((condition) => holds(condition, metrics))) {
      return { policy: rule.policy, rule: rule.name };
    }
  }
  return { policy: fallback, rule: 'fallback' };
}
