import type { AdaptiveConfig } from '../config/schema';
import type { DelegatePolicyName } from '../core/types';
import type { HybridPolicy } from '../policies/HybridPolicy';
import { createLogger } from '../utils/logger';
import { selectPolicy, type WindowMetrics } from './rules';

const logger = createLogger('AdaptiveController');

/**
 * What the engine reports after each tick
 */
export interface TickSample {
  /** Cores that executed a unit */
  busyCores: number;
  cores: number;
  /** Preemptions and quantum expiries during the tick */
  preemptions: number;
  /** Tasks flagged as missing their deadline during the tick */
  missed: readonly string[];
  /** Admitted, incomplete tasks that carry a deadline */
  deadlineTasks: readonly string[];
}

/**
 * A delegate change decided at a window boundary
 */
export interface PolicyChange {
  from: DelegatePolicyName;
  to: DelegatePolicyName;
  rule: string;
  metrics: WindowMetrics;
}

function coefficientOfVariation(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  if (mean === 0) {
    return 0;
  }
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance) / mean;
}

/**
 * 自适应控制器
 * Accumulates one decision window of tick samples and, at each boundary,
 * lets the rule table pick the delegate the hybrid policy forwards to.
 */
export class AdaptiveController {
  private windowStart = 0;
  private busyCoreTicks = 0;
  private coreTicks = 0;
  private preemptions = 0;
  private missed = new Set<string>();
  private active = new Set<string>();
  private lastMetrics: WindowMetrics | null = null;

  constructor(
    private readonly hybrid: HybridPolicy,
    private readonly config: AdaptiveConfig
  ) {
    hybrid.assign(config.initialPolicy);
  }

  /**
   * Decision window length in ticks
   */
  get window(): number {
    return this.config.window;
  }

  get current(): DelegatePolicyName {
    return this.hybrid.current;
  }

  observe(sample: TickSample): void {
    this.busyCoreTicks += sample.busyCores;
    this.coreTicks += sample.cores;
    this.preemptions += sample.preemptions;
    sample.missed.forEach((taskId) => this.missed.add(taskId));
    sample.deadlineTasks.forEach((taskId) => this.active.add(taskId));
  }

  /**
   * Close the window ending at `time` and apply the rule table
   * @param readyRemaining remaining work of every ready task at the boundary
   * @returns the change, or null when the current delegate stays in charge
   */
  evaluate(time: number, readyRemaining: readonly number[]): PolicyChange | null {
    const population = new Set([...this.active, ...this.missed]);
    const metrics: WindowMetrics = {
      windowStart: this.windowStart,
      windowEnd: time,
      readyQueueLength: readyRemaining.length,
      missRate: this.missed.size / Math.max(1, population.size),
      preemptions: this.preemptions,
      burstSpread: coefficientOfVariation(readyRemaining),
      utilization: this.coreTicks > 0 ? this.busyCoreTicks / this.coreTicks : 0,
    };
    this.lastMetrics = metrics;
    this.reset(time);

    const decision = selectPolicy(this.config.rules, this.config.fallback, metrics);
    const from = this.hybrid.current;
    if (decision.policy === from) {
      return null;
    }

    this.hybrid.assign(decision.policy);
    logger.info(`Switching ${from} -> ${decision.policy} at t=${time}`, { rule: decision.rule });
    return { from, to: decision.policy, rule: decision.rule, metrics };
  }

  /**
   * Metrics of the most recently closed window
   */
  getLastMetrics(): WindowMetrics | null {
    return this.lastMetrics;
  }

  private reset(time: number): void {
    this.windowStart = time;
    this.busyCoreTicks = 0;
    this.coreTicks = 0;
    this.preemptions = 0;
    this.missed.clear();
    this.active.clear();
  }
}
