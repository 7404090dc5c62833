import type { SimulationInputDescriptor } from '../config/schema';
import { SimulationDivergenceError } from '../core/errors';
import { RunStatus, type MetricsSnapshot, type PolicyName } from '../core/types';
import { createLogger } from '../utils/logger';
import { simulate } from './Simulation';

const logger = createLogger('Compare');

/**
 * Outcome of one policy in a comparison
 */
export interface ComparisonEntry {
  policy: PolicyName;
  status: RunStatus;
  metrics: MetricsSnapshot;
}

/**
 * Run the same input under each policy, in the order given
 *
 * A run that hits the tick ceiling is reported with its partial metrics
 * instead of aborting the comparison.
 */
export function compareAlgorithms(
  input: SimulationInputDescriptor,
  policies: readonly PolicyName[]
): ComparisonEntry[] {
  return policies.map((policy) => {
    try {
      const result = simulate({ ...input, config: { ...input.config, policy } });
      return { policy, status: result.status, metrics: result.metrics };
    } catch (error) {
      if (error instanceof SimulationDivergenceError) {
        logger.warn(`${policy} diverged after ${error.maxTicks} ticks`);
        return { policy, status: RunStatus.DIVERGED, metrics: error.partial.metrics };
      }
      throw error;
    }
  });
}
