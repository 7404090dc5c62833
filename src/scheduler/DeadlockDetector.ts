import { DeadlockUnresolvedError } from '../core/errors';
import type { ResourceGraph } from '../core/ResourceGraph';
import type { TaskView } from '../core/types';
import { createLogger } from '../utils/logger';
import type { DeadlockResolution } from './types';
import { WaitForGraph } from './WaitForGraph';

const logger = createLogger('DeadlockDetector');

/**
 * 死锁检测器
 * Finds wait-for cycles among resource holders and breaks them by preempting
 * the least urgent task of each cycle
 */
export class DeadlockDetector {
  /**
   * Current wait-for cycle, or an empty array
   */
  detect(resources: ResourceGraph): string[] {
    return WaitForGraph.fromEdges(resources.waitForEdges()).findCycle();
  }

  /**
   * Least urgent task: highest priority number, then latest arrival, then greatest id
   */
  chooseVictim(cycle: readonly string[], lookup: (taskId: string) => TaskView): string {
    let victim = lookup(cycle[0]);

    for (const taskId of cycle.slice(1)) {
      const candidate = lookup(taskId);
      if (
        candidate.priority > victim.priority ||
        (candidate.priority === victim.priority &&
          (candidate.arrival > victim.arrival ||
            (candidate.arrival === victim.arrival && candidate.id > victim.id)))
      ) {
        victim = candidate;
      }
    }

    return victim.id;
  }

  /**
   * Break cycles until the wait-for graph is acyclic
   *
   * `preempt` must release every resource the victim holds and withdraw it
   * from all wait queues; it returns the ids of the released resources.
   */
  resolve(
    resources: ResourceGraph,
    lookup: (taskId: string) => TaskView,
    preempt: (victim: string) => string[],
    maxRounds: number
  ): DeadlockResolution[] {
    const resolutions: DeadlockResolution[] = [];
    let cycle = this.detect(resources);

    while (cycle.length > 0) {
      if (resolutions.length >= maxRounds) {
        logger.error('Deadlock resolution made no progress', { cycle });
        throw new DeadlockUnresolvedError(cycle);
      }

      const victim = this.chooseVictim(cycle, lookup);
      logger.info(`Deadlock detected, preempting ${victim}`, { cycle });
      const released = preempt(victim);
      resolutions.push({ cycle, victim, released });

      cycle = this.detect(resources);
    }

    return resolutions;
  }
}
