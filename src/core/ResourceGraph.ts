import type { Resource, ResourceSpec } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('ResourceGraph');

/**
 * Outcome of a resource request
 */
export type AcquireResult = { granted: true } | { granted: false; holder: string };

/**
 * 资源图
 * Mutual-exclusion resources with a single holder and a FIFO wait queue each
 */
export class ResourceGraph {
  private resources: Map<string, Resource> = new Map();

  constructor(specs: readonly ResourceSpec[] = []) {
    for (const spec of specs) {
      this.resources.set(spec.id, { id: spec.id, holder: null, waitQueue: [] });
    }
  }

  has(resourceId: string): boolean {
    return this.resources.has(resourceId);
  }

  /**
   * Get a resource, failing on unknown ids
   */
  get(resourceId: string): Resource {
    const resource = this.resources.get(resourceId);
    if (!resource) {
      throw new Error(`Unknown resource: ${resourceId}`);
    }
    return resource;
  }

  /**
   * Grant the resource or queue the requester behind the current holder
   */
  request(resourceId: string, taskId: string): AcquireResult {
    const resource = this.get(resourceId);

    if (resource.holder === null || resource.holder === taskId) {
      resource.holder = taskId;
      logger.debug(`Resource ${resourceId} granted to ${taskId}`);
      return { granted: true };
    }

    if (!resource.waitQueue.includes(taskId)) {
      resource.waitQueue.push(taskId);
    }
    logger.debug(`Task ${taskId} waits for ${resourceId} held by ${resource.holder}`);
    return { granted: false, holder: resource.holder };
  }

  /**
   * Release a resource and hand it to the head of its wait queue
   * @returns id of the new holder, or null when nobody was waiting
   */
  release(resourceId: string, taskId: string): string | null {
    const resource = this.get(resourceId);
    if (resource.holder !== taskId) {
      logger.warn(`Task ${taskId} released ${resourceId} it does not hold`);
      return null;
    }

    const next = resource.waitQueue.shift() ?? null;
    resource.holder = next;
    if (next !== null) {
      logger.debug(`Resource ${resourceId} handed from ${taskId} to ${next}`);
    }
    return next;
  }

  /**
   * Remove a task from every wait queue
   */
  withdraw(taskId: string): void {
    for (const resource of this.resources.values()) {
      resource.waitQueue = resource.waitQueue.filter((waiting) => waiting !== taskId);
    }
  }

  /**
   * Wait-for edges (waiter, holder) in resource declaration order
   */
  waitForEdges(): Array<[string, string]> {
    const edges: Array<[string, string]> = [];
    for (const resource of this.resources.values()) {
      if (resource.holder === null) {
        continue;
      }
      for (const waiter of resource.waitQueue) {
        edges.push([waiter, resource.holder]);
      }
    }
    return edges;
  }

  /**
   * Detached copies of every resource
   */
  snapshot(): Resource[] {
    return Array.from(this.resources.values(), (resource) => ({
      id: resource.id,
      holder: resource.holder,
      waitQueue: [...resource.waitQueue],
    }));
  }
}
