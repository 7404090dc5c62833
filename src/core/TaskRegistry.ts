import type { RuntimeTask, TaskSpec } from './types';
import { TaskState } from './types';
import { InvalidTaskSetError } from './errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('TaskRegistry');

/**
 * Expand a periodic task into its jobs released before `horizon`
 */
export function expandPeriodic(spec: TaskSpec, horizon: number | undefined): TaskSpec[] {
  if (spec.period === undefined || horizon === undefined) {
    return [spec];
  }

  const period = spec.period;
  const jobs: TaskSpec[] = [];
  for (let k = 0; spec.arrival + k * period < horizon; k++) {
    const release = spec.arrival + k * period;
    jobs.push({
      ...spec,
      id: `${spec.id}#${k}`,
      arrival: release,
      deadline: spec.deadline !== undefined ? spec.deadline + k * period : release + period,
      resources: spec.resources.map((request) => ({ ...request })),
    });
  }
  return jobs;
}

/**
 * 任务注册表
 * Owns the task descriptors of a run and their mutable runtime state
 */
export class TaskRegistry {
  private taskMap: Map<string, RuntimeTask> = new Map();

  constructor(specs: readonly TaskSpec[], horizon?: number) {
    for (const spec of specs) {
      for (const job of expandPeriodic(spec, horizon)) {
        if (this.taskMap.has(job.id)) {
          throw new InvalidTaskSetError(`Task with id ${job.id} already exists`, [`tasks: duplicate task id "${job.id}"`]);
        }
        this.taskMap.set(job.id, {
          ...job,
          resources: job.resources.map((request) => ({ ...request })),
          state: TaskState.PENDING,
          remaining: job.burst,
          executed: 0,
          core: null,
          firstStart: null,
          completion: null,
          deadlineMissed: false,
          held: [],
        });
      }
    }
    logger.debug(`Registered ${this.taskMap.size} task(s) from ${specs.length} descriptor(s)`);
  }

  /**
   * Get a task, failing on unknown ids
   */
  get(taskId: string): RuntimeTask {
    const task = this.taskMap.get(taskId);
    if (!task) {
      throw new Error(`Unknown task: ${taskId}`);
    }
    return task;
  }

  has(taskId: string): boolean {
    return this.taskMap.has(taskId);
  }

  /**
   * All tasks in registration order
   */
  getAllTasks(): RuntimeTask[] {
    return Array.from(this.taskMap.values());
  }

  /**
   * Tasks in one lifecycle state, in registration order
   */
  inState(state: TaskState): RuntimeTask[] {
    return this.getAllTasks().filter((task) => task.state === state);
  }

  getTotalCount(): number {
    return this.taskMap.size;
  }

  isAllCompleted(): boolean {
    return this.getAllTasks().every((task) => task.state === TaskState.COMPLETED);
  }

  /**
   * Detached copies of every task
   */
  snapshot(): RuntimeTask[] {
    return this.getAllTasks().map((task) => ({
      ...task,
      resources: task.resources.map((request) => ({ ...request })),
      held: [...task.held],
    }));
  }
}
