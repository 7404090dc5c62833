import { z } from 'zod';
import type { TaskDescriptor } from '../config/schema';
import { InvalidConfigError } from '../core/errors';
import { createRNG, randomInt } from '../utils/random';

/**
 * Synthetic workload parameters
 */
export const workloadOptionsSchema = z
  .object({
    seed: z.number().int(),
    count: z.number().int().positive(),
    /** Arrivals are drawn from [0, maxArrival] */
    maxArrival: z.number().int().min(0).default(20),
    minBurst: z.number().int().positive().default(1),
    maxBurst: z.number().int().positive().default(8),
    /** Priorities are drawn from [0, priorityLevels) */
    priorityLevels: z.number().int().positive().default(5),
    /** Share of tasks that receive a deadline */
    deadlineProbability: z.number().min(0).max(1).default(1),
    /** Deadlines fall within burst x [1, slack] after arrival */
    slack: z.number().min(1).default(2),
  })
  .refine((options) => options.minBurst <= options.maxBurst, {
    message: 'minBurst must not exceed maxBurst',
    path: ['minBurst'],
  });

export type WorkloadOptions = z.input<typeof workloadOptionsSchema>;

/**
 * Build a reproducible task set: the same options always give the same tasks
 */
export function generateWorkload(options: WorkloadOptions): TaskDescriptor[] {
  const parsed = workloadOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigError(`Invalid workload options: ${issues.join('; ')}`, issues);
  }

  const { seed, count, maxArrival, minBurst, maxBurst, priorityLevels, deadlineProbability, slack } = parsed.data;
  const rng = createRNG(seed);
  const tasks: TaskDescriptor[] = [];

  for (let i = 0; i < count; i++) {
    const arrival = randomInt(rng, 0, maxArrival);
    const burst = randomInt(rng, minBurst, maxBurst);
    const priority = randomInt(rng, 0, priorityLevels - 1);
    const task: TaskDescriptor = { id: `T${i + 1}`, arrival, burst, priority };

    if (rng() < deadlineProbability) {
      task.deadline = arrival + Math.ceil(burst * (1 + rng() * (slack - 1)));
    }
    tasks.push(task);
  }

  return tasks.sort((a, b) => a.arrival - b.arrival);
}
