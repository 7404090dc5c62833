import { z } from 'zod';
import { config } from '../../config/env';
import { InvalidConfigError, InvalidTaskSetError, type SchedulerError } from '../core/errors';
import { DEFAULT_ADAPTIVE_RULES } from '../adaptive/rules';

/**
 * Scheduling algorithm identifiers
 */
export const policyNameSchema = z.enum(['FCFS', 'SJF', 'SRTF', 'EDF', 'RR', 'PRIORITY', 'RMS', 'LLF', 'HYBRID']);

/**
 * Algorithms the adaptive controller may delegate to
 */
export const delegatePolicyNameSchema = z.enum(['FCFS', 'SJF', 'SRTF', 'EDF', 'RR', 'PRIORITY', 'RMS', 'LLF']);

/**
 * Resource request; a bare id is requested before the first unit
 */
export const resourceRequestSchema = z.union([
  z
    .string()
    .min(1)
    .transform((resourceId) => ({ resourceId, at: 0 })),
  z.object({
    resourceId: z.string().min(1),
    /** Executed units after which the resource is needed */
    at: z.number().int().min(0).default(0),
  }),
]);

/**
 * Task descriptor schema
 */
export const taskSchema = z.object({
  id: z.string().min(1),
  arrival: z.number().int().min(0, 'arrival must be >= 0'),
  burst: z.number().int().positive('burst must be > 0'),
  deadline: z.number().min(0).optional(),
  /** Lower value = more urgent */
  priority: z.number().int().default(0),
  period: z.number().int().positive().optional(),
  affinity: z.number().int().min(0).optional(),
  resources: z.array(resourceRequestSchema).default([]),
});

/**
 * Shared resource schema
 */
export const resourceSchema = z.object({
  id: z.string().min(1),
});

/**
 * One comparison inside an adaptive rule
 */
export const ruleConditionSchema = z.object({
  metric: z.enum(['missRate', 'readyQueueLength', 'preemptions', 'burstSpread', 'utilization']),
  op: z.enum(['gt', 'gte', 'lt', 'lte']),
  value: z.number(),
});

/**
 * Adaptive rule: all conditions must hold for the rule to fire
 */
export const adaptiveRuleSchema = z.object({
  name: z.string().min(1),
  policy: delegatePolicyNameSchema,
  when: z.array(ruleConditionSchema).min(1),
});

/**
 * Adaptive controller configuration schema
 */
export const adaptiveConfigSchema = z.object({
  /** Decision window in ticks */
  window: z.number().int().positive().default(5),
  /** Delegate in charge before the first window closes */
  initialPolicy: delegatePolicyNameSchema.default('PRIORITY'),
  /** Ordered rule table, first match wins */
  rules: z.array(adaptiveRuleSchema).min(1, 'adaptive rule table must not be empty').default(DEFAULT_ADAPTIVE_RULES),
  /** Delegate chosen when no rule matches */
  fallback: delegatePolicyNameSchema.default('PRIORITY'),
});

/**
 * Core status (frequency / temperature / power) model schema
 */
export const coreModelSchema = z
  .object({
    /** Sliding window length in ticks */
    window: z.number().int().positive().default(5),
    minFrequency: z.number().positive().default(1.0),
    maxFrequency: z.number().positive().default(3.0),
    ambientTemperature: z.number().default(20),
    maxTemperature: z.number().default(100),
    /** Weight kept by each older slot when heating up, in (0, 1] */
    decay: z.number().gt(0).max(1).default(0.7),
    idlePower: z.number().min(0).default(2),
    busyPowerBase: z.number().min(0).default(5),
    busyPowerPerGHz: z.number().min(0).default(10),
  })
  .refine((model) => model.minFrequency <= model.maxFrequency, {
    message: 'minFrequency must not exceed maxFrequency',
    path: ['minFrequency'],
  })
  .refine((model) => model.ambientTemperature <= model.maxTemperature, {
    message: 'ambientTemperature must not exceed maxTemperature',
    path: ['ambientTemperature'],
  });

/**
 * Simulation configuration schema
 */
export const simulationConfigSchema = z.object({
  policy: policyNameSchema,
  /** Round Robin time slice */
  quantum: z.number().int().positive('quantum must be > 0').default(config.simulation.defaultQuantum),
  /** PRIORITY sub-mode */
  preemptive: z.boolean().default(false),
  cores: z.number().int().min(1).max(64).default(1),
  /** Safety ceiling against non-terminating runs */
  maxTicks: z.number().int().positive().default(config.simulation.maxTicks),
  /** Release periodic tasks until this time */
  horizon: z.number().int().positive().optional(),
  /** Capacity of the live telemetry feed */
  feedCapacity: z.number().int().positive().default(config.simulation.feedCapacity),
  adaptive: adaptiveConfigSchema.default({}),
  coreModel: coreModelSchema.default({}),
});

/**
 * Complete simulation input schema
 */
export const simulationInputSchema = z
  .object({
    tasks: z.array(taskSchema),
    resources: z.array(resourceSchema).default([]),
    config: simulationConfigSchema,
  })
  .superRefine((input, ctx) => {
    const taskIds = new Set<string>();
    input.tasks.forEach((task, index) => {
      if (taskIds.has(task.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'id'],
          message: `duplicate task id "${task.id}"`,
        });
      }
      taskIds.add(task.id);
    });

    const resourceIds = new Set<string>();
    input.resources.forEach((resource, index) => {
      if (resourceIds.has(resource.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['resources', index, 'id'],
          message: `duplicate resource id "${resource.id}"`,
        });
      }
      resourceIds.add(resource.id);
    });

    input.tasks.forEach((task, index) => {
      task.resources.forEach((request, requestIndex) => {
        if (!resourceIds.has(request.resourceId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tasks', index, 'resources', requestIndex],
            message: `unknown resource "${request.resourceId}"`,
          });
        }
        if (request.at >= task.burst) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tasks', index, 'resources', requestIndex, 'at'],
            message: `resource "${request.resourceId}" requested after the task's last unit`,
          });
        }
      });

      const horizon = input.config.horizon;
      if (task.period !== undefined && horizon !== undefined && task.arrival >= horizon) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'arrival'],
          message: `periodic task "${task.id}" first released at ${task.arrival}, at or after horizon ${horizon}`,
        });
      }

      if (task.affinity !== undefined && task.affinity >= input.config.cores) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'affinity'],
          message: `affinity ${task.affinity} outside ${input.config.cores} core(s)`,
        });
      }
    });
  });

/**
 * Validated simulation input
 */
export type SimulationInput = z.infer<typeof simulationInputSchema>;

/**
 * Simulation input as written by callers, before defaults are applied
 */
export type SimulationInputDescriptor = z.input<typeof simulationInputSchema>;

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;

export type AdaptiveConfig = z.infer<typeof adaptiveConfigSchema>;

export type AdaptiveRule = z.infer<typeof adaptiveRuleSchema>;

export type RuleCondition = z.infer<typeof ruleConditionSchema>;

export type CoreModelConfig = z.infer<typeof coreModelSchema>;

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Map zod issues onto the error taxonomy; task and resource problems win
 */
export function toSchedulerError(error: z.ZodError): SchedulerError {
  const taskSetIssues = error.issues.filter((issue) => issue.path[0] === 'tasks' || issue.path[0] === 'resources');
  if (taskSetIssues.length > 0) {
    const issues = taskSetIssues.map(formatIssue);
    return new InvalidTaskSetError(`Invalid task set: ${issues.join('; ')}`, issues);
  }

  const issues = error.issues.map(formatIssue);
  return new InvalidConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
}

/**
 * Validate and parse a simulation input
 */
export function parseSimulationInput(input: unknown): SimulationInput {
  const result = simulationInputSchema.safeParse(input);
  if (!result.success) {
    throw toSchedulerError(result.error);
  }
  return result.data;
}

/**
 * Validate a simulation input without throwing
 */
export function validateSimulationInput(
  input: unknown
): { success: true; data: SimulationInput } | { success: false; error: SchedulerError } {
  const result = simulationInputSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: toSchedulerError(result.error) };
}

/**
 * Task descriptor as written by callers
 */
export type TaskDescriptor = z.input<typeof taskSchema>;
