import dotenv from 'dotenv';

// 加载环境变量
dotenv.config();

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const POLICY_NAMES = ['FCFS', 'SJF', 'SRTF', 'EDF', 'RR', 'PRIORITY', 'RMS', 'LLF', 'HYBRID'] as const;

type EnvLogLevel = (typeof LOG_LEVELS)[number];

function readLogLevel(value: string | undefined): EnvLogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'warn';
}

/**
 * 环境变量配置
 * Process-wide defaults; a simulation input always overrides them
 */
export const config = {
  logging: {
    level: readLogLevel(process.env.SCHED_LOG_LEVEL),
  },

  simulation: {
    maxTicks: parseInt(process.env.SCHED_MAX_TICKS || '100000', 10),
    feedCapacity: parseInt(process.env.SCHED_FEED_CAPACITY || '256', 10),
    defaultPolicy: process.env.SCHED_DEFAULT_POLICY || 'FCFS',
    defaultQuantum: parseInt(process.env.SCHED_DEFAULT_QUANTUM || '2', 10),
  },
} as const;

/**
 * 验证环境变量
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.simulation.maxTicks) || config.simulation.maxTicks <= 0) {
    errors.push('SCHED_MAX_TICKS must be a positive integer');
  }
  if (!Number.isInteger(config.simulation.feedCapacity) || config.simulation.feedCapacity <= 0) {
    errors.push('SCHED_FEED_CAPACITY must be a positive integer');
  }
  if (!POLICY_NAMES.some((name) => name === config.simulation.defaultPolicy)) {
    errors.push(`SCHED_DEFAULT_POLICY must be one of ${POLICY_NAMES.join(', ')}`);
  }
  if (!Number.isInteger(config.simulation.defaultQuantum) || config.simulation.defaultQuantum <= 0) {
    errors.push('SCHED_DEFAULT_QUANTUM must be a positive integer');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export type Config = typeof config;
