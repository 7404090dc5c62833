import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { z } from 'zod';
import { config, validateConfig } from '../../config/env';
import { parseSimulationInput, policyNameSchema, type SimulationInput } from '../config/schema';
import { RunStatus, type ExecutionInterval, type MetricsSnapshot, type SimulationResult } from '../core/types';
import { compareAlgorithms, type ComparisonEntry } from '../engine/compare';
import { simulate } from '../engine/Simulation';
import { POLICY_DESCRIPTIONS } from '../policies/PolicyFactory';
import { createLogger } from '../utils/logger';
import { generateWorkload } from '../workload/generator';

const logger = createLogger('CommandHandler');

/**
 * 命令处理结果
 */
export interface CommandResult {
  success: boolean;
  message: string;
  data?: unknown;
}

/**
 * Overrides applied on top of the input file's config
 */
export interface RunOptions {
  policy?: string;
  quantum?: number;
  cores?: number;
  preemptive?: boolean;
  maxTicks?: number;
  json?: boolean;
}

export interface CompareOptions {
  policies?: string[];
  json?: boolean;
}

export interface GenerateOptions {
  seed: number;
  count: number;
  maxArrival?: number;
  minBurst?: number;
  maxBurst?: number;
  policy?: string;
}

/**
 * Top-level shape of an input file; the simulation schema checks the rest
 */
const inputFileSchema = z
  .object({
    tasks: z.array(z.unknown()),
    resources: z.array(z.unknown()).optional(),
    config: z.record(z.string(), z.unknown()).default({}),
  })
  .passthrough();

const ALL_POLICIES = policyNameSchema.options;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * 命令处理器
 * Turns CLI arguments into simulation runs and prints their summaries
 */
export class CommandHandler {
  /**
   * Load a task set file and apply command-line overrides
   */
  async loadInput(file: string, overrides: Record<string, unknown> = {}): Promise<SimulationInput> {
    const text = await readFile(file, 'utf-8');
    const document = inputFileSchema.parse(JSON.parse(text));
    return parseSimulationInput({
      ...document,
      config: {
        policy: config.simulation.defaultPolicy,
        ...document.config,
        ...definedEntries(overrides),
      },
    });
  }

  /**
   * 处理 run 命令 - 运行一次仿真
   */
  async handleRun(file: string, options: RunOptions = {}): Promise<CommandResult> {
    try {
      const input = await this.loadInput(file, {
        policy: options.policy,
        quantum: options.quantum,
        cores: options.cores,
        preemptive: options.preemptive,
        maxTicks: options.maxTicks,
      });
      const result = simulate(input);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        this.printResult(result);
      }

      return {
        success: result.status === RunStatus.COMPLETED,
        message: `${result.policy} finished with status ${result.status}`,
        data: result,
      };
    } catch (error) {
      logger.debug('run failed', { file, error: errorMessage(error) });
      return {
        success: false,
        message: `Run failed: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * 处理 compare 命令 - 多策略对比
   */
  async handleCompare(file: string, options: CompareOptions = {}): Promise<CommandResult> {
    try {
      const requested = options.policies ?? ALL_POLICIES;
      const policies = z.array(policyNameSchema).parse(requested);
      const input = await this.loadInput(file);
      const entries = compareAlgorithms(input, policies);

      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
      } else {
        this.printComparison(entries);
      }

      return {
        success: true,
        message: `Compared ${entries.length} policies`,
        data: entries,
      };
    } catch (error) {
      return {
        success: false,
        message: `Compare failed: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * 处理 generate 命令 - 生成可复现的任务集
   */
  handleGenerate(options: GenerateOptions): CommandResult {
    try {
      const policy = policyNameSchema.parse(options.policy ?? config.simulation.defaultPolicy);
      const tasks = generateWorkload({
        seed: options.seed,
        count: options.count,
        maxArrival: options.maxArrival,
        minBurst: options.minBurst,
        maxBurst: options.maxBurst,
      });
      const document = { tasks, config: { policy } };

      console.log(JSON.stringify(document, null, 2));

      return {
        success: true,
        message: `Generated ${tasks.length} tasks`,
        data: document,
      };
    } catch (error) {
      return {
        success: false,
        message: `Generate failed: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * 处理 policies 命令
   */
  handlePolicies(): CommandResult {
    console.log(chalk.cyan('\n📖 Scheduling Policies\n'));
    for (const policy of ALL_POLICIES) {
      console.log(`  ${chalk.white(policy.padEnd(9))} ${chalk.gray(POLICY_DESCRIPTIONS[policy])}`);
    }
    console.log('');

    return {
      success: true,
      message: `${ALL_POLICIES.length} policies available`,
      data: ALL_POLICIES.map((policy) => ({ policy, description: POLICY_DESCRIPTIONS[policy] })),
    };
  }

  /**
   * 处理 config 命令
   */
  handleConfig(): CommandResult {
    const validation = validateConfig();

    console.log(chalk.cyan('\n⚙️ Configuration\n'));
    console.log(chalk.white(`  Log level:      ${config.logging.level}`));
    console.log(chalk.white(`  Max ticks:      ${config.simulation.maxTicks}`));
    console.log(chalk.white(`  Feed capacity:  ${config.simulation.feedCapacity}`));
    console.log(chalk.white(`  Default policy: ${config.simulation.defaultPolicy}`));
    console.log(chalk.white(`  Default quantum: ${config.simulation.defaultQuantum}`));
    console.log(chalk.white(`  Valid: ${validation.valid ? chalk.green('Yes') : chalk.red('No')}`));

    if (!validation.valid) {
      console.log(chalk.red(`  Errors:`));
      for (const error of validation.errors) {
        console.log(chalk.red(`    - ${error}`));
      }
    }

    console.log('');

    return {
      success: validation.valid,
      message: validation.valid ? 'Configuration is valid' : 'Configuration has errors',
      data: validation,
    };
  }

  /**
   * 打印仿真结果
   */
  private printResult(result: SimulationResult): void {
    console.log(chalk.cyan(`\n📊 Simulation Summary (${result.policy})\n`));
    console.log(`  Status: ${this.formatStatus(result.status)}`);
    console.log('');

    console.log(chalk.white('  Timeline'));
    for (const interval of result.timeline) {
      console.log(`    ${this.formatInterval(interval)}`);
    }
    console.log('');

    this.printMetrics(result.metrics);
  }

  /**
   * 打印指标
   */
  private printMetrics(metrics: MetricsSnapshot): void {
    console.log(chalk.white('  Metrics'));
    console.log(chalk.white(`    Total time:        ${metrics.totalTime}`));
    console.log(chalk.white(`    Completed:         ${metrics.completedTasks}/${metrics.tasks.length}`));
    console.log(chalk.white(`    Utilization:       ${this.formatPercent(metrics.utilization)}`));
    console.log(chalk.white(`    Throughput:        ${metrics.throughput.toFixed(3)} tasks/tick`));
    console.log(chalk.white(`    Avg waiting:       ${metrics.averageWaiting.toFixed(2)}`));
    console.log(chalk.white(`    Avg turnaround:    ${metrics.averageTurnaround.toFixed(2)}`));
    console.log(chalk.white(`    Avg response:      ${metrics.averageResponse.toFixed(2)}`));
    const missedColor = metrics.missedDeadlines > 0 ? chalk.red : chalk.green;
    console.log(missedColor(`    Missed deadlines:  ${metrics.missedDeadlines}`));
    console.log(chalk.white(`    Preemptions:       ${metrics.preemptions}`));
    console.log(chalk.white(`    Context switches:  ${metrics.contextSwitches}`));
    console.log(chalk.white(`    Energy:            ${metrics.energy.toFixed(1)} J`));
    console.log(chalk.white(`    Peak temperature:  ${metrics.peakTemperature.toFixed(1)} °C`));
    console.log('');
  }

  /**
   * 打印对比表
   */
  private printComparison(entries: ComparisonEntry[]): void {
    console.log(chalk.cyan('\n📊 Policy Comparison\n'));
    console.log(chalk.gray('  Policy     Status      Wait    Turnaround  Response  Util     Missed  Energy'));

    for (const { policy, status, metrics } of entries) {
      const row = [
        policy.padEnd(10),
        status.padEnd(11),
        metrics.averageWaiting.toFixed(2).padStart(6),
        metrics.averageTurnaround.toFixed(2).padStart(11),
        metrics.averageResponse.toFixed(2).padStart(9),
        this.formatPercent(metrics.utilization).padStart(7),
        String(metrics.missedDeadlines).padStart(7),
        metrics.energy.toFixed(1).padStart(8),
      ].join(' ');
      console.log(`  ${status === RunStatus.COMPLETED ? chalk.white(row) : chalk.yellow(row)}`);
    }

    console.log('');
  }

  /**
   * 格式化区间
   */
  private formatInterval(interval: ExecutionInterval): string {
    const span = `[${interval.start}-${interval.end})`.padEnd(10);
    const label = interval.taskId === null ? chalk.gray('idle') : chalk.white(interval.taskId);
    return `core ${interval.core}  ${span} ${label} ${chalk.gray(interval.reason)}`;
  }

  /**
   * 格式化状态
   */
  private formatStatus(status: RunStatus): string {
    const statusMap: Record<RunStatus, string> = {
      [RunStatus.RUNNING]: chalk.blue('Running'),
      [RunStatus.COMPLETED]: chalk.green('Completed'),
      [RunStatus.CANCELLED]: chalk.yellow('Cancelled'),
      [RunStatus.DIVERGED]: chalk.red('Diverged'),
    };

    return statusMap[status];
  }

  private formatPercent(value: number): string {
    return `${(value * 100).toFixed(1)}%`;
  }
}
