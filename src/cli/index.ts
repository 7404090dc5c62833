import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  CommandHandler,
  type CommandResult,
  type CompareOptions,
  type GenerateOptions,
  type RunOptions,
} from './CommandHandler';
import { validateConfig } from '../../config/env';
import { createLogger } from '../utils/logger';

const logger = createLogger('CLI');

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
}

/**
 * CLI 入口
 */
async function main(): Promise<void> {
  const program = new Command();
  const handler = new CommandHandler();

  program
    .name('rt-sched')
    .description('Real-time CPU scheduling simulator')
    .version('1.0.0');

  // 运行命令
  program
    .command('run <file>')
    .description('Simulate a JSON task set')
    .option('-p, --policy <name>', 'scheduling policy')
    .option('-q, --quantum <units>', 'round robin time slice', parseInteger)
    .option('-c, --cores <count>', 'number of cores', parseInteger)
    .option('--preemptive', 'preemptive PRIORITY scheduling')
    .option('--max-ticks <ticks>', 'tick ceiling', parseInteger)
    .option('--json', 'print the full result as JSON')
    .action(async (file: string, options: RunOptions) => {
      await report(
        handler.handleRun(file, {
          ...options,
          policy: options.policy?.toUpperCase(),
        })
      );
    });

  // 对比命令
  program
    .command('compare <file>')
    .description('Run a task set under several policies')
    .option('--policies <names>', 'comma-separated policies (default: all)', parseList)
    .option('--json', 'print the comparison as JSON')
    .action(async (file: string, options: CompareOptions) => {
      await report(handler.handleCompare(file, options));
    });

  // 生成命令
  program
    .command('generate')
    .description('Print a reproducible synthetic task set')
    .requiredOption('-s, --seed <seed>', 'random seed', parseInteger)
    .option('-n, --count <count>', 'number of tasks', parseInteger, 10)
    .option('--max-arrival <time>', 'latest arrival time', parseInteger)
    .option('--min-burst <units>', 'shortest burst', parseInteger)
    .option('--max-burst <units>', 'longest burst', parseInteger)
    .option('-p, --policy <name>', 'policy written into the config')
    .action(async (options: GenerateOptions) => {
      await report(Promise.resolve(handler.handleGenerate({ ...options, policy: options.policy?.toUpperCase() })));
    });

  // 策略列表命令
  program
    .command('policies')
    .description('List the available scheduling policies')
    .action(async () => {
      await report(Promise.resolve(handler.handlePolicies()));
    });

  // 配置检查命令
  program
    .command('config')
    .description('Check environment configuration')
    .action(async () => {
      await report(Promise.resolve(handler.handleConfig()));
    });

  const validation = validateConfig();
  if (!validation.valid) {
    for (const error of validation.errors) {
      logger.warn(error);
    }
  }

  await program.parseAsync();
}

/**
 * 输出命令结果
 */
async function report(pending: Promise<CommandResult>): Promise<void> {
  const result = await pending;
  if (!result.success) {
    console.error(chalk.red(`\nError: ${result.message}\n`));
    process.exitCode = 1;
  }
}

// 运行主函数
main().catch((error: unknown) => {
  logger.logError(error instanceof Error ? error : new Error(String(error)), 'Fatal error');
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
