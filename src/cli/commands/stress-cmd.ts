import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolveStressOptions } from '../../config/resolver.js';
import { WakePolicySchema } from '../../config/schema.js';
import { describeStressFailure, runStress, type StressReport } from '../../stress/runner.js';
import type { StressOptions } from '../../stress/schemas.js';
import { log, print } from '../../utils/logger.js';

interface StressCommandOptions {
  tasks?: number;
  workers?: number;
  holdMs?: number;
  policy?: StressOptions['wakePolicy'];
  json?: boolean;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseMillis(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of milliseconds.');
  }
  return parsed;
}

function parsePolicy(value: string): StressOptions['wakePolicy'] {
  const parsed = WakePolicySchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${WakePolicySchema.options.join(', ')}.`);
  }
  return parsed.data;
}

function listIds(ids: number[]): string {
  return `${ids.slice(0, 20).join(', ')}${ids.length > 20 ? ', …' : ''}`;
}

function printReport(report: StressReport): void {
  const status = report.ok ? chalk.green('✓ passed') : chalk.red('✗ failed');
  print(`\n${chalk.bold('Stress run')} ${status}`);
  print(chalk.gray(`   Mode:          ${report.mode}${report.workers > 0 ? ` (${report.workers} workers)` : ''}`));
  print(chalk.gray(`   Wake policy:   ${report.wakePolicy}`));
  print(chalk.gray(`   Spin:          ${report.spin.maxSpins} spins, parks up to ${report.spin.maxParkMs}ms`));
  print(chalk.gray(`   Tasks:         ${report.tasks}`));
  print(chalk.gray(`   Entries:       ${report.entries}`));
  print(chalk.gray(`   Max writers:   ${report.maxConcurrentWriters}`));
  print(chalk.gray(`   Max readers:   ${report.maxConcurrentReaders}`));
  print(chalk.gray(`   Elapsed:       ${report.elapsedMs}ms`));

  if (report.violations > 0) {
    print(chalk.red(`   Exclusion violations: ${report.violations}`));
  }
  if (report.missing.length > 0) {
    print(chalk.red(`   Missing ids:   ${listIds(report.missing)}`));
  }
  if (report.duplicates.length > 0) {
    print(chalk.red(`   Duplicate ids: ${listIds(report.duplicates)}`));
  }
}

export function registerStressCommand(program: Command): void {
  program
    .command('stress')
    .description('Race writer and reader tasks on one lock and verify every write landed once')
    .option('-t, --tasks <n>', 'number of tasks', parseCount)
    .option('-w, --workers <n>', 'worker threads sharing the lock (0 runs in this thread)', parseCount)
    .option('--hold-ms <ms>', 'time each task holds the lock', parseMillis)
    .option('--policy <policy>', 'wake policy (single|batch-readers)', parsePolicy)
    .option('--json', 'print the report as JSON')
    .action(async (options: StressCommandOptions) => {
      const resolved = resolveStressOptions({
        ...(options.tasks !== undefined ? { tasks: options.tasks } : {}),
        ...(options.workers !== undefined ? { workers: options.workers } : {}),
        ...(options.holdMs !== undefined ? { holdMs: options.holdMs } : {}),
        ...(options.policy !== undefined ? { wakePolicy: options.policy } : {}),
      });

      const spinner = options.json || log.isQuiet() ? null : ora(`Running ${resolved.tasks} tasks...`).start();

      let report: StressReport;
      try {
        report = await runStress(resolved);
      } catch (error) {
        spinner?.fail(describeStressFailure(error));
        throw error;
      }

      if (options.json) {
        print(JSON.stringify(report, null, 2));
      } else {
        if (report.ok) {
          spinner?.succeed('Stress run finished');
        } else {
          spinner?.fail('Stress run finished with errors');
        }
        printReport(report);
      }

      if (!report.ok) {
        process.exitCode = 1;
      }
    });
}
