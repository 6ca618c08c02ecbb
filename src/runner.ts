import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { DEFAULT_TIMEOUT_MS } from './assertion';
import { ProcessLaunchError } from './errors';
import { LocalExecutionEnv } from './execution-env';
import type {
  Assertable,
  AssertionOutcome,
  Benchmark,
  BenchmarkResult,
  FilesDict,
  Task,
  TaskResult,
  TempDirCleanup,
} from './types';

export interface RunTaskOptions {
  timeoutMs?: number; // Default: 2000ms per assertion
  verbose?: boolean; // Default: false
}

export interface BenchmarkRunConfig extends RunTaskOptions {
  /** Files produced by the model for a task, written over the task's initial code */
  candidate: (task: Task) => FilesDict | Promise<FilesDict>;
  tempDirCleanup?: TempDirCleanup; // Default: 'always'
  env?: Record<string, string>; // Extra environment variables for candidate processes
}

/**
 * Writes the task's initial code, overlaid with the candidate files, to a fresh temp directory
 */
export async function prepareWorkspace(task: Task, candidateFiles: FilesDict): Promise<string> {
  const workingDir = path.join(os.tmpdir(), `apps-${randomUUID()}`);
  const files: FilesDict = { ...task.initialCode, ...candidateFiles };

  // Check every path before the directory exists, so a rejection leaves nothing behind
  const targets = Object.entries(files).map(([relativePath, contents]) => {
    const target = path.resolve(workingDir, relativePath);
    if (!target.startsWith(workingDir + path.sep)) {
      throw new Error(`Refusing to write ${relativePath} outside of ${workingDir}`);
    }
    return { target, contents };
  });

  try {
    for (const { target, contents } of targets) {
      await fs.outputFile(target, contents, 'utf-8');
    }
  } catch (error) {
    await fs.remove(workingDir);
    throw error;
  }

  return workingDir;
}

/**
 * Evaluates a task's assertions one after another, in order.
 * A check that cannot be launched is recorded as 'error' and does not stop its siblings.
 */
export async function runTask(
  task: Task,
  assertable: Assertable,
  options: RunTaskOptions = {}
): Promise<TaskResult> {
  const startTime = Date.now();
  const outcomes: AssertionOutcome[] = [];

  if (task.assertions.length === 0) {
    console.warn(`[Task ${task.name}] No assertions to evaluate, not counting as a pass`);
  }

  for (const [index, { label, check }] of task.assertions.entries()) {
    const checkStart = Date.now();
    try {
      const passed = await check.evaluate(assertable, {
        timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        verbose: options.verbose,
      });
      outcomes.push({
        label,
        status: passed ? 'passed' : 'failed',
        duration: Date.now() - checkStart,
      });
    } catch (error) {
      if (!(error instanceof ProcessLaunchError)) throw error;
      console.error(`[Task ${task.name}] [${index}] ${error.message}`);
      outcomes.push({
        label,
        status: 'error',
        duration: Date.now() - checkStart,
        error: error.message,
      });
    }

    if (options.verbose) {
      const outcome = outcomes[outcomes.length - 1];
      console.log(`[Task ${task.name}]   ${index} ${label}: ${outcome.status}`);
    }
  }

  const vacuous = outcomes.length === 0;
  return {
    taskName: task.name,
    success: !vacuous && outcomes.every((o) => o.status === 'passed'),
    vacuous,
    duration: Date.now() - startTime,
    outcomes,
  };
}

function shouldCleanup(policy: TempDirCleanup, result: TaskResult): boolean {
  switch (policy) {
    case 'always':
      return true;
    case 'on-failure':
      return result.success;
    case 'never':
      return false;
    default:
      // TypeScript exhaustiveness check
      const _exhaustive: never = policy;
      throw new Error(`Unknown tempDirCleanup policy: ${_exhaustive}`);
  }
}

/**
 * Runs a single task inside its own workspace
 */
async function runTaskInWorkspace(task: Task, config: BenchmarkRunConfig): Promise<TaskResult> {
  const startTime = Date.now();
  const cleanup = config.tempDirCleanup ?? 'always';
  let workingDir: string | undefined;
  let result: TaskResult;

  try {
    const candidateFiles = await config.candidate(task);
    workingDir = await prepareWorkspace(task, candidateFiles);
    if (config.verbose) {
      console.log(`[Task ${task.name}] Workspace prepared at ${workingDir}`);
    }

    const env = new LocalExecutionEnv(workingDir, { env: config.env });
    result = await runTask(task, { env }, config);
  } catch (error) {
    result = {
      taskName: task.name,
      success: false,
      vacuous: false,
      duration: Date.now() - startTime,
      outcomes: [],
      error: error instanceof Error ? error.message : String(error),
    };
  }

  if (workingDir) {
    if (shouldCleanup(cleanup, result)) {
      await fs.remove(workingDir);
    } else {
      console.log(`[Task ${task.name}] Workspace preserved at ${workingDir}`);
      result.workingDir = workingDir;
    }
  }

  return result;
}

/**
 * Runs every task of a benchmark sequentially and prints a summary
 */
export async function runBenchmark(
  benchmark: Benchmark,
  config: BenchmarkRunConfig
): Promise<BenchmarkResult> {
  const startTime = Date.now();
  console.log(`\nRunning benchmark "${benchmark.name}" with ${benchmark.tasks.length} task(s)...\n`);

  const results: TaskResult[] = [];
  for (const task of benchmark.tasks) {
    const result = await runTaskInWorkspace(task, config);
    results.push(result);

    const passed = result.outcomes.filter((o) => o.status === 'passed').length;
    console.log(
      `[Task ${task.name}] ${result.success ? '✓ PASSED' : '✗ FAILED'} ` +
        `(${passed}/${result.outcomes.length} assertions) in ${(result.duration / 1000).toFixed(2)}s` +
        (result.error ? ` - ${result.error}` : '')
    );
  }

  const duration = Date.now() - startTime;
  const passRate =
    results.length > 0 ? results.filter((r) => r.success).length / results.length : 0;
  const vacuousTasks = results.filter((r) => r.vacuous);
  const erroredOutcomes = results.reduce(
    (acc, r) => acc + r.outcomes.filter((o) => o.status === 'error').length,
    0
  );

  console.log('\n' + '='.repeat(60));
  console.log('BENCHMARK SUMMARY');
  console.log('='.repeat(60));
  console.log(`Benchmark: ${benchmark.name}`);
  console.log(`Total Duration: ${(duration / 1000).toFixed(2)}s`);
  console.log(`Tasks: ${results.length}`);
  console.log(`Pass Rate: ${(passRate * 100).toFixed(1)}%`);
  if (erroredOutcomes > 0) {
    console.log(`Assertions that could not run: ${erroredOutcomes}`);
  }
  if (vacuousTasks.length > 0) {
    console.log(
      `Tasks without assertions (not scored as passes): ${vacuousTasks
        .map((r) => r.taskName)
        .join(', ')}`
    );
  }
  console.log('='.repeat(60) + '\n');

  return {
    benchmarkName: benchmark.name,
    timestamp: new Date().toISOString(),
    duration,
    passRate,
    tasks: results,
  };
}
