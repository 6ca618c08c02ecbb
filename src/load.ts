import { BENCHMARK_NAME, resolveAppsConfig, type AppsConfig } from './config';
import { DatasetLoader, HuggingFaceRowsSource, type RemoteDatasetSource } from './dataset';
import { DataIntegrityError } from './errors';
import { Problem } from './problem';
import { buildTask } from './tasks';
import type { Benchmark, ProblemRecord, Task } from './types';

export const APPS_SPLIT = 'test';

/**
 * Filters records down to the configured problem ids and builds one task per problem
 */
export function assembleBenchmark(
  records: readonly ProblemRecord[],
  config: AppsConfig
): Benchmark {
  const selected = new Set(config.problemIds);
  const seen = new Set<number>();
  const tasks: Task[] = [];

  for (const record of records) {
    if (!selected.has(record.problem_id)) continue;

    if (seen.has(record.problem_id)) {
      throw new DataIntegrityError(`Problem ${record.problem_id} appears more than once`, {
        problemId: record.problem_id,
      });
    }
    seen.add(record.problem_id);

    let problem: Problem;
    try {
      problem = Problem.fromRecord(record);
    } catch (error) {
      if (config.skipInvalidProblems && error instanceof DataIntegrityError) {
        console.warn(`Skipping problem ${record.problem_id}: ${error.message}`);
        continue;
      }
      throw error;
    }

    const task = buildTask(problem, config);
    if (task.assertions.length === 0) {
      console.warn(`[Task ${task.name}] No test cases, the task has no assertions`);
    }
    tasks.push(task);
  }

  if (config.verbose) {
    console.log(`Built ${tasks.length} task(s) from ${selected.size} selected problem id(s)`);
  }

  return {
    name: BENCHMARK_NAME,
    tasks: Object.freeze(tasks),
  };
}

export interface LoadAppsOptions {
  config?: Partial<AppsConfig>;
  remote?: RemoteDatasetSource; // Default: Hugging Face datasets-server
}

/**
 * Loads the APPS benchmark, which consists of a series of coding problems
 */
export async function loadApps(options: LoadAppsOptions = {}): Promise<Benchmark> {
  const config = resolveAppsConfig(options.config);
  const loader = new DatasetLoader({
    cacheDir: config.cacheDir,
    remote: options.remote ?? new HuggingFaceRowsSource(),
  });

  const records = await loader.load(APPS_SPLIT);
  return assembleBenchmark(records, config);
}
