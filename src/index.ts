// Benchmark loading
export { loadApps, assembleBenchmark, APPS_SPLIT, type LoadAppsOptions } from './load';
export {
  DatasetLoader,
  HuggingFaceRowsSource,
  APPS_DATASET_ID,
  type RemoteDatasetSource,
  type DatasetLoaderOptions,
  type HuggingFaceRowsSourceOptions,
} from './dataset';
export { Problem, decodeInputOutput } from './problem';
export { buildTask, buildPrompt, buildRunCommand, quoteShellArgument, ASSERTION_LABEL } from './tasks';

// Assertions and execution
export { AppsAssertion, normalizeOutput, DEFAULT_TIMEOUT_MS, type EvaluateOptions } from './assertion';
export { LocalExecutionEnv, type LocalExecutionEnvOptions } from './execution-env';

// Running
export {
  runTask,
  runBenchmark,
  prepareWorkspace,
  type RunTaskOptions,
  type BenchmarkRunConfig,
} from './runner';

// Configuration
export {
  resolveAppsConfig,
  loadDefaultProblemIds,
  BENCHMARK_NAME,
  DEFAULT_MAX_ASSERTIONS,
  DEFAULT_ENTRYPOINT,
  DEFAULT_INTERPRETER,
  type AppsConfig,
} from './config';

// Errors
export {
  DataIntegrityError,
  ExecutionTimeoutError,
  ProcessLaunchError,
  DatasetUnavailableError,
} from './errors';

// User-facing types
export type {
  Assertable,
  AssertionOutcome,
  AssertionStatus,
  Benchmark,
  BenchmarkResult,
  ExecutionEnv,
  FilesDict,
  ProblemRecord,
  ProcessHandle,
  ProcessOutput,
  Task,
  TaskAssertion,
  TaskResult,
  TempDirCleanup,
} from './types';
