import type { AppsAssertion } from './assertion';

/**
 * Relative file path -> file contents
 */
export type FilesDict = Record<string, string>;

/**
 * Raw record as it comes out of the APPS dataset
 */
export interface ProblemRecord {
  problem_id: number;
  question: string;
  input_output: string; // JSON: { inputs: string[], outputs: string[] }
  starter_code: string;
}

/**
 * Captured result of a finished process. Streams are kept as raw bytes,
 * decoding is up to the consumer.
 */
export interface ProcessOutput {
  stdout: Uint8Array;
  stderr: Uint8Array;
  exitCode: number;
}

/**
 * A started process
 */
export interface ProcessHandle {
  /**
   * Wait for the process to exit, killing it after `timeoutMs`. The process is
   * already running before this is called and has no time limit until it is;
   * only the first call's timeout applies.
   */
  communicate(timeoutMs: number): Promise<ProcessOutput>;
}

/**
 * Anything able to start a process from a command string.
 * Isolation (container, restricted filesystem, limits) is up to the implementation.
 */
export interface ExecutionEnv {
  popen(command: string): ProcessHandle;
}

/**
 * What an assertion is evaluated against
 */
export interface Assertable {
  env: ExecutionEnv;
}

export interface TaskAssertion {
  label: string; // Not unique: every APPS check is labelled "correct output"
  check: AppsAssertion;
}

export interface Task {
  name: string;
  initialCode: FilesDict;
  command: null; // Each assertion carries its own command
  prompt: string;
  assertions: readonly TaskAssertion[];
}

export interface Benchmark {
  name: string;
  tasks: readonly Task[];
}

/**
 * Controls when temporary workspaces should be cleaned up after a task runs
 * - 'always': Delete the workspace after every task (default)
 * - 'on-failure': Keep workspaces only when the task fails
 * - 'never': Keep all workspaces for inspection
 */
export type TempDirCleanup = 'always' | 'on-failure' | 'never';

export type AssertionStatus = 'passed' | 'failed' | 'error';

export interface AssertionOutcome {
  label: string;
  status: AssertionStatus;
  duration: number; // milliseconds
  error?: string; // Set when status = 'error'
}

export interface TaskResult {
  taskName: string;
  success: boolean;
  vacuous: boolean; // No assertions at all: never counted as a pass
  duration: number;
  outcomes: AssertionOutcome[];
  workingDir?: string; // Only set if the workspace is preserved
  error?: string;
}

export interface BenchmarkResult {
  benchmarkName: string;
  timestamp: string;
  duration: number;
  passRate: number;
  tasks: TaskResult[];
}
