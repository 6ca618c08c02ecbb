/**
 * A problem record whose input/output payload cannot be trusted
 */
export class DataIntegrityError extends Error {
  problemId: number | undefined;

  constructor(message: string, opts: { problemId?: number } = {}) {
    super(message);
    this.name = 'DataIntegrityError';
    this.problemId = opts.problemId;
  }
}

/**
 * The candidate process did not finish within its time budget.
 * Assertions turn this into a failed verdict.
 */
export class ExecutionTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Execution timeout after ${timeoutMs}ms: ${command}`);
    this.name = 'ExecutionTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The command could not be started at all (missing interpreter, not executable).
 * Distinct from a wrong answer.
 */
export class ProcessLaunchError extends Error {
  command: string;
  exitCode: number | undefined;

  constructor(message: string, opts: { command: string; exitCode?: number; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = 'ProcessLaunchError';
    this.command = opts.command;
    this.exitCode = opts.exitCode;
  }
}

/**
 * Neither the local cache nor the remote source produced the dataset
 */
export class DatasetUnavailableError extends Error {
  split: string;

  constructor(message: string, opts: { split: string; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = 'DatasetUnavailableError';
    this.split = opts.split;
  }
}
