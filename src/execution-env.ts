import { execa } from 'execa';
import { ExecutionTimeoutError, ProcessLaunchError } from './errors';
import type { ExecutionEnv, ProcessHandle, ProcessOutput } from './types';

// What POSIX shells exit with when the command is not executable / not found
const SHELL_LAUNCH_FAILURE_CODES = new Set([126, 127]);
// dash: "sh: 1: foo: not found", bash: "foo: command not found" / "Permission denied"
const SHELL_LAUNCH_FAILURE_MESSAGE = /not found|permission denied|cannot execute/i;

export interface LocalExecutionEnvOptions {
  env?: Record<string, string>; // Extra environment variables for every process
}

/**
 * Runs commands through the shell inside a working directory on this machine.
 * No isolation beyond the wall-clock timeout.
 */
export class LocalExecutionEnv implements ExecutionEnv {
  readonly workingDir: string;
  private readonly env: Record<string, string>;

  constructor(workingDir: string, options: LocalExecutionEnvOptions = {}) {
    this.workingDir = workingDir;
    this.env = { ...options.env };
  }

  popen(command: string): ProcessHandle {
    return new LocalProcessHandle(command, this.workingDir, this.env);
  }
}

// Own process group, so a timeout can take down everything the shell started
function spawnShell(command: string, cwd: string, env: Record<string, string>) {
  return execa(command, {
    shell: true,
    cwd,
    env,
    detached: true,
    stdin: 'ignore',
    encoding: 'buffer',
    reject: false,
  });
}

class LocalProcessHandle implements ProcessHandle {
  private readonly command: string;
  private readonly cwd: string;
  private readonly subprocess: ReturnType<typeof spawnShell>;
  private pending: Promise<ProcessOutput> | undefined;

  constructor(command: string, cwd: string, env: Record<string, string>) {
    this.command = command;
    this.cwd = cwd;
    this.subprocess = spawnShell(command, cwd, env);
  }

  /**
   * The timer starts on the first call; later calls share that wait and its timeout.
   */
  communicate(timeoutMs: number): Promise<ProcessOutput> {
    if (!this.pending) {
      this.pending = this.wait(timeoutMs);
    }
    return this.pending;
  }

  private async wait(timeoutMs: number): Promise<ProcessOutput> {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      this.killProcessGroup();
    }, timeoutMs);

    const result = await this.subprocess;
    clearTimeout(timer);

    if (timedOut) {
      throw new ExecutionTimeoutError(this.command, timeoutMs);
    }

    if (result.exitCode === undefined && result.signal === undefined) {
      // Never got as far as running the shell (bad cwd, spawn failure)
      throw new ProcessLaunchError(`Failed to start "${this.command}" in ${this.cwd}`, {
        command: this.command,
      });
    }

    const exitCode = result.exitCode ?? 1;
    const stderr = new TextDecoder('utf-8').decode(result.stderr).trim();
    // A program that ran and happened to exit 126/127 still gets its output compared
    if (
      SHELL_LAUNCH_FAILURE_CODES.has(exitCode) &&
      result.stdout.length === 0 &&
      SHELL_LAUNCH_FAILURE_MESSAGE.test(stderr)
    ) {
      throw new ProcessLaunchError(
        `Could not run "${this.command}" (exit code ${exitCode})${stderr ? `: ${stderr}` : ''}`,
        { command: this.command, exitCode }
      );
    }

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode,
    };
  }

  private killProcessGroup(): void {
    const pid = this.subprocess.pid;
    if (pid === undefined) {
      this.subprocess.kill('SIGKILL');
      return;
    }
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // No process group (e.g. Windows): fall back to the direct child
      this.subprocess.kill('SIGKILL');
    }
  }
}
