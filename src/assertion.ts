import { ExecutionTimeoutError } from './errors';
import type { Assertable } from './types';

export const DEFAULT_TIMEOUT_MS = 2000;

export interface EvaluateOptions {
  timeoutMs?: number; // Default: 2000ms
  verbose?: boolean; // Default: false. Log the candidate's stderr when true
}

/**
 * Strips every whitespace character (spaces, tabs, newlines)
 */
export function normalizeOutput(value: string): string {
  return value.replace(/\s/g, '');
}

const decoder = new TextDecoder('utf-8');

/**
 * Checks that a candidate program prints the expected output for one input.
 *
 * The check passes when the normalized expected output is a *substring* of the
 * normalized stdout, so a program printing `44` satisfies an expected `4`.
 */
export class AppsAssertion {
  readonly kind = 'apps-output' as const;
  readonly expectedOutput: string;
  readonly command: string;

  constructor(expected: string, command: string) {
    this.expectedOutput = normalizeOutput(expected);
    this.command = command;
    Object.freeze(this);
  }

  /**
   * Runs the command once. Resolves to false on timeout; a launch failure rejects.
   *
   * What counts as a launch failure is up to the environment. `LocalExecutionEnv`
   * only reports the shell failing to find or execute the interpreter: a missing
   * entrypoint file is reported by the interpreter itself (Python exits 2) and so
   * ends up as a wrong answer.
   */
  async evaluate(assertable: Assertable, options: EvaluateOptions = {}): Promise<boolean> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const handle = assertable.env.popen(this.command);

    let stdout: string;
    try {
      const output = await handle.communicate(timeoutMs);
      stdout = decoder.decode(output.stdout);
      if (options.verbose && output.stderr.length > 0) {
        console.log(`[${this.command}] stderr:\n${decoder.decode(output.stderr)}`);
      }
    } catch (error) {
      if (error instanceof ExecutionTimeoutError) {
        console.log(`Execution Timeout (${timeoutMs}ms): ${this.command}`);
        return false;
      }
      throw error;
    }

    return normalizeOutput(stdout).includes(this.expectedOutput);
  }

  toJSON(): { kind: 'apps-output'; expectedOutput: string; command: string } {
    return {
      kind: this.kind,
      expectedOutput: this.expectedOutput,
      command: this.command,
    };
  }
}
