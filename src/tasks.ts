import { AppsAssertion } from './assertion';
import type { AppsConfig } from './config';
import type { Problem } from './problem';
import type { Task, TaskAssertion } from './types';

export const ASSERTION_LABEL = 'correct output';

type CommandConfig = Pick<AppsConfig, 'entrypoint' | 'interpreter'>;

/**
 * Wraps a value in double quotes for a POSIX shell. `\`, `"`, `$` and
 * backticks are escaped, everything else (newlines included) is literal.
 */
export function quoteShellArgument(value: string): string {
  return `"${value.replace(/[\\"$`]/g, (char) => `\\${char}`)}"`;
}

/**
 * Command that runs the candidate entrypoint with one test case's input
 */
export function buildRunCommand(input: string, config: CommandConfig): string {
  return `${config.interpreter} ${config.entrypoint} ${quoteShellArgument(input)}`;
}

export function buildPrompt(question: string, config: CommandConfig): string {
  return (
    question +
    `\nThe program, including its inputs, should be run from the command line like ` +
    `'${config.interpreter} ${config.entrypoint} "input1 input2 etc"', with all inputs inside ` +
    `the quotation marks. The program should not read inputs from stdin.`
  );
}

/**
 * Turns one problem into a task with at most `maxAssertions` checks,
 * in the order of the problem's test cases.
 */
export function buildTask(
  problem: Problem,
  config: Pick<AppsConfig, 'entrypoint' | 'interpreter' | 'maxAssertions'>
): Task {
  const count = Math.min(problem.outputs.length, config.maxAssertions);
  const assertions: TaskAssertion[] = [];

  for (let i = 0; i < count; i++) {
    assertions.push({
      label: ASSERTION_LABEL,
      check: new AppsAssertion(problem.outputs[i], buildRunCommand(problem.inputs[i], config)),
    });
  }

  return {
    name: String(problem.id),
    initialCode: { [config.entrypoint]: problem.starterCode },
    command: null,
    prompt: buildPrompt(problem.question, config),
    assertions: Object.freeze(assertions),
  };
}
