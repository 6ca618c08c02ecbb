import { z } from 'zod';
import { DataIntegrityError } from './errors';
import type { ProblemRecord } from './types';

const inputOutputSchema = z.object({
  inputs: z.array(z.string()),
  outputs: z.array(z.string()),
  fn_name: z.string().optional(),
});

/**
 * One APPS coding problem with its decoded test fixtures.
 * `inputs[i]` is fed to the program, `outputs[i]` is what it must print.
 */
export class Problem {
  readonly id: number;
  readonly question: string;
  readonly starterCode: string;
  readonly inputOutput: string;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];

  private constructor(record: ProblemRecord, inputs: string[], outputs: string[]) {
    this.id = record.problem_id;
    this.question = record.question;
    this.starterCode = record.starter_code;
    this.inputOutput = record.input_output;
    this.inputs = Object.freeze(inputs);
    this.outputs = Object.freeze(outputs);
    Object.freeze(this);
  }

  /**
   * Decodes a raw record, throwing DataIntegrityError when the payload is
   * not JSON, has the wrong shape, or has mismatched inputs/outputs.
   */
  static fromRecord(record: ProblemRecord): Problem {
    const { inputs, outputs } = decodeInputOutput(record.input_output, record.problem_id);
    return new Problem(record, inputs, outputs);
  }
}

/**
 * Parses the serialized `input_output` payload of a problem
 */
export function decodeInputOutput(
  payload: string,
  problemId?: number
): { inputs: string[]; outputs: string[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new DataIntegrityError(
      `Problem ${problemId ?? '?'}: input_output is not valid JSON: ${errorMessage}`,
      { problemId }
    );
  }

  const parsed = inputOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'input_output';
    throw new DataIntegrityError(
      `Problem ${problemId ?? '?'}: malformed ${where}: ${issue?.message ?? 'invalid payload'}`,
      { problemId }
    );
  }

  const { inputs, outputs } = parsed.data;
  if (inputs.length !== outputs.length) {
    throw new DataIntegrityError(
      `Problem ${problemId ?? '?'}: ${inputs.length} inputs but ${outputs.length} outputs`,
      { problemId }
    );
  }

  return { inputs, outputs };
}
