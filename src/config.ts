import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS } from './assertion';

export const BENCHMARK_NAME = 'APPS';
export const DEFAULT_MAX_ASSERTIONS = 10;
export const DEFAULT_ENTRYPOINT = 'main.py';
export const DEFAULT_INTERPRETER = 'python';

const PROBLEM_IDS_PATH = fileURLToPath(new URL('./data/problem-ids.json', import.meta.url));

export interface AppsConfig {
  maxAssertions: number; // Default: 10. Checks built per problem
  timeoutMs: number; // Default: 2000ms per check
  entrypoint: string; // Default: 'main.py'. Shared by initial code, prompt and commands
  interpreter: string; // Default: 'python'
  cacheDir: string; // Default: $APPS_DATASET_DIR or ./.cache/apps-dataset
  problemIds: readonly number[]; // Default: src/data/problem-ids.json
  skipInvalidProblems: boolean; // Default: false. Skip (and warn) instead of aborting the load
  verbose: boolean; // Default: false
}

const problemIdsSchema = z.array(z.number().int().nonnegative());

/**
 * Problem ids selected when no allow-list is configured
 */
export function loadDefaultProblemIds(): number[] {
  return problemIdsSchema.parse(fs.readJsonSync(PROBLEM_IDS_PATH));
}

/**
 * Fills in defaults and validates a partial configuration
 */
export function resolveAppsConfig(
  overrides: Partial<AppsConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): AppsConfig {
  const config: AppsConfig = {
    maxAssertions: overrides.maxAssertions ?? DEFAULT_MAX_ASSERTIONS,
    timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    entrypoint: overrides.entrypoint ?? DEFAULT_ENTRYPOINT,
    interpreter: overrides.interpreter ?? DEFAULT_INTERPRETER,
    cacheDir:
      overrides.cacheDir ??
      (env.APPS_DATASET_DIR?.trim() || path.join(process.cwd(), '.cache', 'apps-dataset')),
    problemIds: overrides.problemIds ?? loadDefaultProblemIds(),
    skipInvalidProblems: overrides.skipInvalidProblems ?? false,
    verbose: overrides.verbose ?? false,
  };

  if (!Number.isInteger(config.maxAssertions) || config.maxAssertions < 0) {
    throw new Error(`maxAssertions must be a non-negative integer, got ${config.maxAssertions}`);
  }
  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new Error(`timeoutMs must be a positive integer, got ${config.timeoutMs}`);
  }
  if (!config.entrypoint.trim()) {
    throw new Error('entrypoint must not be empty');
  }
  if (!config.interpreter.trim()) {
    throw new Error('interpreter must not be empty');
  }

  return config;
}
