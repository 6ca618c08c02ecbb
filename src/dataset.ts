import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { DatasetUnavailableError } from './errors';
import type { ProblemRecord } from './types';

export const APPS_DATASET_ID = 'codeparrot/apps';

const problemRecordSchema = z.object({
  problem_id: z.number().int(),
  question: z.string(),
  input_output: z.string(),
  starter_code: z.string(),
});

const recordsSchema = z.array(problemRecordSchema);

/**
 * Where records come from when they are not cached yet
 */
export interface RemoteDatasetSource {
  fetchSplit(split: string): Promise<unknown[]>;
}

export interface DatasetLoaderOptions {
  cacheDir: string;
  remote: RemoteDatasetSource;
}

/**
 * Loads dataset splits from a local JSON cache, downloading and caching them on a miss
 */
export class DatasetLoader {
  readonly cacheDir: string;
  private readonly remote: RemoteDatasetSource;

  constructor(options: DatasetLoaderOptions) {
    this.cacheDir = options.cacheDir;
    this.remote = options.remote;
  }

  cachePath(split: string): string {
    return path.join(this.cacheDir, `${split}.json`);
  }

  async load(split: string): Promise<readonly ProblemRecord[]> {
    const cachePath = this.cachePath(split);

    if (await fs.pathExists(cachePath)) {
      let cached: unknown;
      try {
        cached = await fs.readJson(cachePath);
      } catch (error) {
        throw new DatasetUnavailableError(`Dataset cache ${cachePath} is not readable JSON`, {
          split,
          cause: error,
        });
      }
      return Object.freeze(parseRecords(cached, split, cachePath));
    }

    console.log('Dataset not found locally, downloading...');
    let fetched: unknown[];
    try {
      fetched = await this.remote.fetchSplit(split);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new DatasetUnavailableError(
        `Dataset split "${split}" is not cached at ${cachePath} and could not be downloaded: ${errorMessage}`,
        { split, cause: error }
      );
    }

    const records = parseRecords(fetched, split, 'remote source');
    await fs.outputJson(cachePath, records);
    console.log(`Cached ${records.length} records at ${cachePath}`);

    return Object.freeze(records);
  }
}

function parseRecords(raw: unknown, split: string, origin: string): ProblemRecord[] {
  const parsed = recordsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DatasetUnavailableError(
      `Dataset split "${split}" from ${origin} is malformed at ${issue?.path.join('.') ?? '?'}: ${
        issue?.message ?? 'invalid records'
      }`,
      { split }
    );
  }
  return parsed.data;
}

const rowsPageSchema = z.object({
  rows: z.array(
    z.object({
      row_idx: z.number().int().optional(),
      row: z.unknown(),
      truncated_cells: z.array(z.string()).optional(),
    })
  ),
  num_rows_total: z.number().int().nonnegative(),
});

export interface HuggingFaceRowsSourceOptions {
  dataset?: string; // Default: 'codeparrot/apps'
  config?: string; // Default: 'all'
  pageSize?: number; // Default: 100 (the rows endpoint maximum)
  baseUrl?: string; // Default: 'https://datasets-server.huggingface.co'
  fetch?: typeof fetch;
}

/**
 * Pages through the Hugging Face datasets-server `/rows` endpoint
 */
export class HuggingFaceRowsSource implements RemoteDatasetSource {
  private readonly dataset: string;
  private readonly config: string;
  private readonly pageSize: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HuggingFaceRowsSourceOptions = {}) {
    this.dataset = options.dataset ?? APPS_DATASET_ID;
    this.config = options.config ?? 'all';
    this.pageSize = options.pageSize ?? 100;
    this.baseUrl = options.baseUrl ?? 'https://datasets-server.huggingface.co';
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetchSplit(split: string): Promise<unknown[]> {
    const rows: unknown[] = [];
    let total = Infinity;

    while (rows.length < total) {
      const url = new URL('/rows', this.baseUrl);
      url.searchParams.set('dataset', this.dataset);
      url.searchParams.set('config', this.config);
      url.searchParams.set('split', split);
      url.searchParams.set('offset', String(rows.length));
      url.searchParams.set('length', String(this.pageSize));

      const response = await this.fetchImpl(url);
      if (!response.ok) {
        throw new DatasetUnavailableError(
          `GET ${url.toString()} failed with ${response.status} ${response.statusText}`,
          { split }
        );
      }

      const page = rowsPageSchema.parse(await response.json());
      total = page.num_rows_total;
      if (page.rows.length === 0) break;

      for (const [index, entry] of page.rows.entries()) {
        // Oversized cells come back cut short and would poison the cache
        if (entry.truncated_cells && entry.truncated_cells.length > 0) {
          const rowIndex = entry.row_idx ?? rows.length + index;
          throw new DatasetUnavailableError(
            `Row ${rowIndex} of split "${split}" has truncated cells: ${entry.truncated_cells.join(', ')}`,
            { split }
          );
        }
      }
      rows.push(...page.rows.map((entry) => entry.row));
    }

    return rows;
  }
}
