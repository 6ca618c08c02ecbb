import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { DatasetLoader, HuggingFaceRowsSource, type RemoteDatasetSource } from '../src/dataset';
import { DatasetUnavailableError } from '../src/errors';
import type { ProblemRecord } from '../src/types';

const records: ProblemRecord[] = [
  {
    problem_id: 0,
    question: 'Print the sum.',
    input_output: JSON.stringify({ inputs: ['1 2\n'], outputs: ['3\n'] }),
    starter_code: '',
  },
  {
    problem_id: 1,
    question: 'Print the product.',
    input_output: JSON.stringify({ inputs: ['2 3\n'], outputs: ['6\n'] }),
    starter_code: '',
  },
];

let cacheDir: string;

beforeEach(async () => {
  cacheDir = path.join(os.tmpdir(), `test-dataset-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.remove(cacheDir);
});

describe('DatasetLoader', () => {
  test('downloads and caches the split on a cache miss', async () => {
    const fetchSplit = vi.fn(async () => records);
    const loader = new DatasetLoader({ cacheDir, remote: { fetchSplit } });

    const loaded = await loader.load('test');

    expect(loaded).toEqual(records);
    expect(fetchSplit).toHaveBeenCalledWith('test');
    expect(await fs.readJson(path.join(cacheDir, 'test.json'))).toEqual(records);
    expect(console.log).toHaveBeenCalledWith('Dataset not found locally, downloading...');
  });

  test('reads from the cache without touching the remote', async () => {
    await fs.outputJson(path.join(cacheDir, 'test.json'), records);
    const fetchSplit = vi.fn(async () => []);
    const loader = new DatasetLoader({ cacheDir, remote: { fetchSplit } });

    const loaded = await loader.load('test');

    expect(loaded).toEqual(records);
    expect(Object.isFrozen(loaded)).toBe(true);
    expect(fetchSplit).not.toHaveBeenCalled();
  });

  test('fails when the remote cannot provide the split', async () => {
    const remote: RemoteDatasetSource = {
      fetchSplit: async () => {
        throw new Error('network down');
      },
    };
    const loader = new DatasetLoader({ cacheDir, remote });

    await expect(loader.load('test')).rejects.toBeInstanceOf(DatasetUnavailableError);
    await expect(loader.load('test')).rejects.toThrow(/could not be downloaded: network down/);
    expect(await fs.pathExists(path.join(cacheDir, 'test.json'))).toBe(false);
  });

  test('rejects malformed remote records without caching them', async () => {
    const loader = new DatasetLoader({
      cacheDir,
      remote: { fetchSplit: async () => [{ problem_id: 'zero' }] },
    });

    await expect(loader.load('test')).rejects.toThrow(
      'Dataset split "test" from remote source is malformed at 0.problem_id'
    );
    expect(await fs.pathExists(path.join(cacheDir, 'test.json'))).toBe(false);
  });

  test('rejects a corrupt cache file', async () => {
    await fs.outputFile(path.join(cacheDir, 'test.json'), '{not json');
    const loader = new DatasetLoader({ cacheDir, remote: { fetchSplit: async () => records } });

    await expect(loader.load('test')).rejects.toBeInstanceOf(DatasetUnavailableError);
  });
});

describe('HuggingFaceRowsSource', () => {
  test('pages through the rows endpoint', async () => {
    const requested: URL[] = [];
    const fakeFetch: typeof fetch = async (input) => {
      const url = new URL(String(input));
      requested.push(url);
      const offset = Number(url.searchParams.get('offset'));
      const page = records.slice(offset, offset + 1).map((row) => ({ row }));
      return new Response(JSON.stringify({ rows: page, num_rows_total: records.length }), {
        status: 200,
      });
    };

    const source = new HuggingFaceRowsSource({ pageSize: 1, fetch: fakeFetch });
    const rows = await source.fetchSplit('test');

    expect(rows).toEqual(records);
    expect(requested).toHaveLength(2);
    expect(requested[0].origin).toBe('https://datasets-server.huggingface.co');
    expect(requested[0].pathname).toBe('/rows');
    expect(requested[0].searchParams.get('dataset')).toBe('codeparrot/apps');
    expect(requested[0].searchParams.get('split')).toBe('test');
    expect(requested[1].searchParams.get('offset')).toBe('1');
    expect(requested[1].searchParams.get('length')).toBe('1');
  });

  test('fails on an unsuccessful response', async () => {
    const fakeFetch: typeof fetch = async () =>
      new Response('missing', { status: 404, statusText: 'Not Found' });
    const source = new HuggingFaceRowsSource({ fetch: fakeFetch });

    await expect(source.fetchSplit('test')).rejects.toThrow(/failed with 404 Not Found/);
  });

  test('refuses rows with truncated cells and caches nothing', async () => {
    const fakeFetch: typeof fetch = async () =>
      new Response(
        JSON.stringify({
          rows: [
            {
              row_idx: 0,
              row: { ...records[0], input_output: '{"inputs":' },
              truncated_cells: ['input_output'],
            },
          ],
          num_rows_total: 1,
        }),
        { status: 200 }
      );
    const source = new HuggingFaceRowsSource({ fetch: fakeFetch });

    await expect(source.fetchSplit('test')).rejects.toThrow(
      'Row 0 of split "test" has truncated cells: input_output'
    );

    const loader = new DatasetLoader({ cacheDir, remote: source });
    await expect(loader.load('test')).rejects.toBeInstanceOf(DatasetUnavailableError);
    expect(await fs.pathExists(path.join(cacheDir, 'test.json'))).toBe(false);
  });
});
