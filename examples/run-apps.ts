import path from 'path';
import fs from 'fs-extra';
import { loadApps, runBenchmark } from '../src';
import type { FilesDict } from '../src';

/**
 * Runs the first few APPS tasks against solutions stored as
 * `<solutionsDir>/<problem id>/main.py`, e.g. produced by a code model beforehand.
 */
async function main() {
  const solutionsDir = process.argv[2] ?? path.join(process.cwd(), 'solutions');
  console.log(`Reading candidate solutions from ${solutionsDir}\n`);

  const benchmark = await loadApps({
    config: {
      problemIds: [0, 1, 2, 3, 4],
      maxAssertions: 5,
      verbose: true,
    },
  });

  const result = await runBenchmark(benchmark, {
    candidate: async (task): Promise<FilesDict> => {
      const file = path.join(solutionsDir, task.name, 'main.py');
      if (!(await fs.pathExists(file))) {
        console.warn(`[Task ${task.name}] No solution at ${file}, using the starter code`);
        return {};
      }
      return { 'main.py': await fs.readFile(file, 'utf-8') };
    },
    tempDirCleanup: 'on-failure',
  });

  console.log('\n=== PROGRAMMATIC ACCESS ===');
  for (const task of result.tasks) {
    const statuses = task.outcomes.map((o) => o.status).join(', ');
    console.log(`  ${task.taskName}: ${task.success ? 'pass' : 'fail'} [${statuses}]`);
  }
}

main().catch(console.error);
