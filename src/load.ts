import { resolve } from 'node:path';
import { writeJson } from './utils/fs.js';
import { log } from './utils/log.js';
import type { Dataset } from './types/index.js';

export interface LoadOptions {
  outputPath: string;
  dryRun?: boolean;
}

export interface LoadResult {
  outputPath: string;
  written: number;
  dryRun: boolean;
}

export async function load(dataset: Dataset, opts: LoadOptions): Promise<LoadResult> {
  const outputPath = resolve(opts.outputPath);
  const written = Object.keys(dataset).length;
  const dryRun = Boolean(opts.dryRun);

  if (dryRun) {
    log.info('Dry-run: dataset not written', { file: outputPath, records: written });
    return { outputPath, written, dryRun };
  }

  await writeJson(outputPath, dataset);
  log.info('Dataset saved', { file: outputPath, records: written });
  return { outputPath, written, dryRun };
}
