import { resolve } from 'node:path';
import { DatasetError, SourceNotFoundError } from './errors/index.js';
import { pathExists, readText } from './utils/fs.js';
import { log } from './utils/log.js';

export interface ExtractOptions {
  inputPath: string;
}

export interface ExtractResult {
  inputPath: string;
  data: unknown;
}

export async function extract(opts: ExtractOptions): Promise<ExtractResult> {
  const inputPath = resolve(opts.inputPath);
  if (!(await pathExists(inputPath))) {
    throw new SourceNotFoundError(inputPath);
  }

  log.info('Reading dataset', { file: inputPath });
  const text = await readText(inputPath);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new DatasetError(
      `Failed to parse ${inputPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return { inputPath, data };
}
