import { resolve } from 'node:path';
import { loadCurationConfig, parseNonNegativeInteger, type CurationConfig } from './config/curation.js';
import { extract } from './extract.js';
import { load, type LoadResult } from './load.js';
import { buildCurationReport } from './report.js';
import { curate, type CurationResult } from './transform.js';
import { getStringArg, parseCliArgs, resolveBooleanFlag, type FlagTable } from './utils/args.js';
import { writeJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { validateDataset } from './validate.js';

export const DEFAULT_INPUT = 'acgnai-voice.json';
export const DEFAULT_OUTPUT = 'acgnai-voice-elite.json';

type Env = Record<string, string | undefined>;

export const CLI_FLAGS = {
  input: 'string',
  output: 'string',
  report: 'string',
  'min-emotions': 'string',
  'variant-marker': 'string',
  'dry-run': 'boolean'
} as const satisfies FlagTable;

export interface RunOptions {
  inputPath: string;
  outputPath: string;
  reportPath?: string;
  dryRun: boolean;
  config: CurationConfig;
}

export interface RunResult {
  curation: CurationResult;
  load: LoadResult;
}

export function resolveRunOptions(argv: string[], env: Env = process.env): RunOptions {
  const args = parseCliArgs(argv, CLI_FLAGS);

  const minEmotionCount = parseNonNegativeInteger(getStringArg(args, 'min-emotions'), '--min-emotions');
  const variantMarker = getStringArg(args, 'variant-marker');

  const config = loadCurationConfig(env, { minEmotionCount, variantMarker });

  return {
    inputPath: getStringArg(args, 'input') ?? env.CURATE_INPUT ?? DEFAULT_INPUT,
    outputPath: getStringArg(args, 'output') ?? env.CURATE_OUTPUT ?? DEFAULT_OUTPUT,
    reportPath: getStringArg(args, 'report') ?? env.CURATE_REPORT,
    dryRun: resolveBooleanFlag(args['dry-run'], env.CURATE_DRY_RUN, false),
    config
  };
}

export async function run(opts: RunOptions): Promise<RunResult> {
  log.info('Curation run started', {
    input: opts.inputPath,
    output: opts.outputPath,
    minEmotionCount: opts.config.minEmotionCount,
    mode: opts.dryRun ? 'dry-run' : 'apply'
  });

  const extracted = await extract({ inputPath: opts.inputPath });
  const dataset = await validateDataset(extracted.data);
  const curation = curate(dataset, opts.config);

  // Report before dataset, so a failed report write leaves no output file.
  if (opts.reportPath && !opts.dryRun) {
    const report = buildCurationReport(curation, {
      inputPath: extracted.inputPath,
      outputPath: resolve(opts.outputPath),
      config: opts.config
    });
    await writeJson(opts.reportPath, report);
    log.info('Curation report saved', { file: opts.reportPath });
  }

  const loaded = await load(curation.dataset, { outputPath: opts.outputPath, dryRun: opts.dryRun });

  const { original, final, removed } = curation.summary;
  log.info('Curation run finished', { original, final, removed });

  return { curation, load: loaded };
}
