import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveRunOptions, run, DEFAULT_INPUT, DEFAULT_OUTPUT } from '../src/cli.js';
import { ConfigError, DatasetError, SourceNotFoundError } from '../src/errors/index.js';
import { pathExists } from '../src/utils/fs.js';
import type { CurationReport } from '../src/report.js';

const emotions = ['默认', '开心', '生气', '难过', '惊讶', '害怕'];

const dataset = {
  '原神-中文-胡桃_ZH': { tags: ['往生堂'], emotion: emotions, model: 'hutao-zh' },
  '原神-中文-胡桃': { tags: ['蝴蝶'], emotion: [], model: 'hutao' },
  '原神-中文-派蒙': { tags: ['向导'], emotion: emotions.slice(0, 2) },
  '原神-中文-NPC': { tags: [], emotion: emotions }
};

describe('curation run', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;
  let reportPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'voice-curate-'));
    inputPath = join(dir, 'voices.json');
    outputPath = join(dir, 'out', 'elite.json');
    reportPath = join(dir, 'out', 'report.json');
    await writeFile(inputPath, JSON.stringify(dataset), 'utf8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('resolves paths from flags before env and defaults', () => {
    const fromFlags = resolveRunOptions(['--input', 'a.json', '--min-emotions', '3'], { CURATE_INPUT: 'b.json' });
    expect(fromFlags.inputPath).toBe('a.json');
    expect(fromFlags.outputPath).toBe(DEFAULT_OUTPUT);
    expect(fromFlags.config.minEmotionCount).toBe(3);
    expect(fromFlags.dryRun).toBe(false);

    const fromEnv = resolveRunOptions([], { CURATE_INPUT: 'b.json' });
    expect(fromEnv.inputPath).toBe('b.json');
    expect(resolveRunOptions([], {}).inputPath).toBe(DEFAULT_INPUT);
  });

  it('rejects a flag given without a value', () => {
    expect(() => resolveRunOptions(['--input', 'in.json', '--output'], {})).toThrow(ConfigError);
    expect(() => resolveRunOptions(['--variant-marker'], {})).toThrow(ConfigError);
  });

  it('rejects a misspelled flag instead of falling back to the default output', () => {
    expect(() => resolveRunOptions(['--ouput', 'mine.json'], {})).toThrow('Unknown flag --ouput');
  });

  it('takes dry-run from the flag or CURATE_DRY_RUN', () => {
    expect(resolveRunOptions(['--dry-run'], {}).dryRun).toBe(true);
    expect(resolveRunOptions([], { CURATE_DRY_RUN: 'yes' }).dryRun).toBe(true);
    expect(resolveRunOptions(['--dry-run=false'], { CURATE_DRY_RUN: 'yes' }).dryRun).toBe(false);
    expect(() => resolveRunOptions(['--dry-run', 'x.json'], {})).toThrow(ConfigError);
  });

  it('writes the curated dataset with readable non-ASCII text', async () => {
    const result = await run(resolveRunOptions(['--input', inputPath, '--output', outputPath], {}));

    const text = await readFile(outputPath, 'utf8');
    expect(JSON.parse(text)).toEqual({
      '原神-中文-胡桃_ZH': { tags: ['往生堂', '蝴蝶'], emotion: emotions, model: 'hutao-zh' }
    });
    expect(text).toContain('"原神-中文-胡桃_ZH": {');
    expect(text.endsWith('}\n')).toBe(true);
    expect(result.load.written).toBe(1);
    expect(result.curation.summary).toEqual({ original: 4, excluded: 0, merged: 3, final: 1, removed: 3 });
  });

  it('writes a report of merges and rejections', async () => {
    await run(resolveRunOptions(['--input', inputPath, '--output', outputPath, '--report', reportPath], {}));

    const report: CurationReport = JSON.parse(await readFile(reportPath, 'utf8'));
    expect(report.merges).toEqual([
      { canonical: '原神-中文-胡桃', kept: '原神-中文-胡桃_ZH', absorbed: ['原神-中文-胡桃'], addedTags: ['蝴蝶'] }
    ]);
    expect(report.rejections['emotion-coverage']).toEqual([
      { key: '原神-中文-派蒙', reason: 'emotion-coverage', emotionCount: 2, required: 6, shape: 'sequence' }
    ]);
    expect(report.rejections['banned-name']).toEqual([
      { key: '原神-中文-NPC', reason: 'banned-name', name: 'NPC' }
    ]);
    expect(report.rejections['banned-tag']).toEqual([]);
  });

  it('leaves no curated dataset behind when the report cannot be written', async () => {
    const blockedReport = join(dir, 'report-dir');
    await mkdir(blockedReport);
    const options = resolveRunOptions(['--input', inputPath, '--output', outputPath, '--report', blockedReport], {});
    await expect(run(options)).rejects.toThrow();
    expect(await pathExists(outputPath)).toBe(false);
  });

  it('writes nothing in dry-run mode', async () => {
    const result = await run(
      resolveRunOptions(['--input', inputPath, '--output', outputPath, '--report', reportPath, '--dry-run'], {})
    );
    expect(result.load).toMatchObject({ written: 1, dryRun: true });
    expect(await pathExists(outputPath)).toBe(false);
    expect(await pathExists(reportPath)).toBe(false);
  });

  it('accepts input saved with a UTF-8 byte order mark', async () => {
    await writeFile(inputPath, `\ufeff${JSON.stringify(dataset)}`, 'utf8');
    const result = await run(resolveRunOptions(['--input', inputPath, '--output', outputPath], {}));
    expect(Object.keys(result.curation.dataset)).toEqual(['原神-中文-胡桃_ZH']);
  });

  it('fails when the source is missing', async () => {
    const options = resolveRunOptions(['--input', join(dir, 'missing.json'), '--output', outputPath], {});
    await expect(run(options)).rejects.toBeInstanceOf(SourceNotFoundError);
    expect(await pathExists(outputPath)).toBe(false);
  });

  it('fails on malformed JSON without writing output', async () => {
    await writeFile(inputPath, '{"broken": ', 'utf8');
    const options = resolveRunOptions(['--input', inputPath, '--output', outputPath], {});
    await expect(run(options)).rejects.toBeInstanceOf(DatasetError);
    expect(await pathExists(outputPath)).toBe(false);
  });

  it('fails when records are not objects', async () => {
    await writeFile(inputPath, JSON.stringify({ 'GI-zh-Hutao': ['not', 'a', 'record'] }), 'utf8');
    const options = resolveRunOptions(['--input', inputPath, '--output', outputPath], {});
    await expect(run(options)).rejects.toBeInstanceOf(DatasetError);
    expect(await pathExists(outputPath)).toBe(false);
  });
});
