import type { CurationConfig } from './config/curation.js';
import { filterEntries, type FilterResult } from './filter.js';
import { ingestDataset } from './ingest.js';
import { mergeIdentities, type MergeResult } from './merge.js';
import { log } from './utils/log.js';
import type { CuratedEntry, CurationSummary, Dataset, VoiceRecord } from './types/index.js';

export interface CurationResult {
  dataset: Dataset;
  merge: MergeResult;
  filter: FilterResult;
  summary: CurationSummary;
}

function toDataset(entries: ReadonlyMap<string, CuratedEntry>): Dataset {
  return Object.fromEntries([...entries].map(([key, entry]): [string, VoiceRecord] => [key, entry.record]));
}

export function curate(dataset: Dataset, config: CurationConfig): CurationResult {
  const entries = ingestDataset(dataset);
  log.info('Curation started', { entries: entries.size });

  const merge = mergeIdentities(entries, config);
  const filter = filterEntries(merge.entries, config);
  const output = toDataset(filter.kept);

  const summary: CurationSummary = {
    original: entries.size,
    excluded: merge.excluded.length,
    merged: merge.entries.size,
    final: filter.kept.size,
    removed: entries.size - filter.kept.size
  };

  log.info('Curation complete', summary);

  return { dataset: output, merge, filter, summary };
}
