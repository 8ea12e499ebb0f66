import type { CurationConfig } from './config/curation.js';
import { canonicalIdentity, isExcludedLanguage, orderForMerge } from './lib/canon.js';
import { log } from './utils/log.js';
import type { CuratedEntry, MergeEntry } from './types/index.js';

export interface MergeResult {
  entries: Map<string, CuratedEntry>;
  excluded: string[];
  merges: MergeEntry[];
}

type MergeConfig = Pick<CurationConfig, 'excludedLanguageMarkers' | 'variantMarker'>;

function unionTags(existing: readonly string[], incoming: readonly string[]): { tags: string[]; added: string[] } {
  const seen = new Set(existing);
  const added: string[] = [];
  for (const tag of incoming) {
    if (seen.has(tag)) continue;
    seen.add(tag);
    added.push(tag);
  }
  return { tags: [...existing, ...added], added };
}

/**
 * Collapses language variants of the same character into one entry.
 *
 * The first key seen for a canonical identity wins every field; later keys
 * only contribute their tags. Marked keys are visited first, so the marked
 * record is the one that survives.
 */
export function mergeIdentities(entries: ReadonlyMap<string, CuratedEntry>, config: MergeConfig): MergeResult {
  const excluded: string[] = [];
  const candidates: string[] = [];
  for (const key of entries.keys()) {
    if (isExcludedLanguage(key, config.excludedLanguageMarkers)) {
      excluded.push(key);
    } else {
      candidates.push(key);
    }
  }

  const merged = new Map<string, CuratedEntry>();
  const keptKeyByIdentity = new Map<string, string>();
  const mergeByIdentity = new Map<string, MergeEntry>();

  for (const key of orderForMerge(candidates, config.variantMarker)) {
    const entry = entries.get(key);
    if (!entry) continue;
    const identity = canonicalIdentity(key, config.variantMarker);
    const keptKey = keptKeyByIdentity.get(identity);
    const kept = keptKey === undefined ? undefined : merged.get(keptKey);

    if (keptKey === undefined || !kept) {
      keptKeyByIdentity.set(identity, key);
      merged.set(key, entry);
      continue;
    }

    const { tags, added } = unionTags(kept.tags, entry.tags);
    merged.set(keptKey, {
      ...kept,
      tags,
      record: { ...kept.record, tags }
    });

    let mergeEntry = mergeByIdentity.get(identity);
    if (!mergeEntry) {
      mergeEntry = { canonical: identity, kept: keptKey, absorbed: [], addedTags: [] };
      mergeByIdentity.set(identity, mergeEntry);
    }
    mergeEntry.absorbed.push(key);
    mergeEntry.addedTags.push(...added);
  }

  if (excluded.length) {
    log.debug('Excluded keys by language marker', { count: excluded.length });
  }
  log.info('Merged language variants', {
    input: entries.size,
    excluded: excluded.length,
    merged: merged.size
  });

  return { entries: merged, excluded, merges: [...mergeByIdentity.values()] };
}
