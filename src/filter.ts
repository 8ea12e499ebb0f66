import type { CurationConfig } from './config/curation.js';
import { extractNamePart } from './lib/canon.js';
import { log } from './utils/log.js';
import type { CuratedEntry, Rejection } from './types/index.js';

export interface FilterResult {
  kept: Map<string, CuratedEntry>;
  rejections: Rejection[];
}

export interface BannedTagMatch {
  tag: string;
  banned: string;
}

type FilterConfig = Pick<CurationConfig, 'minEmotionCount' | 'bannedTags' | 'bannedNames' | 'variantMarker'>;

// Substring containment: "普通人" is caught by "普通".
export function findBannedTag(tags: readonly string[], bannedTags: readonly string[]): BannedTagMatch | undefined {
  for (const tag of tags) {
    const banned = bannedTags.find((candidate) => tag.includes(candidate));
    if (banned !== undefined) return { tag, banned };
  }
  return undefined;
}

// Exact match only, unlike tags: "NPCish" survives a ban on "NPC".
export function isBannedName(key: string, bannedNames: readonly string[], marker: string): boolean {
  const name = extractNamePart(key, marker);
  return bannedNames.includes(name);
}

export function evaluateEntry(entry: CuratedEntry, config: FilterConfig): Rejection | undefined {
  if (entry.emotionCount < config.minEmotionCount) {
    return {
      key: entry.key,
      reason: 'emotion-coverage',
      emotionCount: entry.emotionCount,
      required: config.minEmotionCount,
      shape: entry.emotion
    };
  }

  const bannedTag = findBannedTag(entry.tags, config.bannedTags);
  if (bannedTag) {
    return { key: entry.key, reason: 'banned-tag', ...bannedTag };
  }

  if (isBannedName(entry.key, config.bannedNames, config.variantMarker)) {
    return { key: entry.key, reason: 'banned-name', name: extractNamePart(entry.key, config.variantMarker) };
  }

  return undefined;
}

export function filterEntries(entries: ReadonlyMap<string, CuratedEntry>, config: FilterConfig): FilterResult {
  const kept = new Map<string, CuratedEntry>();
  const rejections: Rejection[] = [];

  for (const [key, entry] of entries) {
    const rejection = evaluateEntry(entry, config);
    if (rejection) {
      rejections.push(rejection);
    } else {
      kept.set(key, entry);
    }
  }

  log.info('Applied curation criteria', {
    input: entries.size,
    kept: kept.size,
    rejected: rejections.length
  });

  return { kept, rejections };
}
