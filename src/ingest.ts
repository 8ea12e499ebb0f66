import { classifyEmotion, emotionCoverage } from './lib/emotion.js';
import type { CuratedEntry, Dataset, JsonValue } from './types/index.js';

export function normalizeTags(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  const unique = new Set<string>();
  for (const tag of value) {
    if (typeof tag === 'string') unique.add(tag);
  }
  return [...unique];
}

export function ingestDataset(dataset: Dataset): Map<string, CuratedEntry> {
  const entries = new Map<string, CuratedEntry>();
  for (const [key, record] of Object.entries(dataset)) {
    const shape = classifyEmotion(record.emotion);
    entries.set(key, {
      key,
      record,
      tags: normalizeTags(record.tags),
      emotion: shape.kind,
      emotionCount: emotionCoverage(shape)
    });
  }
  return entries;
}
