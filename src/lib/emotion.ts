import type { EmotionShape, JsonValue } from '../types/index.js';

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classifyEmotion(value: JsonValue | undefined): EmotionShape {
  if (value === undefined || value === null) return { kind: 'absent' };
  if (Array.isArray(value)) return { kind: 'sequence', entries: value };
  if (isJsonObject(value)) {
    // Older exports stored emotions as `{ "<group>": [...] }`; only the first group counts.
    const values = Object.values(value);
    return values.length ? { kind: 'legacy-map', first: values[0] } : { kind: 'legacy-map' };
  }
  return { kind: 'unrecognized', value };
}

export function emotionCoverage(shape: EmotionShape): number {
  switch (shape.kind) {
    case 'sequence':
      return shape.entries.length;
    case 'legacy-map':
      if (Array.isArray(shape.first) || typeof shape.first === 'string') {
        return shape.first.length;
      }
      return 0;
    case 'absent':
    case 'unrecognized':
      return 0;
  }
}
