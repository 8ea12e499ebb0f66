import { ConfigError } from '../errors/index.js';
import { log } from '../utils/log.js';

export interface CurationConfig {
  readonly minEmotionCount: number;
  readonly bannedTags: readonly string[];
  readonly bannedNames: readonly string[];
  readonly excludedLanguageMarkers: readonly string[];
  readonly variantMarker: string;
}

export const DEFAULT_MIN_EMOTION_COUNT = 6;

export const DEFAULT_VARIANT_MARKER = '_ZH';

// Extras, crowd roles and tags too generic to pick a voice from (simplified and traditional spellings).
export const DEFAULT_BANNED_TAGS = [
  '普通',
  '平民',
  '龙套',
  '龍套',
  '路人',
  '村民',
  '士兵',
  '卫兵',
  '守卫',
  '男',
  '女',
  '怪物',
  '生物',
  '纯水精灵',
  '元素生命',
  '丘丘人'
] as const;

export const DEFAULT_BANNED_NAMES = ['NPC', '系统', '旁白', '未知', '大叔', '小孩', '少女'] as const;

export const DEFAULT_EXCLUDED_LANGUAGE_MARKERS = [
  '_en',
  '_ja',
  'english',
  'japanese',
  '英语',
  '日语'
] as const;

type Env = Record<string, string | undefined>;

export function parseStringList(raw: string | undefined, label: string): string[] | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!trimmed) return [];

  const candidates: string[] = [];
  let parsedJson = false;

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        parsedJson = true;
        for (const entry of parsed) {
          if (typeof entry === 'string') {
            candidates.push(entry);
          } else if (entry !== null && entry !== undefined) {
            log.warn(`Ignoring non-string ${label} entry from JSON payload`, { entry });
          }
        }
      }
    } catch (error) {
      log.warn(`Failed to parse ${label} as JSON array, falling back to CSV parsing`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  if (!parsedJson) {
    candidates.push(...trimmed.split(/[,\s]+/));
  }

  const unique = new Set<string>();
  for (const token of candidates) {
    const value = token.trim();
    if (value) unique.add(value);
  }
  return [...unique];
}

export function parseNonNegativeInteger(raw: string | undefined, label: string): number | undefined {
  if (raw === undefined || !raw.trim()) return undefined;
  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${label} must be a non-negative integer, received "${raw}"`);
  }
  return Number.parseInt(value, 10);
}

function assertConfig(config: CurationConfig): CurationConfig {
  if (!Number.isInteger(config.minEmotionCount) || config.minEmotionCount < 0) {
    throw new ConfigError(`minEmotionCount must be a non-negative integer, received ${config.minEmotionCount}`);
  }
  if (!config.variantMarker) {
    throw new ConfigError('variantMarker must not be empty');
  }
  return config;
}

export function loadCurationConfig(env: Env = process.env, overrides?: Partial<CurationConfig>): CurationConfig {
  const minEmotionCount =
    overrides?.minEmotionCount ??
    parseNonNegativeInteger(env.MIN_EMOTION_COUNT, 'MIN_EMOTION_COUNT') ??
    DEFAULT_MIN_EMOTION_COUNT;
  const bannedTags =
    overrides?.bannedTags ?? parseStringList(env.BANNED_TAGS, 'BANNED_TAGS') ?? DEFAULT_BANNED_TAGS;
  const bannedNames =
    overrides?.bannedNames ?? parseStringList(env.BANNED_NAMES, 'BANNED_NAMES') ?? DEFAULT_BANNED_NAMES;
  const excludedLanguageMarkers =
    overrides?.excludedLanguageMarkers ??
    parseStringList(env.EXCLUDED_LANGUAGE_MARKERS, 'EXCLUDED_LANGUAGE_MARKERS') ??
    DEFAULT_EXCLUDED_LANGUAGE_MARKERS;
  const variantMarker = overrides?.variantMarker ?? env.VARIANT_MARKER?.trim() ?? DEFAULT_VARIANT_MARKER;

  return Object.freeze(
    assertConfig({
      minEmotionCount,
      bannedTags: Object.freeze([...bannedTags]),
      bannedNames: Object.freeze([...bannedNames]),
      excludedLanguageMarkers: Object.freeze([...excludedLanguageMarkers]),
      variantMarker
    })
  );
}
