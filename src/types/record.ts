export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface VoiceRecord {
  tags?: JsonValue;
  emotion?: JsonValue;
  [field: string]: JsonValue | undefined;
}

export type Dataset = Record<string, VoiceRecord>;

export type EmotionShape =
  | { kind: 'sequence'; entries: readonly JsonValue[] }
  | { kind: 'legacy-map'; first?: JsonValue }
  | { kind: 'absent' }
  | { kind: 'unrecognized'; value: JsonValue };

export interface CuratedEntry {
  key: string;
  record: VoiceRecord;
  tags: string[];
  emotion: EmotionShape['kind'];
  emotionCount: number;
}

export type RejectionReason = 'emotion-coverage' | 'banned-tag' | 'banned-name';

export type Rejection =
  | {
      key: string;
      reason: 'emotion-coverage';
      emotionCount: number;
      required: number;
      shape: EmotionShape['kind'];
    }
  | { key: string; reason: 'banned-tag'; tag: string; banned: string }
  | { key: string; reason: 'banned-name'; name: string };

export interface MergeEntry {
  canonical: string;
  kept: string;
  absorbed: string[];
  addedTags: string[];
}

export interface CurationSummary {
  original: number;
  excluded: number;
  merged: number;
  final: number;
  removed: number;
}
