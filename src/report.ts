import type { CurationConfig } from './config/curation.js';
import type { CurationResult } from './transform.js';
import type { CurationSummary, MergeEntry, Rejection, RejectionReason } from './types/index.js';

export interface CurationReport {
  generatedAt: string;
  input: string;
  output: string;
  config: CurationConfig;
  summary: CurationSummary;
  excluded: string[];
  merges: MergeEntry[];
  rejections: Record<RejectionReason, Rejection[]>;
}

export interface ReportMeta {
  inputPath: string;
  outputPath: string;
  config: CurationConfig;
  now?: Date;
}

export function groupRejections(rejections: readonly Rejection[]): Record<RejectionReason, Rejection[]> {
  const grouped: Record<RejectionReason, Rejection[]> = {
    'emotion-coverage': [],
    'banned-tag': [],
    'banned-name': []
  };
  for (const rejection of rejections) {
    grouped[rejection.reason].push(rejection);
  }
  return grouped;
}

export function buildCurationReport(result: CurationResult, meta: ReportMeta): CurationReport {
  return {
    generatedAt: (meta.now ?? new Date()).toISOString(),
    input: meta.inputPath,
    output: meta.outputPath,
    config: meta.config,
    summary: result.summary,
    excluded: [...result.merge.excluded],
    merges: [...result.merge.merges],
    rejections: groupRejections(result.filter.rejections)
  };
}
