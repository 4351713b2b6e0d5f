import type { QualityConfig } from '../config';
import { DEFAULT_RRF_K, rrfContribution } from './fuser';
import type { ConfidenceTier, FusedEntry, FusedResult, QualityMetrics } from './types';

export interface AssessOptions {
  /** Number of results the caller asked for. */
  requested: number;
  quality: QualityConfig;
  k?: number;
}

/** Fused score relative to a single first-place contribution, capped at 1. */
export function normalizedQuality(entry: FusedEntry, k: number = DEFAULT_RRF_K): number {
  return Math.min(1, entry.score / rrfContribution(1, k));
}

export function assessQuality(fused: FusedResult, options: AssessOptions): QualityMetrics {
  const requested = Math.max(1, options.requested);
  const k = options.k ?? DEFAULT_RRF_K;
  const { highThreshold, mediumThreshold, qualityThreshold, minCoverage } = options.quality;

  const top = fused.entries.slice(0, requested).map((e) => normalizedQuality(e, k));
  const minTopScore = top.length < requested ? 0 : Math.min(...top);
  const aboveThreshold = top.filter((s) => s > qualityThreshold).length;
  const coverage = aboveThreshold / requested;

  let confidence: ConfidenceTier = 'low';
  if (minTopScore > highThreshold) confidence = 'high';
  else if (minTopScore > mediumThreshold) confidence = 'medium';

  return {
    confidence,
    coverage,
    needsEscalation: confidence === 'low' || coverage < minCoverage,
    minTopScore,
    resultCount: fused.entries.length,
  };
}
