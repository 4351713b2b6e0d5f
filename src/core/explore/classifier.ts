import {
  CITATION_PATTERNS,
  COLLABORATION_PATTERNS,
  CONCEPT_NETWORK_PATTERNS,
  CONTENT_SIMILARITY_PATTERNS,
  INFLUENCE_PATTERNS,
  TEMPORAL_PATTERNS,
  VENUE_PATTERNS,
} from '../retrieval/classifier';
import { extractAuthor, extractConcept, extractPaperId, extractYears, yearRangeFrom } from '../retrieval/params';
import type { GraphStrategy, QueryParams } from '../retrieval/types';

export const RELATED_PATTERNS: readonly RegExp[] = [
  /\b(related|connected)\s+(papers?|to)\b/,
  /\bpapers?\s+(related|connected)\s+to\b/,
  /\bshared\s+(entities|authors?|concepts?)\b/,
  /\bwhat\s+(else|other\s+papers?)\s+(is|are)\s+(related|connected)\b/,
];

export interface StrategyRule {
  strategy: GraphStrategy;
  confidence: number;
  patterns: readonly RegExp[];
}

/** Content similarity precedes related so "similar to" never routes to the graph. */
export const EXPLORATION_RULES: readonly StrategyRule[] = [
  { strategy: 'citation', confidence: 0.9, patterns: CITATION_PATTERNS },
  { strategy: 'influence', confidence: 0.9, patterns: INFLUENCE_PATTERNS },
  { strategy: 'content-similarity', confidence: 0.85, patterns: CONTENT_SIMILARITY_PATTERNS },
  { strategy: 'collaboration', confidence: 0.9, patterns: COLLABORATION_PATTERNS },
  { strategy: 'temporal', confidence: 0.85, patterns: TEMPORAL_PATTERNS },
  { strategy: 'concept-network', confidence: 0.85, patterns: CONCEPT_NETWORK_PATTERNS },
  { strategy: 'venue', confidence: 0.8, patterns: VENUE_PATTERNS },
  { strategy: 'related', confidence: 0.75, patterns: RELATED_PATTERNS },
];

export const EXPLORATION_FALLBACK = { strategy: 'comprehensive', confidence: 0.6 } as const;

export interface ClassifiedStrategy {
  strategy: GraphStrategy;
  confidence: number;
  params: QueryParams;
}

export function extractExplorationParams(text: string): QueryParams {
  const out: QueryParams = {};
  const paperId = extractPaperId(text);
  if (paperId) out.paperId = paperId;
  const author = extractAuthor(text);
  if (author) out.author = author;
  const concept = extractConcept(text);
  if (concept) out.concept = concept;
  const years = extractYears(text);
  if (years.length > 0) out.years = years;
  const yearRange = yearRangeFrom(years);
  if (yearRange) out.yearRange = yearRange;
  return out;
}

export function classifyExploration(text: string, rules: readonly StrategyRule[] = EXPLORATION_RULES): ClassifiedStrategy {
  const original = String(text ?? '').trim();
  const lower = original.toLowerCase();
  const params = extractExplorationParams(original);
  for (const rule of rules) {
    if (rule.patterns.some((p) => p.test(lower))) {
      return { strategy: rule.strategy, confidence: rule.confidence, params };
    }
  }
  return { ...EXPLORATION_FALLBACK, params };
}
