import { createLogger } from '../log';
import {
  extractAuthor,
  extractConcept,
  extractPaperId,
  extractYears,
  yearRangeFrom,
} from './params';
import type { ClassifiedIntent, Intent, QueryParams } from './types';

const log = createLogger({ component: 'retrieval', kind: 'classifier' });

export interface IntentRule {
  intent: Intent;
  confidence: number;
  patterns: readonly RegExp[];
  /** Patterns tested against the original text instead of the lowercased one. */
  caseSensitive?: boolean;
  extract?: (text: string) => QueryParams;
}

export const CITATION_PATTERNS: readonly RegExp[] = [
  /\bcit(ing|ation|ed?)\s+(papers?|chain|network)\b/,
  /\bpapers?\s+(citing|that\s+cite)\b/,
  /\bcitation\s+(chain|network|path)\b/,
  /\b(multi-hop|multihop)\s+cit/,
];

export const INFLUENCE_PATTERNS: readonly RegExp[] = [
  /\b(seminal|influential|foundational|key|important|highly-cited)\s+papers?\b/,
  /\bmost\s+(influential|cited|important)\b/,
  /\b(top|best|leading)\s+papers?\b/,
  /\bpagerank\b/,
  /\binfluence\s+(score|metric|analysis)\b/,
];

export const CONTENT_SIMILARITY_PATTERNS: readonly RegExp[] = [
  /\b(similar|like|resembling)\s+(to|this)\b/,
  /\bmore\s+(like|similar)\b/,
  /\bcontent-based\s+similarit/,
  /\bsemantically\s+similar\b/,
  /\b(methodology|approach)\s+similar\b/,
];

export const COLLABORATION_PATTERNS: readonly RegExp[] = [
  /\bcollaborat\w*\b/,
  /\bco-author/,
  /\bco author\b/,
  /\b(worked|works|working)\s+with\b/,
  /\bauthorship\s+network\b/,
  /\bwho\s+(did|does)\s+\w+\s+(work|collaborate)\s+with\b/,
];

export const TEMPORAL_PATTERNS: readonly RegExp[] = [
  /\b(evolv(e|ed|ing|ution)|develop(ed|ment)|progress(ed|ion))\b.*\b(from|since|over|between)\b.*\d{4}/,
  /\btrack\w*\b.*\b(over\s+time|temporal|chronological|historical)\b/,
  /\bhow\s+(did|has)\b.*\b(chang(e|ed)|evolv(e|ed)|develop(ed)?)\b/,
  /\b(trend|trajectory|timeline)\b.*\d{4}/,
  /\bfrom\s+\d{4}\s+to\s+\d{4}\b/,
];

export const CONCEPT_NETWORK_PATTERNS: readonly RegExp[] = [
  /\bconcepts?\s+(related|connected)\s+to\b/,
  /\b(related|connected)\s+concepts?\b/,
  /\bconcept\s+(network|propagation|relationships?)\b/,
  /\b(intermediate|bridging)\s+concepts?\b/,
];

export const VENUE_PATTERNS: readonly RegExp[] = [
  /\b(journal|conference|venue|publication\s+outlet)s?\b/,
  /\bwhere\s+(was|were|are|is)\b.*\bpublished\b/,
  /\bpublication\s+(venue|outlet|pattern)s?\b/,
];

export const RELATIONSHIP_PATTERNS: readonly RegExp[] = [
  /\b(citation|cited|citing|cites)\b/,
  /\b(network|connection|related to|connected to)\b/,
  /\b(influenced by|builds on)\b/,
  /\b(relationship between|links between)\b/,
  /\bshared\s+(entities|authors?|concepts?)\b/,
  /\bwho\s+(has\s+)?(studied|researched|wrote|published|examined|investigated|explored)\b/,
  /\b(which|what)\s+(authors|researchers|scientists|scholars)\b/,
  /\b(researchers|authors|scholars)\s+(working|focusing|studying)\s+on\b/,
];

export const METADATA_PATTERNS: readonly RegExp[] = [
  /\bby\s+(?:(?:van|von|der|den|de|da|di|du|la|le)\s+)*[A-Z][a-zA-Z'\-]+/,
  /\b[A-Z][a-zA-Z'\-]+'s\s+(work|papers|research|study|studies)\b/,
  /\bpublished in\s+\d{4}\b/,
  /\bpublished in\s+[A-Z]/,
  /\bin\s+\d{4}\b/,
  /\bfrom\s+\d{4}\b/,
  /\bauthor:\s*[A-Za-z]/,
];

function withPaperId(text: string): QueryParams {
  const paperId = extractPaperId(text);
  return paperId ? { paperId } : {};
}

function withAuthor(text: string): QueryParams {
  const author = extractAuthor(text);
  return author ? { author } : {};
}

function withConcept(text: string): QueryParams {
  const concept = extractConcept(text);
  return concept ? { concept } : {};
}

function withYears(text: string): QueryParams {
  const years = extractYears(text);
  if (years.length === 0) return {};
  const yearRange = yearRangeFrom(years);
  return yearRange ? { years, yearRange } : { years };
}

/** First match wins; confidences are fixed per category. */
export const DEFAULT_INTENT_RULES: readonly IntentRule[] = [
  { intent: 'citation', confidence: 0.9, patterns: CITATION_PATTERNS, extract: withPaperId },
  { intent: 'influence', confidence: 0.9, patterns: INFLUENCE_PATTERNS },
  { intent: 'content-similarity', confidence: 0.85, patterns: CONTENT_SIMILARITY_PATTERNS, extract: withPaperId },
  { intent: 'collaboration', confidence: 0.9, patterns: COLLABORATION_PATTERNS, extract: withAuthor },
  {
    intent: 'temporal',
    confidence: 0.85,
    patterns: TEMPORAL_PATTERNS,
    extract: (text) => ({ ...withYears(text), ...withConcept(text) }),
  },
  { intent: 'concept-network', confidence: 0.85, patterns: CONCEPT_NETWORK_PATTERNS, extract: withConcept },
  { intent: 'venue', confidence: 0.8, patterns: VENUE_PATTERNS, extract: withYears },
  {
    intent: 'relationship',
    confidence: 0.9,
    patterns: RELATIONSHIP_PATTERNS,
    extract: (text) => ({ ...withAuthor(text), ...withPaperId(text) }),
  },
  {
    intent: 'metadata',
    confidence: 0.8,
    patterns: METADATA_PATTERNS,
    caseSensitive: true,
    extract: (text) => ({ ...withAuthor(text), ...withYears(text) }),
  },
];

export const FALLBACK_INTENT: Readonly<{ intent: Intent; confidence: number }> = { intent: 'semantic', confidence: 0.7 };

export function classifyIntent(text: string, rules: readonly IntentRule[] = DEFAULT_INTENT_RULES): ClassifiedIntent {
  const original = String(text ?? '').trim();
  const lower = original.toLowerCase();
  for (const rule of rules) {
    const subject = rule.caseSensitive ? original : lower;
    if (!rule.patterns.some((p) => p.test(subject))) continue;
    return {
      intent: rule.intent,
      confidence: rule.confidence,
      params: rule.extract ? rule.extract(original) : {},
    };
  }
  log.debug('classification_fallback', { intent: FALLBACK_INTENT.intent });
  return { ...FALLBACK_INTENT, params: {} };
}
