import { createLogger } from '../log';

const log = createLogger({ component: 'summarize', kind: 'classifier' });

export const SUMMARY_DEPTHS = ['quick', 'targeted', 'comprehensive', 'full'] as const;
export type SummaryDepth = (typeof SUMMARY_DEPTHS)[number];

export const QUICK_PATTERNS: readonly RegExp[] = [
  /\bwhat\s+is\s+this\s+(paper|article|study|document)\s+about\b/,
  /\b(give|show)\s+(me\s+)?(an?\s+)?overview\b/,
  /\b(give|show)\s+(me\s+)?(the\s+)?abstract\b/,
  /\bbasic\s+info(rmation)?\b/,
  /\bquick\s+(summary|overview)\b/,
  /\bwho\s+(are\s+)?the\s+authors?\b/,
  /\bwhen\s+was\s+this\s+published\b/,
  /\bwhat\s+(journal|conference|venue)\b/,
  /\bcitation\s+info(rmation)?\b/,
];

export const TARGETED_PATTERNS: readonly RegExp[] = [
  /\bwhat\s+(methodology|method|approach|technique)\b/,
  /\bhow\s+did\s+(they|the\s+authors)\b/,
  /\bwhat\s+(were|are)\s+the\s+(main\s+)?(findings|results|conclusions)\b/,
  /\bwhat\s+(data|dataset|sample)\b/,
  /\bhow\s+(was|were)\s+\w+\s+(measured|assessed|evaluated|analyzed)\b/,
  /\bwhat\s+(statistical|analysis)\s+methods?\b/,
  /\bwhat\s+(limitations|weaknesses)\b/,
  /\bwhat\s+implications?\b/,
  /\bwhat\s+(theoretical|conceptual)\s+framework\b/,
];

export const COMPREHENSIVE_PATTERNS: readonly RegExp[] = [
  /\bsummarize\s+(this\s+)?(paper|article|study)\s+comprehensively\b/,
  /\bsummarize\s+(the\s+)?entire\s+(paper|article|study)\b/,
  /\b(give|provide)\s+(me\s+)?a\s+(complete|full|detailed|thorough)\s+summary\b/,
  /\bsummarize\s+(all|everything)\b/,
  /\btell\s+me\s+everything\s+about\s+this\s+(paper|article|study)\b/,
  /\b(what|describe)\s+(are\s+)?all\s+(the\s+)?(aspects|components|sections)\b/,
];

export const FULL_PATTERNS: readonly RegExp[] = [
  /\bextract\s+all\s+\w+/,
  /\bget\s+(the\s+)?(complete|full|entire|raw)\s+text\b/,
  /\bfull\s+text\s+of\b/,
  /\b(find|get|show)\s+all\s+(equations|formulas|figures|tables)\b/,
  /\bword\s+count\b/,
  /\bexport\s+(the\s+)?text\b/,
  /\bget\s+everything\b/,
];

export interface DepthRule {
  depth: SummaryDepth;
  confidence: number;
  patterns: readonly RegExp[];
}

/** Most specific first. */
export const DEPTH_RULES: readonly DepthRule[] = [
  { depth: 'full', confidence: 0.95, patterns: FULL_PATTERNS },
  { depth: 'comprehensive', confidence: 0.9, patterns: COMPREHENSIVE_PATTERNS },
  { depth: 'quick', confidence: 0.85, patterns: QUICK_PATTERNS },
  { depth: 'targeted', confidence: 0.8, patterns: TARGETED_PATTERNS },
];

const QUESTION_WORD = /\b(what|how|why|which|where|when)\b/;
const SHORT_QUERY_WORDS = 5;

export interface ClassifiedDepth {
  depth: SummaryDepth;
  confidence: number;
}

export function classifyDepth(query: string | undefined, rules: readonly DepthRule[] = DEPTH_RULES): ClassifiedDepth {
  const lower = String(query ?? '').trim().toLowerCase();
  if (!lower) return { depth: 'quick', confidence: 1.0 };

  for (const rule of rules) {
    if (rule.patterns.some((p) => p.test(lower))) return { depth: rule.depth, confidence: rule.confidence };
  }

  const words = lower.split(/\s+/).length;
  const fallback: ClassifiedDepth =
    words <= SHORT_QUERY_WORDS
      ? { depth: 'quick', confidence: 0.6 }
      : QUESTION_WORD.test(lower)
        ? { depth: 'targeted', confidence: 0.65 }
        : { depth: 'targeted', confidence: 0.6 };
  log.debug('depth_fallback', { words, depth: fallback.depth });
  return fallback;
}
