import type { SubQuery } from './types';

export const SUBQUERY_WEIGHTS = {
  required: 1.0,
  optional: 0.7,
  primary: 1.0,
  prepositional: 0.6,
  commaPart: 0.5,
  nounPhrase: 0.4,
} as const;

const STOPWORDS = new Set([
  'a', 'an', 'the', 'of', 'on', 'in', 'for', 'to', 'with', 'about', 'and', 'or', 'by', 'from', 'at',
  'find', 'show', 'me', 'get', 'list', 'search', 'look', 'give', 'any', 'some', 'all',
  'paper', 'papers', 'article', 'articles', 'study', 'studies', 'research', 'work', 'works', 'literature',
  'what', 'which', 'who', 'how', 'is', 'are', 'was', 'were', 'do', 'does', 'did',
]);

const PREPOSITIONAL = /^(.+?)\b(in|about|regarding|concerning|for|during|with respect to)\b(.+)$/i;
const CAPITALIZED_PHRASE = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g;

function hasContent(segment: string): boolean {
  return segment
    .toLowerCase()
    .split(/[^a-z0-9\-']+/g)
    .some((w) => w.length > 1 && !STOPWORDS.has(w) && !/^\d+$/.test(w));
}

function splitOn(text: string, separator: RegExp): string[] {
  return text
    .split(separator)
    .map((s) => s.trim())
    .filter(Boolean);
}

function allSubstantive(parts: string[]): boolean {
  return parts.length > 1 && parts.every(hasContent);
}

function single(text: string): SubQuery[] {
  return [{ text, role: 'primary', weight: SUBQUERY_WEIGHTS.primary }];
}

function normalize(query: string): string {
  return String(query ?? '').trim().replace(/\s+/g, ' ');
}

/** Splits on upper-case `AND`/`OR` operators, or returns null when neither applies. */
export function splitBooleanQuery(query: string): SubQuery[] | null {
  const text = normalize(query);

  const andParts = splitOn(text, /\s+AND\s+/);
  if (allSubstantive(andParts)) {
    return andParts.map((p) => ({ text: p, role: 'required', weight: SUBQUERY_WEIGHTS.required }));
  }

  const orParts = splitOn(text, /\s+OR\s+/);
  if (allSubstantive(orParts)) {
    return orParts.map((p) => ({ text: p, role: 'optional', weight: SUBQUERY_WEIGHTS.optional }));
  }
  return null;
}

/**
 * Splits a multi-concept query into weighted sub-queries. Patterns are tried in
 * order; a pattern only applies when every produced segment carries a content
 * word. Returns a single primary sub-query when nothing applies.
 */
export function decomposeQuery(query: string): SubQuery[] {
  const text = normalize(query);
  if (!text) return [];

  const boolean = splitBooleanQuery(text);
  if (boolean) return boolean;

  const conjParts = splitOn(text, /\s+(?:and|plus|with(?!\s+respect\s+to\b))\s+/);
  if (allSubstantive(conjParts)) {
    return conjParts.map((p) => ({ text: p, role: 'required', weight: SUBQUERY_WEIGHTS.required }));
  }

  const altParts = splitOn(text, /\s+(?:or|versus|vs\.?)\s+/);
  if (allSubstantive(altParts)) {
    return altParts.map((p) => ({ text: p, role: 'optional', weight: SUBQUERY_WEIGHTS.optional }));
  }

  if (text.includes(',')) {
    const parts = splitOn(text, /\s*,\s*/);
    if (allSubstantive(parts)) {
      return [
        ...single(text),
        ...parts.map((p): SubQuery => ({ text: p, role: 'supporting', weight: SUBQUERY_WEIGHTS.commaPart })),
      ];
    }
  }

  const prep = PREPOSITIONAL.exec(text);
  if (prep) {
    const first = (prep[1] ?? '').trim();
    const second = (prep[3] ?? '').trim();
    if (allSubstantive([first, second])) {
      return [
        ...single(text),
        { text: first, role: 'supporting', weight: SUBQUERY_WEIGHTS.prepositional },
        { text: second, role: 'supporting', weight: SUBQUERY_WEIGHTS.prepositional },
      ];
    }
  }

  const phrases = Array.from(text.matchAll(CAPITALIZED_PHRASE), (m) => m[0]);
  if (phrases.length >= 2) {
    const multiWord = phrases.filter((p) => p.includes(' ')).slice(0, 3);
    if (multiWord.length > 0) {
      return [
        ...single(text),
        ...multiWord.map((p): SubQuery => ({ text: p, role: 'supporting', weight: SUBQUERY_WEIGHTS.nounPhrase })),
      ];
    }
  }

  return single(text);
}
