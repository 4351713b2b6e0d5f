import { z } from 'zod';
import { createLogger } from '../log';
import { MalformedParameterError } from '../errors';
import type { QueryParams, YearRange } from './types';

const log = createLogger({ component: 'retrieval', kind: 'params' });

const PARTICLE = '(?:van|von|der|den|de|del|della|da|di|du|la|le)';
const NAME_WORD = "[A-Z][a-zA-Z'\\-]+";
/** Capitalized name words, optionally joined by lowercase particles (O'Brien, McDonald, van der Waals). */
export const AUTHOR_NAME = `(?:${PARTICLE}\\s+)*${NAME_WORD}(?:\\s+(?:${PARTICLE}\\s+)*${NAME_WORD})*`;

const AUTHOR_AFTER_PREPOSITION = new RegExp(`\\b(?:with|of|by|for)\\s+(${AUTHOR_NAME})`);
const AUTHOR_POSSESSIVE = new RegExp(`\\b(${AUTHOR_NAME})'s\\s+(?:work|papers|research|study|studies)\\b`);
const AUTHOR_LABEL = /\bauthor:\s*([A-Za-z][A-Za-z'\- ]*[A-Za-z])/i;

const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/g;
const PAPER_ID_PATTERN = /\b(?=[A-Z0-9]*\d)(?=[A-Z0-9]*[A-Z])[A-Z0-9]{8}\b/;

const CONCEPT_BOUNDARY =
  '(?=\\s+(?:evolv\\w*|chang\\w*|develop\\w*|progress\\w*|emerg\\w*|from|since|over|between|during|in)\\b|\\s*[?.!,;]|\\s*$)';
const CONCEPT_AFTER_PREPOSITION = new RegExp(
  `\\b(?:of|on|about|for|to|around|regarding)\\s+((?:[a-zA-Z][a-zA-Z\\-]*\\s*){1,4}?)${CONCEPT_BOUNDARY}`,
  'i'
);
const CONCEPT_HOW_DID = /\bhow\s+(?:did|has|have)\s+(.{3,40}?)\s+(?:evolv\w*|chang\w*|develop\w*|progress\w*|emerg\w*)\b/i;

const CONCEPT_STOPWORDS = new Set(['the', 'a', 'an', 'this', 'that', 'these', 'papers', 'paper', 'research', 'studies', 'work', 'time']);

export function extractAuthor(text: string): string | undefined {
  const m =
    AUTHOR_AFTER_PREPOSITION.exec(text) ?? AUTHOR_POSSESSIVE.exec(text) ?? AUTHOR_LABEL.exec(text);
  const name = m?.[1]?.trim();
  return name ? name : undefined;
}

export function extractYears(text: string): number[] {
  const out: number[] = [];
  for (const m of text.matchAll(YEAR_PATTERN)) out.push(Number(m[0]));
  return out;
}

export function yearRangeFrom(years: number[]): YearRange | undefined {
  if (years.length < 2) return undefined;
  return { start: years[0], end: years[years.length - 1] };
}

export function extractConcept(text: string): string | undefined {
  const m = CONCEPT_AFTER_PREPOSITION.exec(text) ?? CONCEPT_HOW_DID.exec(text);
  const raw = m?.[1]?.trim().replace(/\s+/g, ' ');
  if (!raw) return undefined;
  const words = raw.split(' ');
  while (words.length > 0 && CONCEPT_STOPWORDS.has((words[0] ?? '').toLowerCase())) words.shift();
  const concept = words.join(' ');
  return concept.length >= 3 ? concept : undefined;
}

export function extractPaperId(text: string): string | undefined {
  return PAPER_ID_PATTERN.exec(text)?.[0];
}

const yearSchema = z.number().int().min(1900).max(2099);

const ParamSchemas = {
  paperId: z.string().trim().regex(/^[A-Za-z0-9_\-:.\/]{1,64}$/),
  author: z.string().trim().min(2).max(120),
  concept: z.string().trim().min(2).max(120),
  field: z.string().trim().min(2).max(120),
};

/**
 * Validates parameters field by field. Malformed fields are dropped and
 * logged; the remaining fields are returned.
 */
export function sanitizeParams(raw: QueryParams): QueryParams {
  const out: QueryParams = {};
  const drop = (field: string, value: unknown, reason: string) => {
    const err = new MalformedParameterError(field, value, reason);
    log.warn('parameter_dropped', { field, value, reason: err.message, code: err.code });
  };

  for (const field of ['paperId', 'author', 'concept', 'field'] as const) {
    const value = raw[field];
    if (value === undefined) continue;
    const parsed = ParamSchemas[field].safeParse(value);
    if (parsed.success) out[field] = parsed.data;
    else drop(field, value, parsed.error.issues[0]?.message ?? 'invalid');
  }

  if (raw.years) {
    const years = raw.years.filter((y) => {
      const ok = yearSchema.safeParse(y).success;
      if (!ok) drop('years', y, 'year outside 1900-2099');
      return ok;
    });
    if (years.length > 0) out.years = years;
  }

  if (raw.yearRange) {
    const { start, end } = raw.yearRange;
    const range: YearRange = {};
    if (start !== undefined) {
      if (yearSchema.safeParse(start).success) range.start = start;
      else drop('yearRange.start', start, 'year outside 1900-2099');
    }
    if (end !== undefined) {
      if (yearSchema.safeParse(end).success) range.end = end;
      else drop('yearRange.end', end, 'year outside 1900-2099');
    }
    if (range.start !== undefined && range.end !== undefined && range.start > range.end) {
      drop('yearRange', raw.yearRange, 'start year is after end year');
    } else if (range.start !== undefined || range.end !== undefined) {
      out.yearRange = range;
    }
  }

  return out;
}

/** Caller-supplied values win over values extracted from the text. */
export function mergeParams(extracted: QueryParams, supplied: QueryParams): QueryParams {
  const merged: QueryParams = { ...extracted };
  for (const [key, value] of Object.entries(supplied)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}
