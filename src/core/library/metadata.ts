import type { MetadataFilters, MetadataSearch } from '../backends/types';
import type { Item } from '../retrieval/types';
import { authorMatches, compareIds, contentTokens, inYearRange, type LibraryCorpus } from './corpus';
import type { Paper } from './schema';

function hasStructuredFilter(f: MetadataFilters): boolean {
  return Boolean(f.author || f.title || f.venue || (f.years && f.years.length > 0) || f.yearRange);
}

function passes(paper: Paper, f: MetadataFilters): boolean {
  if (f.author && !paper.authors.some((a) => authorMatches(a, f.author ?? ''))) return false;
  if (f.title && !paper.title.toLowerCase().includes(f.title.toLowerCase())) return false;
  if (f.venue && !(paper.venue ?? '').toLowerCase().includes(f.venue.toLowerCase())) return false;
  if (f.years && f.years.length > 0 && (paper.year === undefined || !f.years.includes(paper.year))) return false;
  return inYearRange(paper.year, f.yearRange);
}

/** Bibliographic lookup: structured filters narrow, free-text token overlap ranks. */
export class LibraryMetadataSearch implements MetadataSearch {
  constructor(private readonly corpus: LibraryCorpus) {}

  async search(filters: MetadataFilters, limit: number): Promise<Item[]> {
    const structured = hasStructuredFilter(filters);
    const tokens = contentTokens(filters.text ?? '');
    const scored: Array<{ paper: Paper; score: number }> = [];
    for (const paper of this.corpus.papers) {
      if (!passes(paper, filters)) continue;
      const haystack = new Set(contentTokens([paper.title, paper.venue ?? '', paper.authors.join(' ')].join(' ')));
      const overlap = tokens.filter((t) => haystack.has(t)).length;
      if (!structured && overlap === 0) continue;
      scored.push({ paper, score: (structured ? 1 : 0) + overlap });
    }
    return scored
      .sort((a, b) => b.score - a.score || (b.paper.year ?? 0) - (a.paper.year ?? 0) || compareIds(a.paper.id, b.paper.id))
      .slice(0, Math.max(0, limit))
      .map((s) => this.corpus.toItem(s.paper, s.score));
  }
}
