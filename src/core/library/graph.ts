import { createLogger } from '../log';
import type { GraphEntityRecord, GraphQuery, GraphQueryParams, GraphRecord } from '../backends/types';
import type { GraphStrategy } from '../retrieval/types';
import { authorMatches, compareIds, conceptMatches, contentTokens, inYearRange, type LibraryCorpus } from './corpus';
import type { Paper } from './schema';

const log = createLogger({ component: 'library', kind: 'graph' });

const DEFAULT_MAX_HOPS = 2;

function fieldMatches(paper: Paper, field: string | undefined): boolean {
  if (!field) return true;
  const f = field.toLowerCase();
  return paper.fields.some((x) => x.toLowerCase().includes(f)) || paper.concepts.some((x) => x.toLowerCase().includes(f));
}

function sortEntities(list: GraphEntityRecord[]): GraphEntityRecord[] {
  return list.sort((a, b) => b.score - a.score || a.name.localeCompare(b.name));
}

/**
 * Graph queries answered from the library's citation, co-authorship, concept
 * and venue relations.
 */
export class LibraryGraph implements GraphQuery {
  constructor(private readonly corpus: LibraryCorpus) {}

  async query(strategy: GraphStrategy, params: GraphQueryParams, limit: number): Promise<GraphRecord[]> {
    const n = Math.max(0, limit);
    const records = this.dispatch(strategy, params);
    log.debug('graph_query', { strategy, count: records.length });
    return records.slice(0, n);
  }

  private dispatch(strategy: GraphStrategy, params: GraphQueryParams): GraphRecord[] {
    switch (strategy) {
      case 'citation':
        return this.citationChain(params);
      case 'influence':
        return this.influential(params);
      case 'related':
        return this.related(params);
      case 'content-similarity':
        return this.similarContent(params);
      case 'collaboration':
        return this.collaborators(params);
      case 'concept-network':
        return this.conceptNetwork(params);
      case 'temporal':
        return this.temporal(params);
      case 'venue':
        return this.venues(params);
      case 'comprehensive':
        return this.entitySearch(params);
    }
  }

  private sourcePaper(params: GraphQueryParams): Paper | undefined {
    if (params.paperId) return this.corpus.get(params.paperId);
    return params.query ? this.corpus.resolveByText(params.query) : undefined;
  }

  /** Papers citing the source, then papers citing those, up to `maxHops`. */
  private citationChain(params: GraphQueryParams): GraphRecord[] {
    const source = this.sourcePaper(params);
    if (!source) return [];
    const maxHops = Math.max(1, params.maxHops ?? DEFAULT_MAX_HOPS);
    const seen = new Set<string>([source.id]);
    const out: GraphRecord[] = [];
    let frontier: Array<{ paper: Paper; path: string[] }> = [{ paper: source, path: [source.id] }];
    for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
      const next: Array<{ paper: Paper; path: string[] }> = [];
      for (const { paper, path } of frontier) {
        const citing = this.corpus.citing(paper.id).sort((a, b) => compareIds(a.id, b.id));
        for (const c of citing) {
          if (seen.has(c.id)) continue;
          seen.add(c.id);
          const nextPath = [...path, c.id];
          out.push({ kind: 'item', item: this.corpus.toItem(c, 1 / hop, { hops: hop }), details: { hops: hop, path: nextPath } });
          next.push({ paper: c, path: nextPath });
        }
      }
      frontier = next;
    }
    return out;
  }

  private influential(params: GraphQueryParams): GraphRecord[] {
    return this.corpus.papers
      .filter((p) => fieldMatches(p, params.field) && (!params.concept || conceptMatches(p, params.concept)))
      .map((p) => ({ paper: p, count: this.corpus.citationCount(p.id) }))
      .filter((x) => x.count > 0)
      .sort((a, b) => b.count - a.count || compareIds(a.paper.id, b.paper.id))
      .map(({ paper, count }) => ({
        kind: 'item' as const,
        item: this.corpus.toItem(paper, count, { citedBy: count }),
        details: { citedBy: count },
      }));
  }

  /** Papers sharing authors, concepts or a direct citation with the source. */
  private related(params: GraphQueryParams): GraphRecord[] {
    const source = this.sourcePaper(params);
    if (!source) return [];
    const out: Array<{ paper: Paper; score: number; sharedAuthors: string[]; sharedConcepts: string[]; cites: boolean }> = [];
    for (const p of this.corpus.papers) {
      if (p.id === source.id) continue;
      const sharedAuthors = p.authors.filter((a) => source.authors.some((s) => authorMatches(s, a)));
      const sourceConcepts = source.concepts.map((c) => c.toLowerCase());
      const sharedConcepts = p.concepts.filter((c) => sourceConcepts.includes(c.toLowerCase()));
      const cites = p.cites.includes(source.id) || source.cites.includes(p.id);
      const score = sharedAuthors.length * 2 + sharedConcepts.length + (cites ? 1 : 0);
      if (score > 0) out.push({ paper: p, score, sharedAuthors, sharedConcepts, cites });
    }
    return out
      .sort((a, b) => b.score - a.score || compareIds(a.paper.id, b.paper.id))
      .map((r) => ({
        kind: 'item' as const,
        item: this.corpus.toItem(r.paper, r.score),
        details: { sharedAuthors: r.sharedAuthors, sharedConcepts: r.sharedConcepts, citationLink: r.cites },
      }));
  }

  private similarContent(params: GraphQueryParams): GraphRecord[] {
    const source = this.sourcePaper(params);
    if (!source) return [];
    const q = this.corpus.docVector(source);
    return this.corpus.papers
      .filter((p) => p.id !== source.id)
      .map((p) => ({ paper: p, score: this.corpus.similarity(q, p) }))
      .filter((x) => x.score > 0)
      .sort((a, b) => b.score - a.score || compareIds(a.paper.id, b.paper.id))
      .map((x) => ({ kind: 'item' as const, item: this.corpus.toItem(x.paper, x.score) }));
  }

  /** Co-authors of the author, expanded breadth-first up to `maxHops`. */
  private collaborators(params: GraphQueryParams): GraphRecord[] {
    const author = params.author;
    if (!author) return [];
    const maxHops = Math.max(1, params.maxHops ?? 1);
    const visited = new Set<string>();
    const out: GraphEntityRecord[] = [];
    let frontier = [author];

    for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
      const next: string[] = [];
      for (const name of frontier) {
        visited.add(name.toLowerCase());
        const papers = this.corpus.papersBy(name);
        const shared = new Map<string, Paper[]>();
        for (const p of papers) {
          for (const coauthor of p.authors) {
            if (authorMatches(coauthor, name) || authorMatches(coauthor, author)) continue;
            shared.set(coauthor, [...(shared.get(coauthor) ?? []), p]);
          }
        }
        for (const [coauthor, sharedPapers] of shared) {
          if (visited.has(coauthor.toLowerCase())) continue;
          visited.add(coauthor.toLowerCase());
          next.push(coauthor);
          out.push({
            kind: 'entity',
            id: `author:${coauthor}`,
            name: coauthor,
            type: 'author',
            score: sharedPapers.length / hop,
            relatedItems: sharedPapers.map((p) => this.corpus.toItem(p, sharedPapers.length / hop)),
            details: { hops: hop, via: name, sharedPapers: sharedPapers.length },
          });
        }
      }
      frontier = next;
    }
    return out.sort((a, b) => {
      const ha = Number(a.details?.hops ?? 0);
      const hb = Number(b.details?.hops ?? 0);
      return ha - hb || b.score - a.score || a.name.localeCompare(b.name);
    });
  }

  /** Concepts co-occurring with the seed concept, weighted by shared papers. */
  private conceptNetwork(params: GraphQueryParams): GraphRecord[] {
    const concept = params.concept;
    if (!concept) return [];
    const seed = concept.toLowerCase();
    const cooccur = new Map<string, Paper[]>();
    for (const p of this.corpus.papers) {
      if (!conceptMatches(p, concept)) continue;
      for (const c of p.concepts) {
        if (c.toLowerCase() === seed || c.toLowerCase().includes(seed)) continue;
        cooccur.set(c, [...(cooccur.get(c) ?? []), p]);
      }
    }
    return sortEntities(
      Array.from(cooccur, ([name, papers]) => ({
        kind: 'entity' as const,
        id: `concept:${name.toLowerCase()}`,
        name,
        type: 'concept' as const,
        score: papers.length,
        relatedItems: papers.map((p) => this.corpus.toItem(p, papers.length)),
        details: { seed: concept, sharedPapers: papers.length },
      }))
    );
  }

  private temporal(params: GraphQueryParams): GraphRecord[] {
    const concept = params.concept;
    if (!concept) return [];
    return this.corpus.papers
      .filter((p) => p.year !== undefined && conceptMatches(p, concept) && inYearRange(p.year, params.yearRange))
      .sort((a, b) => (a.year ?? 0) - (b.year ?? 0) || compareIds(a.id, b.id))
      .map((p) => ({ kind: 'item' as const, item: this.corpus.toItem(p, 1), details: { year: p.year } }));
  }

  private venues(params: GraphQueryParams): GraphRecord[] {
    const byVenue = new Map<string, Paper[]>();
    for (const p of this.corpus.papers) {
      if (!p.venue || !fieldMatches(p, params.field) || !inYearRange(p.year, params.yearRange)) continue;
      if (params.concept && !conceptMatches(p, params.concept)) continue;
      byVenue.set(p.venue, [...(byVenue.get(p.venue) ?? []), p]);
    }
    return sortEntities(
      Array.from(byVenue, ([name, papers]) => ({
        kind: 'entity' as const,
        id: `venue:${name.toLowerCase()}`,
        name,
        type: 'venue' as const,
        score: papers.length,
        relatedItems: papers.map((p) => this.corpus.toItem(p, papers.length)),
        details: { papers: papers.length },
      }))
    );
  }

  /** Matches query tokens against authors, concepts and titles. */
  private entitySearch(params: GraphQueryParams): GraphRecord[] {
    const tokens = contentTokens([params.query ?? '', params.concept ?? '', params.author ?? ''].join(' '));
    if (tokens.length === 0) return [];
    const out: Array<{ paper: Paper; score: number }> = [];
    for (const p of this.corpus.papers) {
      const entityTokens = new Set(contentTokens([p.authors.join(' '), p.concepts.join(' '), p.title].join(' ')));
      const score = tokens.filter((t) => entityTokens.has(t)).length;
      if (score > 0) out.push({ paper: p, score });
    }
    return out
      .sort((a, b) => b.score - a.score || compareIds(a.paper.id, b.paper.id))
      .map((x) => ({ kind: 'item' as const, item: this.corpus.toItem(x.paper, x.score) }));
  }
}
