import fs from 'fs-extra';
import { createLogger } from '../log';
import { ErrorCode, LibraryError } from '../errors';
import { cosineSimilarity, Embedder, tokenise } from '../embedding';
import type { Item } from '../retrieval/types';
import { LibrarySchema, type Paper, type PaperInput } from './schema';

const log = createLogger({ component: 'library', kind: 'corpus' });

const STOPWORDS = new Set([
  'a', 'an', 'the', 'of', 'on', 'in', 'for', 'to', 'with', 'about', 'and', 'or', 'by', 'from', 'at', 'as',
  'is', 'are', 'was', 'were', 'be', 'this', 'that', 'these', 'those', 'it', 'its',
  'find', 'show', 'me', 'papers', 'paper', 'research', 'studies', 'study', 'work', 'who', 'what', 'which', 'how',
]);

export function contentTokens(text: string): string[] {
  return tokenise(text).filter((t) => t.length > 1 && !STOPWORDS.has(t));
}

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z'\- ]+/g, ' ').replace(/\s+/g, ' ').trim();
}

/** Matches a full name or a surname against an author string. */
export function authorMatches(author: string, query: string): boolean {
  const a = normalizeName(author);
  const q = normalizeName(query);
  if (!a || !q) return false;
  if (a === q) return true;
  const aParts = a.split(' ');
  const qParts = q.split(' ');
  if (qParts.length === 1) return aParts.includes(q);
  return a.endsWith(` ${q}`) || qParts.every((p) => aParts.includes(p));
}

export function conceptMatches(paper: Paper, concept: string): boolean {
  const c = concept.toLowerCase().trim();
  if (!c) return false;
  if (paper.concepts.some((pc) => pc.toLowerCase() === c || pc.toLowerCase().includes(c))) return true;
  return `${paper.title} ${paper.abstract ?? ''}`.toLowerCase().includes(c);
}

export function inYearRange(year: number | undefined, range: { start?: number; end?: number } | undefined): boolean {
  if (!range) return true;
  if (year === undefined) return false;
  if (range.start !== undefined && year < range.start) return false;
  if (range.end !== undefined && year > range.end) return false;
  return true;
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * In-memory research library with citation, authorship and concept indexes.
 * All adapter implementations share one corpus.
 */
export class LibraryCorpus {
  readonly papers: readonly Paper[];
  private byId = new Map<string, Paper>();
  private citedBy = new Map<string, string[]>();
  private docVectors = new Map<string, number[]>();
  private chunkVectors = new Map<string, number[][]>();
  readonly embedder: Embedder;

  constructor(papers: Paper[], embedder: Embedder = new Embedder()) {
    this.papers = papers;
    this.embedder = embedder;
    for (const p of papers) {
      if (this.byId.has(p.id)) {
        throw new LibraryError(`Duplicate paper id "${p.id}"`, ErrorCode.LIBRARY_INVALID, { context: { id: p.id } });
      }
      this.byId.set(p.id, p);
    }
    for (const p of papers) {
      for (const target of p.cites) {
        if (!this.byId.has(target)) continue;
        const list = this.citedBy.get(target) ?? [];
        if (!list.includes(p.id)) list.push(p.id);
        this.citedBy.set(target, list);
      }
    }
  }

  static fromInput(papers: PaperInput[]): LibraryCorpus {
    const parsed = LibrarySchema.parse({ papers });
    return new LibraryCorpus(parsed.papers);
  }

  static async load(file: string): Promise<LibraryCorpus> {
    if (!(await fs.pathExists(file))) {
      throw new LibraryError(`Library file not found: ${file}`, ErrorCode.LIBRARY_NOT_FOUND, {
        context: { file },
        suggestions: ['Pass --library <file> or set SCHOLARMUX_LIBRARY'],
      });
    }
    let raw: unknown;
    try {
      raw = await fs.readJSON(file);
    } catch (e) {
      throw new LibraryError(`Library file is not valid JSON: ${file}`, ErrorCode.LIBRARY_INVALID, { context: { file }, cause: e });
    }
    const parsed = LibrarySchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.slice(0, 10).map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new LibraryError(`Library file failed validation: ${file}`, ErrorCode.LIBRARY_INVALID, { context: { file, issues } });
    }
    const corpus = new LibraryCorpus(parsed.data.papers);
    log.info('library_loaded', { file, papers: corpus.papers.length, name: parsed.data.name ?? null });
    return corpus;
  }

  get(id: string): Paper | undefined {
    return this.byId.get(id);
  }

  /** Papers in the library that cite `id`. */
  citing(id: string): Paper[] {
    return (this.citedBy.get(id) ?? []).flatMap((cid) => {
      const p = this.byId.get(cid);
      return p ? [p] : [];
    });
  }

  citationCount(id: string): number {
    return this.citedBy.get(id)?.length ?? 0;
  }

  papersBy(author: string): Paper[] {
    return this.papers.filter((p) => p.authors.some((a) => authorMatches(a, author)));
  }

  docVector(paper: Paper): number[] {
    const hit = this.docVectors.get(paper.id);
    if (hit) return hit;
    const text = [paper.title, paper.abstract ?? '', paper.concepts.join(' '), paper.chunks.join(' ')].join(' ');
    const vec = this.embedder.embed(text);
    this.docVectors.set(paper.id, vec);
    return vec;
  }

  chunkVectorsOf(paper: Paper): number[][] {
    const hit = this.chunkVectors.get(paper.id);
    if (hit) return hit;
    const vecs = paper.chunks.map((c) => this.embedder.embed(c));
    this.chunkVectors.set(paper.id, vecs);
    return vecs;
  }

  similarity(query: number[], paper: Paper): number {
    return cosineSimilarity(query, this.docVector(paper));
  }

  /** Best title/abstract token overlap, used to resolve a paper from free text. */
  resolveByText(text: string): Paper | undefined {
    const tokens = new Set(contentTokens(text));
    if (tokens.size === 0) return undefined;
    let best: { paper: Paper; score: number } | undefined;
    for (const p of this.papers) {
      const titleTokens = new Set(contentTokens(p.title));
      let score = 0;
      for (const t of tokens) if (titleTokens.has(t)) score++;
      if (score > 0 && (!best || score > best.score)) best = { paper: p, score };
    }
    return best?.paper;
  }

  toItem(paper: Paper, score: number, extra?: Record<string, unknown>): Item {
    const snippet = paper.abstract ? paper.abstract.slice(0, 240) : undefined;
    return {
      id: paper.id,
      title: paper.title,
      snippet,
      metadata: {
        authors: paper.authors,
        ...(paper.year !== undefined ? { year: paper.year } : {}),
        ...(paper.venue ? { venue: paper.venue } : {}),
        ...(paper.doi ? { doi: paper.doi } : {}),
        ...extra,
      },
      score,
    };
  }
}
