import type { VectorSearch } from '../backends/types';
import type { Item } from '../retrieval/types';
import { compareIds, type LibraryCorpus } from './corpus';

/** Cosine similarity over hashed bag-of-words vectors of each paper. */
export class LibraryVectorSearch implements VectorSearch {
  constructor(private readonly corpus: LibraryCorpus, private readonly minScore = 0.05) {}

  async search(text: string, limit: number): Promise<Item[]> {
    const q = this.corpus.embedder.embed(text);
    if (q.every((v) => v === 0)) return [];
    return this.corpus.papers
      .map((paper) => ({ paper, score: this.corpus.similarity(q, paper) }))
      .filter((s) => s.score > this.minScore)
      .sort((a, b) => b.score - a.score || compareIds(a.paper.id, b.paper.id))
      .slice(0, Math.max(0, limit))
      .map((s) => this.corpus.toItem(s.paper, s.score));
  }
}
