import type { DocumentChunk, DocumentRecord, DocumentStore } from '../backends/types';
import { cosineSimilarity } from '../embedding';
import type { LibraryCorpus } from './corpus';

export class LibraryDocumentStore implements DocumentStore {
  constructor(private readonly corpus: LibraryCorpus) {}

  async getItem(id: string): Promise<DocumentRecord | null> {
    const p = this.corpus.get(id);
    if (!p) return null;
    return { id: p.id, title: p.title, authors: p.authors, year: p.year, venue: p.venue, abstract: p.abstract, doi: p.doi };
  }

  async searchChunks(id: string, question: string, limit: number): Promise<DocumentChunk[]> {
    const p = this.corpus.get(id);
    if (!p || p.chunks.length === 0) return [];
    const q = this.corpus.embedder.embed(question);
    const vectors = this.corpus.chunkVectorsOf(p);
    return p.chunks
      .map((text, index) => ({ itemId: p.id, index, text, score: cosineSimilarity(q, vectors[index] ?? []) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, Math.max(0, limit));
  }

  async getFullText(id: string): Promise<string | null> {
    const p = this.corpus.get(id);
    if (!p) return null;
    if (p.fullText) return p.fullText;
    return p.chunks.length > 0 ? p.chunks.join('\n\n') : null;
  }
}
