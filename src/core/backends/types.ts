import type { GraphStrategy, Item, QueryParams } from '../retrieval/types';

export interface VectorSearch {
  /** Items in descending similarity; empty when nothing is indexed. */
  search(text: string, limit: number): Promise<Item[]>;
}

export interface GraphQueryParams extends QueryParams {
  query?: string;
  maxHops?: number;
}

export type GraphEntityType = 'author' | 'concept' | 'venue';

export interface GraphItemRecord {
  kind: 'item';
  item: Item;
  details?: Record<string, unknown>;
}

export interface GraphEntityRecord {
  kind: 'entity';
  id: string;
  name: string;
  type: GraphEntityType;
  score: number;
  relatedItems: Item[];
  details?: Record<string, unknown>;
}

export type GraphRecord = GraphItemRecord | GraphEntityRecord;

export interface GraphQuery {
  query(strategy: GraphStrategy, params: GraphQueryParams, limit: number): Promise<GraphRecord[]>;
}

export interface MetadataFilters {
  text?: string;
  author?: string;
  title?: string;
  venue?: string;
  years?: number[];
  yearRange?: { start?: number; end?: number };
}

export interface MetadataSearch {
  search(filters: MetadataFilters, limit: number): Promise<Item[]>;
}

export interface DocumentRecord {
  id: string;
  title: string;
  authors: string[];
  year?: number;
  venue?: string;
  abstract?: string;
  doi?: string;
}

export interface DocumentChunk {
  itemId: string;
  index: number;
  text: string;
  score: number;
}

export interface DocumentStore {
  getItem(id: string): Promise<DocumentRecord | null>;
  searchChunks(id: string, question: string, limit: number): Promise<DocumentChunk[]>;
  getFullText(id: string): Promise<string | null>;
}

export interface BackendAdapters {
  vector: VectorSearch;
  graph?: GraphQuery;
  metadata?: MetadataSearch;
  documents?: DocumentStore;
}

/** Flattens graph records into items, keeping first occurrence order. */
export function graphRecordsToItems(records: GraphRecord[]): Item[] {
  const seen = new Set<string>();
  const out: Item[] = [];
  for (const rec of records) {
    if (rec.kind === 'item') {
      if (seen.has(rec.item.id)) continue;
      seen.add(rec.item.id);
      out.push(rec.item);
      continue;
    }
    for (const item of rec.relatedItems) {
      if (seen.has(item.id)) continue;
      seen.add(item.id);
      out.push({ ...item, score: rec.score, metadata: { ...item.metadata, via: rec.name, viaType: rec.type } });
    }
  }
  return out;
}
