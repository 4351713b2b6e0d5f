import { sha256Hex } from './crypto';
import { LruCache } from './cache';

export interface EmbeddingOptions {
  dim: number;
}

export const DEFAULT_EMBEDDING_DIM = 256;

export function tokenise(text: string): string[] {
  return (text || '')
    .toLowerCase()
    .split(/[^a-z0-9_]+/g)
    .filter(Boolean);
}

function hashToUint32(hex: string): number {
  return parseInt(hex.slice(0, 8), 16) >>> 0;
}

/** Signed feature hashing of tokens into an L2-normalized vector. */
export function hashEmbedding(text: string, options: EmbeddingOptions): number[] {
  const dim = options.dim;
  const vec = new Float32Array(dim);
  const tokens = tokenise(text);
  if (tokens.length === 0) return Array.from(vec);

  for (const t of tokens) {
    const u = hashToUint32(sha256Hex(t));
    const idx = u % dim;
    const sign = (u & 1) === 0 ? 1 : -1;
    vec[idx] = (vec[idx] ?? 0) + sign;
  }

  let norm = 0;
  for (const v of vec) norm += v * v;
  norm = Math.sqrt(norm);
  if (norm > 0) {
    for (let i = 0; i < dim; i++) vec[i] = (vec[i] ?? 0) / norm;
  }

  return Array.from(vec);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / Math.sqrt(na * nb);
}

export class Embedder {
  private cache: LruCache<number[]>;

  constructor(private readonly dim: number = DEFAULT_EMBEDDING_DIM, cacheSize = 512) {
    this.cache = new LruCache(cacheSize);
  }

  embed(text: string): number[] {
    const key = text.trim().toLowerCase();
    const hit = this.cache.get(key);
    if (hit) return hit;
    const vec = hashEmbedding(key, { dim: this.dim });
    this.cache.set(key, vec);
    return vec;
  }
}
