import type { BackendId, BackendResult, FusedEntry, FusedResult, Item } from './types';

export const DEFAULT_RRF_K = 60;

export interface FuseOptions {
  k?: number;
}

interface Accumulator {
  id: string;
  item: Item;
  /** Best 1-based rank per backend, in the order backends first returned the item. */
  ranks: Map<BackendId, number>;
  firstBackendPos: number;
  firstRank: number;
}

function mergePayload(primary: Item, extra: Item): Item {
  return {
    ...primary,
    title: primary.title ?? extra.title,
    snippet: primary.snippet ?? extra.snippet,
    metadata: primary.metadata || extra.metadata ? { ...extra.metadata, ...primary.metadata } : undefined,
  };
}

export function rrfContribution(rank: number, k: number = DEFAULT_RRF_K): number {
  return 1 / (k + rank);
}

/**
 * Reciprocal Rank Fusion over backend result lists given in plan order. Each
 * item appears once; its score sums `1 / (k + rank)` over its distinct
 * backends using the best rank per backend.
 */
export function fuseResults(results: readonly BackendResult[], options: FuseOptions = {}): FusedResult {
  const k = options.k ?? DEFAULT_RRF_K;
  const backendPos = new Map<BackendId, number>();
  const acc = new Map<string, Accumulator>();

  for (const result of results) {
    if (!backendPos.has(result.backend)) backendPos.set(result.backend, backendPos.size);
    const pos = backendPos.get(result.backend) ?? 0;
    for (const item of result.items) {
      const existing = acc.get(item.id);
      if (!existing) {
        acc.set(item.id, {
          id: item.id,
          item: stripRank(item),
          ranks: new Map([[result.backend, item.rank]]),
          firstBackendPos: pos,
          firstRank: item.rank,
        });
        continue;
      }
      const prev = existing.ranks.get(result.backend);
      if (prev === undefined || item.rank < prev) existing.ranks.set(result.backend, item.rank);
      if (pos === existing.firstBackendPos && item.rank < existing.firstRank) existing.firstRank = item.rank;
      existing.item = mergePayload(existing.item, stripRank(item));
    }
  }

  const scored = Array.from(acc.values()).map((a) => {
    let score = 0;
    for (const rank of a.ranks.values()) score += rrfContribution(rank, k);
    return { a, score };
  });

  scored.sort(
    (x, y) =>
      y.score - x.score ||
      x.a.firstBackendPos - y.a.firstBackendPos ||
      x.a.firstRank - y.a.firstRank ||
      (x.a.id < y.a.id ? -1 : x.a.id > y.a.id ? 1 : 0)
  );

  const entries: FusedEntry[] = scored.map(({ a, score }, idx) =>
    Object.freeze({
      id: a.id,
      item: a.item,
      score,
      backends: Object.freeze(Array.from(a.ranks.keys())),
      rank: idx + 1,
    })
  );
  return freezeFused(entries);
}

function stripRank(item: Item & { rank?: number }): Item {
  const { rank: _rank, ...rest } = item;
  return rest;
}

export function freezeFused(entries: FusedEntry[]): FusedResult {
  const byId = new Map<string, FusedEntry>();
  for (const e of entries) byId.set(e.id, e);
  return Object.freeze({ entries: Object.freeze(entries), byId });
}

export function emptyFused(): FusedResult {
  return freezeFused([]);
}
