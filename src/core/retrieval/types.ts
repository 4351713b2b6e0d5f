export type BackendId = 'vector' | 'graph' | 'metadata';

export const ALL_BACKENDS = ['vector', 'graph', 'metadata'] as const satisfies readonly BackendId[];

export const INTENTS = [
  'relationship',
  'metadata',
  'semantic',
  'citation',
  'influence',
  'content-similarity',
  'collaboration',
  'concept-network',
  'temporal',
  'venue',
  'comprehensive',
] as const;

export type Intent = (typeof INTENTS)[number];

/** Graph-exploration strategies; `related` has no search-intent counterpart. */
export const GRAPH_STRATEGIES = [
  'citation',
  'influence',
  'content-similarity',
  'related',
  'collaboration',
  'concept-network',
  'temporal',
  'venue',
  'comprehensive',
] as const;

export type GraphStrategy = (typeof GRAPH_STRATEGIES)[number];

export interface YearRange {
  start?: number;
  end?: number;
}

export interface QueryParams {
  paperId?: string;
  author?: string;
  concept?: string;
  field?: string;
  years?: number[];
  yearRange?: YearRange;
}

/** `fast` forces the vector backend alone; any intent name forces that route. */
export type ForceMode = 'fast' | Intent;

export interface Query {
  readonly text: string;
  readonly limit: number;
  readonly forceMode?: ForceMode;
  readonly params: Readonly<QueryParams>;
  readonly timeoutMs?: number;
}

export interface ClassifiedIntent {
  intent: Intent;
  confidence: number;
  params: QueryParams;
}

export interface Item {
  id: string;
  title?: string;
  snippet?: string;
  metadata?: Record<string, unknown>;
  /** Backend-native score, not comparable across backends. */
  score: number;
}

export interface RankedItem extends Item {
  rank: number;
}

export type ExecutionStrategy = 'parallel' | 'sequential';

export interface ExecutionPlan {
  readonly backends: readonly BackendId[];
  readonly strategy: ExecutionStrategy;
  readonly perBackendLimit: number;
  readonly comprehensive: boolean;
}

export type BackendFailureKind = 'unavailable' | 'timeout' | 'failed';

export type BackendResult =
  | { backend: BackendId; status: 'ok'; items: RankedItem[]; durationMs: number }
  | { backend: BackendId; status: 'empty'; items: RankedItem[]; durationMs: number }
  | {
      backend: BackendId;
      status: 'error';
      items: RankedItem[];
      durationMs: number;
      error: { kind: BackendFailureKind; message: string };
    };

export interface FusedEntry {
  readonly id: string;
  readonly item: Item;
  readonly score: number;
  readonly backends: readonly BackendId[];
  readonly rank: number;
}

export interface FusedResult {
  readonly entries: readonly FusedEntry[];
  readonly byId: ReadonlyMap<string, FusedEntry>;
}

export type ConfidenceTier = 'high' | 'medium' | 'low';

export interface QualityMetrics {
  confidence: ConfidenceTier;
  coverage: number;
  needsEscalation: boolean;
  /** Normalized quality score of the weakest entry among the requested top results. */
  minTopScore: number;
  resultCount: number;
}

export type SubQueryRole = 'required' | 'optional' | 'primary' | 'supporting';

export interface SubQuery {
  text: string;
  role: SubQueryRole;
  weight: number;
}
