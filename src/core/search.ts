import { createLogger } from './log';
import { BackendUnavailableError, errorMessage } from './errors';
import type { OrchestratorConfig } from './config';
import { graphRecordsToItems, type BackendAdapters, type MetadataFilters } from './backends/types';
import { settleWithConcurrency } from './pool';
import { classifyIntent, DEFAULT_INTENT_RULES } from './retrieval/classifier';
import { decomposeQuery, splitBooleanQuery } from './retrieval/decomposer';
import { expandQuery, type QueryExpansion } from './retrieval/expander';
import { executePlan, succeededBackends, type BackendInvoker } from './retrieval/coordinator';
import { freezeFused, fuseResults } from './retrieval/fuser';
import { mergeParams, sanitizeParams } from './retrieval/params';
import { planExecution, remainingBackends } from './retrieval/planner';
import { assessQuality } from './retrieval/quality';
import type {
  BackendId,
  BackendResult,
  ClassifiedIntent,
  ExecutionPlan,
  ForceMode,
  FusedEntry,
  FusedResult,
  GraphStrategy,
  Intent,
  Query,
  QualityMetrics,
  QueryParams,
  SubQuery,
} from './retrieval/types';

const log = createLogger({ component: 'search', kind: 'orchestrator' });

export interface SearchContext {
  adapters: BackendAdapters;
  config: Readonly<OrchestratorConfig>;
}

export interface SearchOptions {
  limit?: number;
  forceMode?: ForceMode;
  params?: QueryParams;
  timeoutMs?: number;
}

export interface SearchHit {
  id: string;
  title?: string;
  snippet?: string;
  metadata?: Record<string, unknown>;
  score: number;
  rank: number;
  foundIn: BackendId[];
}

export interface SubQueryReport {
  text: string;
  role: SubQuery['role'];
  weight: number;
  mode: Intent;
  confidence: number;
  backendsUsed: BackendId[];
  resultCount: number;
}

export type SearchMode = Intent | 'fast' | 'decomposed';

export interface SearchResponse {
  query: string;
  mode: SearchMode;
  confidence: number;
  params: QueryParams;
  plannedBackends: BackendId[];
  backendsUsed: BackendId[];
  strategy: ExecutionPlan['strategy'];
  escalated: boolean;
  decomposed: boolean;
  subQueries?: SubQueryReport[];
  expandedQuery?: string;
  expansionTerms?: string[];
  quality: QualityMetrics;
  results: SearchHit[];
  totalFound: number;
  noResults: boolean;
  timedOut: boolean;
}

type PassState = 'initial' | 'escalated';

export interface PassOutcome {
  kind: 'pass';
  query: Query;
  classified: ClassifiedIntent;
  plan: ExecutionPlan;
  /** Backends run by the pass, including those added by escalation. */
  planned: BackendId[];
  results: BackendResult[];
  fused: FusedResult;
  quality: QualityMetrics;
  state: PassState;
  expansion: QueryExpansion;
}

interface DecomposedOutcome {
  kind: 'decomposed';
  query: Query;
  classified: ClassifiedIntent;
  parts: Array<{ subQuery: SubQuery; outcome: PassOutcome }>;
  fused: FusedResult;
  quality: QualityMetrics;
}

type Outcome = PassOutcome | DecomposedOutcome;

const SUBQUERY_FETCH_FACTOR = 2;

/** Sub-queries are searched at depth 1 and never decomposed again. */
type Depth = 0 | 1;

const GRAPH_STRATEGY_FOR_INTENT: Record<Intent, GraphStrategy> = {
  relationship: 'related',
  metadata: 'comprehensive',
  semantic: 'comprehensive',
  citation: 'citation',
  influence: 'influence',
  'content-similarity': 'content-similarity',
  collaboration: 'collaboration',
  'concept-network': 'concept-network',
  temporal: 'temporal',
  venue: 'venue',
  comprehensive: 'comprehensive',
};

export function availableBackends(adapters: BackendAdapters): BackendId[] {
  const out: BackendId[] = ['vector'];
  if (adapters.graph) out.push('graph');
  if (adapters.metadata) out.push('metadata');
  return out;
}

export function normalizeQuery(text: string, options: SearchOptions, config: Readonly<OrchestratorConfig>): Query {
  const rawLimit = options.limit ?? config.defaultLimit;
  const limit = Math.min(config.maxLimit, Math.max(1, Math.floor(rawLimit)));
  return Object.freeze({
    text: String(text ?? '').trim(),
    limit,
    forceMode: options.forceMode,
    params: Object.freeze(sanitizeParams(options.params ?? {})),
    timeoutMs: options.timeoutMs ?? config.execution.timeoutMs,
  });
}

function classifyQuery(query: Query): ClassifiedIntent {
  const forced = query.forceMode;
  if (!forced) return classifyIntent(query.text);
  const intent: Intent = forced === 'fast' ? 'semantic' : forced;
  const rule = DEFAULT_INTENT_RULES.find((r) => r.intent === intent);
  return { intent, confidence: 1.0, params: rule?.extract ? rule.extract(query.text) : {} };
}

function metadataFilters(text: string, params: QueryParams): MetadataFilters {
  return {
    text,
    author: params.author,
    years: params.yearRange ? undefined : params.years,
    yearRange: params.yearRange,
  };
}

function buildInvoker(
  ctx: SearchContext,
  text: string,
  vectorText: string,
  intent: Intent,
  params: QueryParams
): BackendInvoker {
  const { adapters } = ctx;
  return async (backend, limit) => {
    if (backend === 'vector') return adapters.vector.search(vectorText, limit);
    if (backend === 'graph') {
      if (!adapters.graph) throw new BackendUnavailableError('graph', 'no graph adapter configured');
      const records = await adapters.graph.query(GRAPH_STRATEGY_FOR_INTENT[intent], { ...params, query: text }, limit);
      return graphRecordsToItems(records);
    }
    if (!adapters.metadata) throw new BackendUnavailableError('metadata', 'no metadata adapter configured');
    return adapters.metadata.search(metadataFilters(text, params), limit);
  };
}

function deadlinePassed(deadline: number | undefined): boolean {
  return deadline !== undefined && Date.now() >= deadline;
}

export interface EscalationInput {
  plan: ExecutionPlan;
  results: readonly BackendResult[];
  invoke: BackendInvoker;
  available: readonly BackendId[];
  limit: number;
  config: Readonly<OrchestratorConfig>;
  deadline?: number;
}

export interface EscalationOutcome {
  plan: ExecutionPlan;
  results: BackendResult[];
  fused: FusedResult;
}

/**
 * Runs the comprehensive backends the initial plan left out and fuses their
 * results together with the initial ones. Returns null when nothing is left
 * to run.
 */
export async function escalate(input: EscalationInput): Promise<EscalationOutcome | null> {
  const { config } = input;
  const remaining = remainingBackends(input.plan, input.available, config.routes);
  if (remaining.length === 0) return null;

  const plan: ExecutionPlan = {
    backends: Object.freeze(remaining),
    strategy: remaining.length >= 2 ? 'sequential' : 'parallel',
    perBackendLimit: Math.max(1, input.limit * config.routes.comprehensive.fetchMultiplier),
    comprehensive: true,
  };
  Object.freeze(plan);
  const added = await executePlan(plan, input.invoke, { deadline: input.deadline });
  const results = [...input.results, ...added];
  return { plan, results, fused: fuseResults(results, { k: config.fusion.rrfK }) };
}

async function runPass(
  ctx: SearchContext,
  query: Query,
  allowEscalation: boolean,
  deadline: number | undefined
): Promise<PassOutcome> {
  const { config } = ctx;
  const classified = classifyQuery(query);
  const params = sanitizeParams(mergeParams(classified.params, query.params));
  const vectorOnly: BackendId[] = ['vector'];
  const available = query.forceMode === 'fast' ? vectorOnly : availableBackends(ctx.adapters);

  const plan = planExecution(classified.intent, {
    limit: query.limit,
    available,
    routes: config.routes,
    sequentialThreshold: config.execution.sequentialThreshold,
  });

  const expansion: QueryExpansion = plan.backends.includes('vector')
    ? expandQuery(query.text, config.expansion)
    : { text: query.text, added: [] };
  const invoke = buildInvoker(ctx, query.text, expansion.text, classified.intent, params);

  const results = await executePlan(plan, invoke, { deadline });
  let fused = fuseResults(results, { k: config.fusion.rrfK });
  let quality = assessQuality(fused, { requested: query.limit, quality: config.quality, k: config.fusion.rrfK });
  const base: PassOutcome = {
    kind: 'pass',
    query,
    classified: { ...classified, params },
    plan,
    planned: [...plan.backends],
    results,
    fused,
    quality,
    state: 'initial',
    expansion,
  };

  if (!allowEscalation || !quality.needsEscalation || deadlinePassed(deadline)) return base;

  const escalation = await escalate({ plan, results, invoke, available, limit: query.limit, config, deadline });
  if (!escalation) return base;

  fused = escalation.fused;
  quality = assessQuality(fused, { requested: query.limit, quality: config.quality, k: config.fusion.rrfK });
  log.info('search_escalated', {
    intent: classified.intent,
    added: escalation.plan.backends,
    before: base.fused.entries.length,
    after: fused.entries.length,
  });
  return {
    ...base,
    planned: [...plan.backends, ...escalation.plan.backends],
    results: escalation.results,
    fused,
    quality,
    state: 'escalated',
  };
}

/**
 * Sums weighted fused scores across sub-query results. Items found by several
 * sub-queries accumulate their weighted scores and the union of their backends.
 */
export function mergeWeighted(parts: ReadonlyArray<{ weight: number; fused: FusedResult }>): FusedResult {
  const acc = new Map<string, { entry: FusedEntry; score: number; backends: BackendId[]; order: number }>();
  for (const part of parts) {
    for (const entry of part.fused.entries) {
      const weighted = entry.score * part.weight;
      const existing = acc.get(entry.id);
      if (!existing) {
        acc.set(entry.id, { entry, score: weighted, backends: [...entry.backends], order: acc.size });
        continue;
      }
      existing.score += weighted;
      for (const b of entry.backends) if (!existing.backends.includes(b)) existing.backends.push(b);
    }
  }
  const sorted = Array.from(acc.values()).sort((a, b) => b.score - a.score || a.order - b.order);
  return freezeFused(
    sorted.map((a, idx) =>
      Object.freeze({
        id: a.entry.id,
        item: a.entry.item,
        score: a.score,
        backends: Object.freeze(a.backends),
        rank: idx + 1,
      })
    )
  );
}

/**
 * Explicit `AND`/`OR` operators split any query. The natural-language patterns
 * only split queries that classify as plain `semantic` ones.
 */
function decompositionFor(query: Query): SubQuery[] | null {
  if (query.forceMode) return null;
  const boolean = splitBooleanQuery(query.text);
  if (boolean) return boolean;
  const subQueries = decomposeQuery(query.text);
  if (subQueries.length < 2) return null;
  if (classifyIntent(query.text).intent !== 'semantic') return null;
  return subQueries;
}

async function orchestrate(ctx: SearchContext, query: Query, depth: Depth, deadline: number | undefined): Promise<Outcome> {
  const subQueries = depth === 0 ? decompositionFor(query) : null;
  if (!subQueries) {
    return runPass(ctx, query, depth === 0 && query.forceMode !== 'comprehensive', deadline);
  }

  const settled = await settleWithConcurrency(subQueries, ctx.config.execution.maxSubQueryWorkers, async (subQuery) => {
    const subQueryInput: Query = Object.freeze({
      ...query,
      text: subQuery.text,
      limit: Math.min(ctx.config.maxLimit, query.limit * SUBQUERY_FETCH_FACTOR),
    });
    const outcome = await orchestrate(ctx, subQueryInput, 1, deadline);
    if (outcome.kind !== 'pass') throw new Error('sub-query was decomposed again');
    return { subQuery, outcome };
  });

  const parts: Array<{ subQuery: SubQuery; outcome: PassOutcome }> = [];
  settled.forEach((s, idx) => {
    if (s.status === 'fulfilled') parts.push(s.value);
    else log.warn('subquery_failed', { subquery: subQueries[idx]?.text, err: errorMessage(s.reason) });
  });

  const fused = mergeWeighted(parts.map((p) => ({ weight: p.subQuery.weight, fused: p.outcome.fused })));
  const { config } = ctx;
  return {
    kind: 'decomposed',
    query,
    classified: classifyIntent(query.text),
    parts,
    fused,
    quality: assessQuality(fused, { requested: query.limit, quality: config.quality, k: config.fusion.rrfK }),
  };
}

function toHit(entry: FusedEntry): SearchHit {
  return {
    id: entry.id,
    title: entry.item.title,
    snippet: entry.item.snippet,
    metadata: entry.item.metadata,
    score: entry.score,
    rank: entry.rank,
    foundIn: [...entry.backends],
  };
}

function union(lists: ReadonlyArray<readonly BackendId[]>): BackendId[] {
  const out: BackendId[] = [];
  for (const list of lists) for (const b of list) if (!out.includes(b)) out.push(b);
  return out;
}

function hasTimeout(results: readonly BackendResult[]): boolean {
  return results.some((r) => r.status === 'error' && r.error.kind === 'timeout');
}

function toResponse(outcome: Outcome): SearchResponse {
  const { query, fused } = outcome;
  const results = fused.entries.slice(0, query.limit).map(toHit);
  const common = {
    query: query.text,
    quality: outcome.quality,
    results,
    totalFound: fused.entries.length,
    noResults: results.length === 0,
  };

  if (outcome.kind === 'pass') {
    const expanded = outcome.expansion.added.length > 0;
    return {
      ...common,
      mode: query.forceMode === 'fast' ? 'fast' : outcome.classified.intent,
      confidence: outcome.classified.confidence,
      params: outcome.classified.params,
      plannedBackends: outcome.planned,
      backendsUsed: succeededBackends(outcome.results),
      strategy: outcome.plan.strategy,
      escalated: outcome.state === 'escalated',
      decomposed: false,
      ...(expanded ? { expandedQuery: outcome.expansion.text, expansionTerms: outcome.expansion.added } : {}),
      timedOut: hasTimeout(outcome.results),
    };
  }

  const passes = outcome.parts.map((p) => p.outcome);
  return {
    ...common,
    mode: 'decomposed',
    confidence: outcome.classified.confidence,
    params: outcome.classified.params,
    plannedBackends: union(passes.map((p) => p.planned)),
    backendsUsed: union(passes.map((p) => succeededBackends(p.results))),
    strategy: passes.some((p) => p.plan.strategy === 'sequential') ? 'sequential' : 'parallel',
    escalated: false,
    decomposed: true,
    subQueries: outcome.parts.map(({ subQuery, outcome: pass }) => ({
      text: subQuery.text,
      role: subQuery.role,
      weight: subQuery.weight,
      mode: pass.classified.intent,
      confidence: pass.classified.confidence,
      backendsUsed: succeededBackends(pass.results),
      resultCount: pass.fused.entries.length,
    })),
    timedOut: passes.some((p) => hasTimeout(p.results)),
  };
}

/**
 * Classifies, plans, executes, fuses and assesses one research query. Backend
 * failures never reject: they shrink `backendsUsed` instead.
 */
export async function runSearch(ctx: SearchContext, text: string, options: SearchOptions = {}): Promise<SearchResponse> {
  const query = normalizeQuery(text, options, ctx.config);
  const deadline = query.timeoutMs ? Date.now() + query.timeoutMs : undefined;
  return log.span('search', { limit: query.limit, force: query.forceMode ?? null }, async () => {
    const outcome = await orchestrate(ctx, query, 0, deadline);
    return toResponse(outcome);
  });
}
