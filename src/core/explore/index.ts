import { createLogger } from '../log';
import { errorMessage } from '../errors';
import type { BackendAdapters, GraphQueryParams, GraphRecord } from '../backends/types';
import { mergeParams, sanitizeParams } from '../retrieval/params';
import type { GraphStrategy, Item, QueryParams } from '../retrieval/types';
import { classifyExploration } from './classifier';
import {
  countItems,
  renderCitationChain,
  renderCollaborators,
  renderConceptNetwork,
  renderInfluential,
  renderMatches,
  renderRelated,
  renderSimilar,
  renderTimeline,
  renderVenues,
} from './format';

export { classifyExploration, EXPLORATION_RULES, RELATED_PATTERNS } from './classifier';

const log = createLogger({ component: 'explore', kind: 'dispatcher' });

export interface ExploreOptions {
  paperId?: string;
  author?: string;
  concept?: string;
  startYear?: number;
  endYear?: number;
  field?: string;
  forceMode?: GraphStrategy;
  limit?: number;
  maxHops?: number;
}

interface ExploreBase {
  query: string;
  mode: GraphStrategy;
  confidence: number;
  params: QueryParams;
}

export interface ExploreSuccess extends ExploreBase {
  success: true;
  content: string;
  itemsFound: number;
  strategy: string;
  warnings?: string[];
}

export interface ExploreFailure extends ExploreBase {
  success: false;
  error: string;
  suggestion?: string;
}

export type ExploreResult = ExploreSuccess | ExploreFailure;

type Section = { content: string; itemsFound: number; strategy: string; warnings?: string[] } | { error: string; suggestion?: string };

interface Run {
  adapters: BackendAdapters;
  params: GraphQueryParams;
  limit: number;
  query: string;
}

function optionParams(options: ExploreOptions): QueryParams {
  const out: QueryParams = {};
  if (options.paperId) out.paperId = options.paperId;
  if (options.author) out.author = options.author;
  if (options.concept) out.concept = options.concept;
  if (options.field) out.field = options.field;
  if (options.startYear !== undefined || options.endYear !== undefined) {
    out.yearRange = { start: options.startYear, end: options.endYear };
  }
  return out;
}

async function titleOf(run: Run, paperId: string): Promise<string> {
  const record = await run.adapters.documents?.getItem(paperId);
  return record?.title ?? paperId;
}

async function graphSection(
  run: Run,
  strategy: GraphStrategy,
  render: (records: GraphRecord[]) => string | Promise<string>,
  label: string
): Promise<Section> {
  const graph = run.adapters.graph;
  if (!graph) return { error: 'Graph backend is not configured', suggestion: 'Use search with --mode fast for vector-only results' };
  const records = await graph.query(strategy, run.params, run.limit);
  if (records.length === 0) return { error: `No results for ${label}` };
  return { content: await render(records), itemsFound: countItems(records), strategy: label };
}

async function contentSimilarity(run: Run): Promise<Section> {
  const paperId = run.params.paperId;
  if (!paperId) return { error: 'Content similarity needs a paper id', suggestion: 'Pass --paper <id>' };
  const record = await run.adapters.documents?.getItem(paperId);
  if (run.adapters.documents && !record) return { error: `Paper ${paperId} not found` };

  const reference = record ? [record.title, record.abstract ?? ''].join(' ').trim() : '';
  if (!reference) {
    return graphSection(run, 'content-similarity', (records) => renderMatches(paperId, records), 'Content similarity (graph)');
  }
  const hits = await run.adapters.vector.search(reference, run.limit + 1);
  const items: Item[] = hits.filter((h) => h.id !== paperId).slice(0, run.limit);
  if (items.length === 0) return { error: `No papers similar to ${paperId}` };
  return {
    content: renderSimilar(record?.title ?? paperId, items),
    itemsFound: items.length,
    strategy: 'Content similarity (vector search over the abstract)',
  };
}

async function runStrategy(strategy: GraphStrategy, run: Run): Promise<Section> {
  const p = run.params;
  switch (strategy) {
    case 'citation': {
      const paperId = p.paperId;
      if (!paperId) return { error: 'Citation chains need a paper id', suggestion: 'Pass --paper <id>' };
      const title = await titleOf(run, paperId);
      return graphSection(run, 'citation', (r) => renderCitationChain(title, r), `Citation chain (${p.maxHops ?? 2} hops)`);
    }
    case 'related': {
      const paperId = p.paperId;
      if (!paperId) return { error: 'Related papers need a paper id', suggestion: 'Pass --paper <id>' };
      const title = await titleOf(run, paperId);
      return graphSection(run, 'related', (r) => renderRelated(title, r), 'Related papers (shared authors, concepts, citations)');
    }
    case 'content-similarity':
      return contentSimilarity(run);
    case 'influence':
      return graphSection(run, 'influence', (r) => renderInfluential(r, p.field), 'Influential papers (citation count)');
    case 'collaboration': {
      const author = p.author;
      if (!author) return { error: 'Collaborator networks need an author', suggestion: 'Pass --author <name>' };
      return graphSection(run, 'collaboration', (r) => renderCollaborators(author, r), 'Collaborator network');
    }
    case 'concept-network': {
      const concept = p.concept;
      if (!concept) return { error: 'Concept networks need a concept', suggestion: 'Pass --concept <name>' };
      return graphSection(run, 'concept-network', (r) => renderConceptNetwork(concept, r), 'Concept co-occurrence network');
    }
    case 'temporal': {
      const concept = p.concept;
      const range = p.yearRange;
      if (!concept || range?.start === undefined || range.end === undefined) {
        return { error: 'Topic evolution needs a concept and a start and end year', suggestion: 'Pass --concept, --start-year and --end-year' };
      }
      return graphSection(run, 'temporal', (r) => renderTimeline(concept, r, range), 'Topic evolution');
    }
    case 'venue':
      return graphSection(run, 'venue', (r) => renderVenues(r, p.field), 'Venue analysis');
    case 'comprehensive':
      return comprehensive(run);
  }
}

/** Related papers and the citation chain when a paper is given, plus influential papers. */
async function comprehensive(run: Run): Promise<Section> {
  const parts: GraphStrategy[] = run.params.paperId ? ['related', 'citation', 'influence'] : ['influence'];
  const sections: string[] = [];
  const strategies: string[] = [];
  const warnings: string[] = [];
  let itemsFound = 0;

  if (!run.params.paperId && run.query) {
    const matches = await graphSection(run, 'comprehensive', (r) => renderMatches(run.query, r), 'Graph entity matches');
    if ('content' in matches) {
      sections.push(matches.content);
      strategies.push(matches.strategy);
      itemsFound += matches.itemsFound;
    }
  }
  for (const strategy of parts) {
    const section = await runStrategy(strategy, run);
    if ('content' in section) {
      sections.push(section.content);
      strategies.push(section.strategy);
      itemsFound += section.itemsFound;
    } else {
      warnings.push(`${strategy}: ${section.error}`);
    }
  }
  if (sections.length === 0) return { error: 'No graph results for comprehensive exploration' };
  return {
    content: sections.join('\n\n'),
    itemsFound,
    strategy: `Comprehensive: ${strategies.join(' + ')}`,
    ...(warnings.length > 0 ? { warnings } : {}),
  };
}

/**
 * Picks an exploration strategy (or takes the forced one), checks its required
 * parameters and renders the graph answer as markdown.
 */
export async function runExplore(adapters: BackendAdapters, text: string, options: ExploreOptions = {}): Promise<ExploreResult> {
  const query = String(text ?? '').trim();
  const classified = classifyExploration(query);
  const mode = options.forceMode ?? classified.strategy;
  const confidence = options.forceMode ? 1.0 : classified.confidence;
  const params = sanitizeParams(mergeParams(classified.params, optionParams(options)));
  const base: ExploreBase = { query, mode, confidence, params };
  const run: Run = {
    adapters,
    params: { ...params, query, maxHops: options.maxHops },
    limit: Math.max(1, options.limit ?? 10),
    query,
  };

  try {
    const section = await runStrategy(mode, run);
    if ('error' in section) {
      log.info('explore_unanswered', { mode, reason: section.error });
      return { ...base, success: false, error: section.error, ...(section.suggestion ? { suggestion: section.suggestion } : {}) };
    }
    return { ...base, success: true, ...section };
  } catch (e) {
    log.warn('explore_failed', { mode, err: errorMessage(e) });
    return { ...base, success: false, error: `Exploration failed: ${errorMessage(e)}` };
  }
}
