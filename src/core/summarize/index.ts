import { createLogger } from '../log';
import { errorMessage } from '../errors';
import type { DocumentChunk, DocumentRecord, DocumentStore } from '../backends/types';
import { classifyDepth, type SummaryDepth } from './classifier';

export { classifyDepth, DEPTH_RULES, SUMMARY_DEPTHS, type SummaryDepth } from './classifier';

const log = createLogger({ component: 'summarize', kind: 'dispatcher' });

export const TARGETED_CHUNKS = 5;
export const CHUNKS_PER_ASPECT = 3;

export const SUMMARY_ASPECTS: ReadonlyArray<{ title: string; question: string }> = [
  { title: 'Research Question', question: 'What is the main research question or objective of this study?' },
  { title: 'Methodology', question: 'What methodology or approach did the researchers use?' },
  { title: 'Findings', question: 'What were the main findings or results?' },
  { title: 'Conclusions', question: 'What conclusions or implications did the authors draw?' },
];

export interface SummarizeOptions {
  query?: string;
  forceDepth?: SummaryDepth;
}

interface SummarizeBase {
  itemId: string;
  query?: string;
  depth: SummaryDepth;
  confidence: number;
}

export interface SummarizeSuccess extends SummarizeBase {
  success: true;
  content: string;
  tokensEstimated: number;
  strategy: string;
  chunksRetrieved?: number;
}

export interface SummarizeFailure extends SummarizeBase {
  success: false;
  error: string;
  suggestion?: string;
}

export type SummarizeResult = SummarizeSuccess | SummarizeFailure;

type Rendered = { content: string; strategy: string; chunksRetrieved?: number } | { error: string; suggestion?: string };

export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.round(words * 1.3);
}

export function bibliographicBlock(record: DocumentRecord): string {
  const lines = [`# ${record.title}`, ''];
  lines.push(`**Authors:** ${record.authors.length > 0 ? record.authors.join(', ') : 'Unknown'}`);
  if (record.year !== undefined) lines.push(`**Year:** ${record.year}`);
  if (record.venue) lines.push(`**Venue:** ${record.venue}`);
  if (record.doi) lines.push(`**DOI:** ${record.doi}`);
  lines.push(`**ID:** \`${record.id}\``);
  if (record.abstract) lines.push('', '## Abstract', '', record.abstract);
  return lines.join('\n');
}

function chunkSection(chunks: DocumentChunk[]): string[] {
  const out: string[] = [];
  chunks.forEach((c, i) => {
    out.push(`### Chunk ${i + 1} (relevance: ${c.score.toFixed(2)})`, '', c.text, '');
  });
  return out;
}

async function targeted(store: DocumentStore, record: DocumentRecord, question: string | undefined): Promise<Rendered> {
  if (!question) return { error: 'Targeted summaries need a question', suggestion: 'Pass --query "<question>"' };
  const chunks = await store.searchChunks(record.id, question, TARGETED_CHUNKS);
  if (chunks.length === 0) {
    return { error: 'No relevant content found in this paper', suggestion: 'Try --depth quick for the abstract' };
  }
  const lines = [`# Relevant content for: ${question}`, '', `*${record.title}* (\`${record.id}\`)`, '', ...chunkSection(chunks)];
  return {
    content: lines.join('\n').trimEnd(),
    strategy: `Chunk search within the paper (top ${TARGETED_CHUNKS})`,
    chunksRetrieved: chunks.length,
  };
}

async function comprehensive(store: DocumentStore, record: DocumentRecord): Promise<Rendered> {
  const lines = ['# Comprehensive summary', '', bibliographicBlock(record), ''];
  let retrieved = 0;
  for (const aspect of SUMMARY_ASPECTS) {
    const chunks = await store.searchChunks(record.id, aspect.question, CHUNKS_PER_ASPECT);
    lines.push(`## ${aspect.title}`, '');
    if (chunks.length === 0) {
      lines.push('*No relevant content found*', '');
      continue;
    }
    for (const c of chunks) lines.push(c.text, '');
    retrieved += chunks.length;
  }
  if (retrieved === 0) {
    return { error: 'No text chunks are available for this paper', suggestion: 'Try --depth quick for the abstract' };
  }
  return {
    content: lines.join('\n').trimEnd(),
    strategy: `Multi-aspect summary (${SUMMARY_ASPECTS.length} aspects)`,
    chunksRetrieved: retrieved,
  };
}

async function full(store: DocumentStore, record: DocumentRecord): Promise<Rendered> {
  const text = await store.getFullText(record.id);
  if (!text || !text.trim()) {
    return { error: 'No full text is available for this paper', suggestion: 'Try --depth quick for the abstract' };
  }
  return { content: `${bibliographicBlock(record)}\n\n---\n\n## Full text\n\n${text.trim()}`, strategy: 'Complete text' };
}

async function render(depth: SummaryDepth, store: DocumentStore, record: DocumentRecord, query: string | undefined): Promise<Rendered> {
  switch (depth) {
    case 'quick':
      return { content: bibliographicBlock(record), strategy: 'Bibliographic record and abstract' };
    case 'targeted':
      return targeted(store, record, query);
    case 'comprehensive':
      return comprehensive(store, record);
    case 'full':
      return full(store, record);
  }
}

/**
 * Summarizes one item at a depth chosen from the query (or forced), from a
 * short bibliographic record up to the complete text.
 */
export async function runSummarize(store: DocumentStore | undefined, itemId: string, options: SummarizeOptions = {}): Promise<SummarizeResult> {
  const id = String(itemId ?? '').trim();
  const query = options.query?.trim() || undefined;
  const classified = options.forceDepth ? { depth: options.forceDepth, confidence: 1.0 } : classifyDepth(query);
  const base: SummarizeBase = { itemId: id, depth: classified.depth, confidence: classified.confidence, ...(query ? { query } : {}) };

  if (!store) return { ...base, success: false, error: 'Document store is not configured' };
  if (!id) return { ...base, success: false, error: 'An item id is required' };

  try {
    const record = await store.getItem(id);
    if (!record) return { ...base, success: false, error: `No item found with id ${id}` };
    const rendered = await render(classified.depth, store, record, query);
    if ('error' in rendered) {
      log.info('summarize_unanswered', { depth: classified.depth, reason: rendered.error });
      return { ...base, success: false, error: rendered.error, ...(rendered.suggestion ? { suggestion: rendered.suggestion } : {}) };
    }
    return { ...base, success: true, ...rendered, tokensEstimated: estimateTokens(rendered.content) };
  } catch (e) {
    log.warn('summarize_failed', { depth: classified.depth, err: errorMessage(e) });
    return { ...base, success: false, error: `Summarization failed: ${errorMessage(e)}` };
  }
}
