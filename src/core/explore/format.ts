import type { GraphEntityRecord, GraphItemRecord, GraphRecord } from '../backends/types';
import type { Item } from '../retrieval/types';

function authorsOf(item: Item): string[] {
  const raw = item.metadata?.authors;
  return Array.isArray(raw) ? raw.filter((a): a is string => typeof a === 'string') : [];
}

function yearOf(item: Item): number | undefined {
  const y = item.metadata?.year;
  return typeof y === 'number' ? y : undefined;
}

function formatAuthors(authors: string[]): string {
  if (authors.length === 0) return 'Unknown authors';
  if (authors.length <= 3) return authors.join(', ');
  return `${authors.slice(0, 3).join(', ')} et al.`;
}

export function itemLine(item: Item, detail?: string): string {
  const year = yearOf(item);
  const head = `- **${item.title ?? item.id}**${year !== undefined ? ` (${year})` : ''}`;
  const tail = `${formatAuthors(authorsOf(item))} · \`${item.id}\``;
  return detail ? `${head}\n  ${tail} · ${detail}` : `${head}\n  ${tail}`;
}

function itemRecords(records: GraphRecord[]): GraphItemRecord[] {
  return records.filter((r): r is GraphItemRecord => r.kind === 'item');
}

function entityRecords(records: GraphRecord[]): GraphEntityRecord[] {
  return records.filter((r): r is GraphEntityRecord => r.kind === 'entity');
}

export function renderCitationChain(sourceTitle: string, records: GraphRecord[]): string {
  const lines = [`## Citation chain for "${sourceTitle}"`, ''];
  for (const r of itemRecords(records)) {
    const hops = Number(r.details?.hops ?? 1);
    lines.push(itemLine(r.item, hops === 1 ? 'cites it directly' : `${hops} hops away`));
  }
  return lines.join('\n');
}

export function renderInfluential(records: GraphRecord[], field?: string): string {
  const lines = [field ? `## Most cited papers in ${field}` : '## Most cited papers', ''];
  for (const r of itemRecords(records)) lines.push(itemLine(r.item, `cited by ${Number(r.details?.citedBy ?? 0)}`));
  return lines.join('\n');
}

export function renderRelated(sourceTitle: string, records: GraphRecord[]): string {
  const lines = [`## Papers related to "${sourceTitle}"`, ''];
  for (const r of itemRecords(records)) {
    const parts: string[] = [];
    const authors = r.details?.sharedAuthors;
    const concepts = r.details?.sharedConcepts;
    if (Array.isArray(authors) && authors.length > 0) parts.push(`shared authors: ${authors.join(', ')}`);
    if (Array.isArray(concepts) && concepts.length > 0) parts.push(`shared concepts: ${concepts.join(', ')}`);
    if (r.details?.citationLink === true) parts.push('citation link');
    lines.push(itemLine(r.item, parts.join('; ') || undefined));
  }
  return lines.join('\n');
}

export function renderSimilar(sourceTitle: string, items: Item[]): string {
  const lines = [`## Papers with content similar to "${sourceTitle}"`, ''];
  for (const item of items) lines.push(itemLine(item, `similarity ${item.score.toFixed(3)}`));
  return lines.join('\n');
}

export function renderCollaborators(author: string, records: GraphRecord[]): string {
  const lines = [`## Collaborators of ${author}`, ''];
  for (const e of entityRecords(records)) {
    const hops = Number(e.details?.hops ?? 1);
    const shared = e.relatedItems.length;
    lines.push(`- **${e.name}**: ${shared} shared paper${shared === 1 ? '' : 's'}${hops > 1 ? ` (via ${String(e.details?.via ?? '')}, ${hops} hops)` : ''}`);
    for (const item of e.relatedItems.slice(0, 3)) lines.push(`  - ${item.title ?? item.id}`);
  }
  return lines.join('\n');
}

export function renderConceptNetwork(concept: string, records: GraphRecord[]): string {
  const lines = [`## Concepts connected to "${concept}"`, ''];
  for (const e of entityRecords(records)) {
    lines.push(`- **${e.name}**: co-occurs in ${e.relatedItems.length} paper${e.relatedItems.length === 1 ? '' : 's'}`);
  }
  return lines.join('\n');
}

/** Groups items by year, oldest first. */
export function renderTimeline(concept: string, records: GraphRecord[], range: { start?: number; end?: number }): string {
  const span = range.start !== undefined && range.end !== undefined ? ` (${range.start}-${range.end})` : '';
  const lines = [`## Evolution of "${concept}"${span}`];
  const byYear = new Map<number, Item[]>();
  for (const r of itemRecords(records)) {
    const year = yearOf(r.item);
    if (year === undefined) continue;
    byYear.set(year, [...(byYear.get(year) ?? []), r.item]);
  }
  for (const year of Array.from(byYear.keys()).sort((a, b) => a - b)) {
    const items = byYear.get(year) ?? [];
    lines.push('', `### ${year} (${items.length} paper${items.length === 1 ? '' : 's'})`);
    for (const item of items) lines.push(`- ${item.title ?? item.id}`);
  }
  return lines.join('\n');
}

export function renderVenues(records: GraphRecord[], field?: string): string {
  const lines = [field ? `## Publication venues for ${field}` : '## Publication venues', ''];
  for (const e of entityRecords(records)) {
    lines.push(`- **${e.name}**: ${e.relatedItems.length} paper${e.relatedItems.length === 1 ? '' : 's'}`);
  }
  return lines.join('\n');
}

export function renderMatches(query: string, records: GraphRecord[]): string {
  const lines = [`## Library graph matches for "${query}"`, ''];
  for (const r of itemRecords(records)) lines.push(itemLine(r.item));
  return lines.join('\n');
}

export function countItems(records: GraphRecord[]): number {
  const ids = new Set<string>();
  for (const r of records) {
    if (r.kind === 'item') ids.add(r.item.id);
    else for (const item of r.relatedItems) ids.add(item.id);
  }
  return ids.size;
}
