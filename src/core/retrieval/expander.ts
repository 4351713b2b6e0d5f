import type { ExpansionConfig } from '../config';

export const DEFAULT_EXPANSION_TERMS: Readonly<Record<string, readonly string[]>> = {
  attention: ['attentional control', 'selective attention', 'sustained attention', 'divided attention'],
  memory: ['working memory', 'episodic memory', 'semantic memory', 'memory consolidation'],
  'executive function': ['cognitive control', 'inhibitory control', 'set shifting', 'working memory'],
  'cognitive control': ['executive function', 'inhibitory control', 'attention regulation', 'top-down control'],
  dissociation: ['depersonalization', 'derealization', 'dissociative experiences', 'altered states'],
  trauma: ['PTSD', 'post-traumatic stress', 'traumatic stress', 'trauma exposure'],
  anxiety: ['anxious arousal', 'worry', 'fear response', 'threat detection'],
  depression: ['depressive symptoms', 'mood disorder', 'anhedonia', 'dysphoria'],
  prefrontal: ['prefrontal cortex', 'PFC', 'dorsolateral prefrontal', 'ventromedial prefrontal'],
  amygdala: ['amygdalar', 'threat processing', 'fear conditioning', 'emotional learning'],
  hippocampus: ['hippocampal', 'memory formation', 'spatial memory', 'pattern separation'],
  fMRI: ['functional MRI', 'neuroimaging', 'brain imaging', 'BOLD signal'],
  EEG: ['electroencephalography', 'event-related potentials', 'ERP', 'neural oscillations'],
  behavioral: ['task performance', 'reaction time', 'accuracy', 'experimental paradigm'],
};

const OPERATOR_MARKERS = ['"', 'AND', 'OR', 'NOT', '(', ')'];

export interface QueryExpansion {
  text: string;
  added: string[];
}

function tokenize(query: string): string[] {
  return String(query ?? '')
    .trim()
    .split(/\s+/g)
    .filter(Boolean);
}

export function shouldExpandQuery(query: string, config: ExpansionConfig): boolean {
  if (!config.enabled) return false;
  const words = tokenize(query);
  if (words.length === 0 || words.length > config.maxWordCount) return false;
  if (OPERATOR_MARKERS.some((op) => query.includes(op))) return false;
  const lower = query.toLowerCase();
  return Object.keys(config.terms).some((term) => lower.includes(term.toLowerCase()));
}

/**
 * Appends related vocabulary to short, vague queries. Long queries and queries
 * carrying boolean operators or quotes come back unchanged.
 */
export function expandQuery(query: string, config: ExpansionConfig): QueryExpansion {
  const base = String(query ?? '').trim();
  if (!shouldExpandQuery(base, config)) return { text: base, added: [] };

  const lower = base.toLowerCase();
  const added: string[] = [];
  for (const [term, related] of Object.entries(config.terms)) {
    if (!lower.includes(term.toLowerCase())) continue;
    for (const candidate of related.slice(0, config.maxTermsPerConcept)) {
      const c = candidate.toLowerCase();
      if (lower.includes(c)) continue;
      if (added.some((a) => a.toLowerCase() === c)) continue;
      added.push(candidate);
    }
  }

  if (added.length === 0) return { text: base, added };
  return { text: `${base} ${added.join(' ')}`, added };
}
