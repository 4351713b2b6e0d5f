export * from './types';
export { classifyIntent, DEFAULT_INTENT_RULES, FALLBACK_INTENT, type IntentRule } from './classifier';
export { decomposeQuery, splitBooleanQuery, SUBQUERY_WEIGHTS } from './decomposer';
export { expandQuery, shouldExpandQuery, DEFAULT_EXPANSION_TERMS, type QueryExpansion } from './expander';
export { planExecution, remainingBackends, type PlanOptions } from './planner';
export { executePlan, succeededBackends, type BackendInvoker, type ExecuteOptions } from './coordinator';
export { fuseResults, rrfContribution, DEFAULT_RRF_K, type FuseOptions } from './fuser';
export { assessQuality, normalizedQuality, type AssessOptions } from './quality';
export { extractAuthor, extractConcept, extractPaperId, extractYears, sanitizeParams, mergeParams } from './params';
