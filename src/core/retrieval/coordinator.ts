import { createLogger } from '../log';
import { BackendTimeoutError, BackendUnavailableError, errorMessage } from '../errors';
import type { BackendFailureKind, BackendId, BackendResult, ExecutionPlan, Item, RankedItem } from './types';

const log = createLogger({ component: 'retrieval', kind: 'coordinator' });

export type BackendInvoker = (backend: BackendId, limit: number) => Promise<Item[]>;

export interface ExecuteOptions {
  /** Epoch milliseconds after which outstanding calls are reported as timed out. */
  deadline?: number;
}

const DEADLINE_PASSED = Symbol('deadline_passed');

function failureKind(e: unknown): BackendFailureKind {
  if (e instanceof BackendUnavailableError) return 'unavailable';
  if (e instanceof BackendTimeoutError) return 'timeout';
  const code = typeof e === 'object' && e !== null && 'code' in e ? String(e.code) : '';
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'EHOSTUNREACH') return 'unavailable';
  return 'failed';
}

function ranked(items: Item[], limit: number): RankedItem[] {
  return items.slice(0, limit).map((item, idx) => ({ ...item, rank: idx + 1 }));
}

async function beforeDeadline<T>(work: Promise<T>, deadline: number | undefined): Promise<T | typeof DEADLINE_PASSED> {
  if (deadline === undefined) return work;
  const remaining = deadline - Date.now();
  if (remaining <= 0) return DEADLINE_PASSED;
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof DEADLINE_PASSED>((resolve) => {
    timer = setTimeout(() => resolve(DEADLINE_PASSED), remaining);
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

function timedOut(backend: BackendId, startedAt: number, deadline: number | undefined): BackendResult {
  const err = new BackendTimeoutError(backend, Math.max(0, (deadline ?? startedAt) - startedAt));
  log.warn('backend_timeout', { backend });
  return {
    backend,
    status: 'error',
    items: [],
    durationMs: Date.now() - startedAt,
    error: { kind: 'timeout', message: err.message },
  };
}

async function callBackend(backend: BackendId, limit: number, invoke: BackendInvoker): Promise<BackendResult> {
  const startedAt = Date.now();
  try {
    const items = await invoke(backend, limit);
    const list = ranked(items, limit);
    const durationMs = Date.now() - startedAt;
    log.debug('backend_done', { backend, count: list.length, duration_ms: durationMs });
    return list.length > 0
      ? { backend, status: 'ok', items: list, durationMs }
      : { backend, status: 'empty', items: list, durationMs };
  } catch (e) {
    const kind = failureKind(e);
    log.warn('backend_failed', { backend, kind, err: errorMessage(e) });
    return {
      backend,
      status: 'error',
      items: [],
      durationMs: Date.now() - startedAt,
      error: { kind, message: errorMessage(e) },
    };
  }
}

async function guardedCall(
  backend: BackendId,
  limit: number,
  invoke: BackendInvoker,
  deadline: number | undefined
): Promise<BackendResult> {
  const startedAt = Date.now();
  if (deadline !== undefined && startedAt >= deadline) return timedOut(backend, startedAt, deadline);
  const out = await beforeDeadline(callBackend(backend, limit, invoke), deadline);
  return out === DEADLINE_PASSED ? timedOut(backend, startedAt, deadline) : out;
}

/**
 * Runs every backend of the plan and returns one result per backend in plan
 * order. Individual failures become error-tagged empty results; this function
 * does not reject because of a backend.
 */
export async function executePlan(
  plan: ExecutionPlan,
  invoke: BackendInvoker,
  options: ExecuteOptions = {}
): Promise<BackendResult[]> {
  const { deadline } = options;
  if (plan.strategy === 'parallel') {
    return Promise.all(plan.backends.map((b) => guardedCall(b, plan.perBackendLimit, invoke, deadline)));
  }

  const results: BackendResult[] = [];
  for (const backend of plan.backends) {
    results.push(await guardedCall(backend, plan.perBackendLimit, invoke, deadline));
  }
  return results;
}

export function succeededBackends(results: readonly BackendResult[]): BackendId[] {
  const out: BackendId[] = [];
  for (const r of results) {
    if (r.status !== 'error' && !out.includes(r.backend)) out.push(r.backend);
  }
  return out;
}
