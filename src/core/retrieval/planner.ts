import { DEFAULT_ROUTES, type RouteSpec } from '../config';
import type { BackendId, ExecutionPlan, Intent } from './types';

export interface PlanOptions {
  limit: number;
  /** Backends with a configured adapter, in preference order. */
  available: readonly BackendId[];
  routes?: Readonly<Record<Intent, RouteSpec>>;
  sequentialThreshold?: number;
}

export function planExecution(intent: Intent, options: PlanOptions): ExecutionPlan {
  const routes = options.routes ?? DEFAULT_ROUTES;
  const route = routes[intent];
  const threshold = options.sequentialThreshold ?? 3;

  let backends = route.backends.filter((b) => options.available.includes(b));
  if (backends.length === 0) {
    const fallback = options.available[0];
    backends = fallback ? [fallback] : [];
  }

  const everyAvailable = options.available.every((b) => backends.includes(b));
  const plan: ExecutionPlan = {
    backends: Object.freeze(backends),
    strategy: backends.length >= threshold ? 'sequential' : 'parallel',
    perBackendLimit: Math.max(1, options.limit * (backends.length > 1 ? route.fetchMultiplier : 1)),
    comprehensive: intent === 'comprehensive' || everyAvailable,
  };
  return Object.freeze(plan);
}

/** Backends of the comprehensive set that a plan has not run yet, in plan order of that set. */
export function remainingBackends(plan: ExecutionPlan, available: readonly BackendId[], routes = DEFAULT_ROUTES): BackendId[] {
  return routes.comprehensive.backends.filter((b) => available.includes(b) && !plan.backends.includes(b));
}
