import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_EXPANSION_TERMS } from './retrieval/expander';
import { ALL_BACKENDS, INTENTS, type BackendId, type Intent } from './retrieval/types';

export interface FusionConfig {
  /** Reciprocal Rank Fusion smoothing constant. */
  rrfK: number;
}

export interface QualityConfig {
  highThreshold: number;
  mediumThreshold: number;
  /** Normalized score an entry must exceed to count towards coverage. */
  qualityThreshold: number;
  minCoverage: number;
}

export interface ExecutionConfig {
  /** Plans with at least this many backends run one backend at a time. */
  sequentialThreshold: number;
  maxSubQueryWorkers: number;
  timeoutMs?: number;
}

export interface ExpansionConfig {
  enabled: boolean;
  maxWordCount: number;
  maxTermsPerConcept: number;
  terms: Readonly<Record<string, readonly string[]>>;
}

export interface RouteSpec {
  backends: readonly BackendId[];
  fetchMultiplier: number;
}

export interface OrchestratorConfig {
  defaultLimit: number;
  maxLimit: number;
  fusion: FusionConfig;
  quality: QualityConfig;
  execution: ExecutionConfig;
  expansion: ExpansionConfig;
  routes: Readonly<Record<Intent, RouteSpec>>;
  library?: string;
}

export const DEFAULT_ROUTES: Readonly<Record<Intent, RouteSpec>> = {
  semantic: { backends: ['vector'], fetchMultiplier: 1 },
  'content-similarity': { backends: ['vector'], fetchMultiplier: 1 },
  citation: { backends: ['graph'], fetchMultiplier: 1 },
  influence: { backends: ['graph'], fetchMultiplier: 1 },
  collaboration: { backends: ['graph'], fetchMultiplier: 1 },
  relationship: { backends: ['vector', 'graph'], fetchMultiplier: 2 },
  'concept-network': { backends: ['graph', 'vector'], fetchMultiplier: 2 },
  metadata: { backends: ['vector', 'metadata'], fetchMultiplier: 2 },
  temporal: { backends: ['graph', 'metadata'], fetchMultiplier: 2 },
  venue: { backends: ['graph', 'metadata'], fetchMultiplier: 2 },
  comprehensive: { backends: ['vector', 'graph', 'metadata'], fetchMultiplier: 2 },
};

export function defaultOrchestratorConfig(): OrchestratorConfig {
  return {
    defaultLimit: 10,
    maxLimit: 100,
    fusion: { rrfK: 60 },
    quality: {
      highThreshold: 0.8,
      mediumThreshold: 0.6,
      qualityThreshold: 0.5,
      minCoverage: 0.5,
    },
    execution: {
      sequentialThreshold: 3,
      maxSubQueryWorkers: 5,
    },
    expansion: {
      enabled: true,
      maxWordCount: 4,
      maxTermsPerConcept: 2,
      terms: DEFAULT_EXPANSION_TERMS,
    },
    routes: DEFAULT_ROUTES,
  };
}

const RouteSchema = z.object({
  backends: z.array(z.enum(ALL_BACKENDS)).min(1),
  fetchMultiplier: z.number().int().positive(),
});

const unitInterval = z.number().min(0).max(1);

export const ConfigOverridesSchema = z
  .object({
    library: z.string().min(1).optional(),
    defaultLimit: z.number().int().positive().optional(),
    maxLimit: z.number().int().positive().optional(),
    fusion: z.object({ rrfK: z.number().positive() }).partial().optional(),
    quality: z
      .object({
        highThreshold: unitInterval,
        mediumThreshold: unitInterval,
        qualityThreshold: unitInterval,
        minCoverage: unitInterval,
      })
      .partial()
      .optional(),
    execution: z
      .object({
        sequentialThreshold: z.number().int().min(2),
        maxSubQueryWorkers: z.number().int().positive(),
        timeoutMs: z.number().int().positive(),
      })
      .partial()
      .optional(),
    expansion: z
      .object({
        enabled: z.boolean(),
        maxWordCount: z.number().int().positive(),
        maxTermsPerConcept: z.number().int().positive(),
        terms: z.record(z.array(z.string().min(1))),
      })
      .partial()
      .optional(),
    routes: z.record(z.enum(INTENTS), RouteSchema).optional(),
  })
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/** Applies overrides on top of the defaults and returns a frozen config value. */
export function mergeOrchestratorConfig(overrides: ConfigOverrides = {}): Readonly<OrchestratorConfig> {
  const base = defaultOrchestratorConfig();
  const routes: Record<Intent, RouteSpec> = { ...base.routes };
  for (const intent of INTENTS) {
    const route = overrides.routes?.[intent];
    if (route) routes[intent] = { backends: [...route.backends], fetchMultiplier: route.fetchMultiplier };
  }

  const merged: OrchestratorConfig = {
    defaultLimit: overrides.defaultLimit ?? base.defaultLimit,
    maxLimit: overrides.maxLimit ?? base.maxLimit,
    fusion: { ...base.fusion, ...overrides.fusion },
    quality: { ...base.quality, ...overrides.quality },
    execution: { ...base.execution, ...overrides.execution },
    expansion: {
      ...base.expansion,
      ...overrides.expansion,
      terms: { ...(overrides.expansion?.terms ?? base.expansion.terms) },
    },
    routes,
    library: overrides.library ?? base.library,
  };

  if (merged.quality.mediumThreshold > merged.quality.highThreshold) {
    throw new ConfigError('quality.mediumThreshold must not exceed quality.highThreshold', {
      context: { ...merged.quality },
    });
  }
  return deepFreeze(merged);
}

export async function loadConfigFile(file: string): Promise<ConfigOverrides> {
  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${file}`, { context: { file }, cause: e });
  }
  const parsed = ConfigOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(`Invalid config file ${file}`, {
      context: { file, issues },
      suggestions: ['Compare the file with scholarmux.config.example.json'],
    });
  }
  const overrides = parsed.data;
  if (overrides.library) overrides.library = path.resolve(path.dirname(file), overrides.library);
  return overrides;
}

export const DEFAULT_CONFIG_FILE = 'scholarmux.config.json';

export interface ResolveConfigOptions {
  configPath?: string;
  cwd?: string;
  library?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolves the runtime config: explicit file, else `scholarmux.config.json`
 * in the working directory, else defaults. The library path prefers the
 * explicit option, then the file, then SCHOLARMUX_LIBRARY.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Readonly<OrchestratorConfig>> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  let overrides: ConfigOverrides = {};
  if (options.configPath) {
    overrides = await loadConfigFile(path.resolve(cwd, options.configPath));
  } else {
    const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (await fs.pathExists(candidate)) overrides = await loadConfigFile(candidate);
  }

  const library = options.library
    ? path.resolve(cwd, options.library)
    : overrides.library ?? (env.SCHOLARMUX_LIBRARY ? path.resolve(cwd, env.SCHOLARMUX_LIBRARY) : undefined);
  return mergeOrchestratorConfig({ ...overrides, ...(library ? { library } : {}) });
}
