/**
 * @fileoverview Engine configuration
 *
 * Every tunable of the engine lives in one zod schema with defaults, so an
 * empty object is a complete configuration. Sources, lowest precedence first:
 *
 * 1. schema defaults
 * 2. a YAML file (`path` option, or the HRC_CONFIG environment variable)
 * 3. HRC_* environment variables (see {@link ENV_OVERRIDES})
 * 4. explicit overrides passed by the host
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();
const unitInterval = z.number().min(0).max(1);

export const FailureKindSchema = z.enum([
  'timeout',
  'connection',
  'io',
  'rate_limit',
  'invalid_input',
  'type_mismatch',
  'not_found',
  'circuit_open',
  'cancelled',
  'unavailable',
  'unknown',
]);

export const EngineConfigSchema = z.object({
  cache: z.object({
    /** Exact-match result cache entries */
    capacity: positiveInt.default(1000),
    /** Cached query embeddings */
    embeddingCapacity: positiveInt.default(100),
  }).strict().default({}),
  semanticCache: z.object({
    enabled: z.boolean().default(true),
    capacity: positiveInt.default(500),
    similarityThreshold: unitInterval.default(0.85),
    /** 0 disables expiry */
    ttlMs: nonNegative.default(3_600_000),
  }).strict().default({}),
  circuitBreaker: z.object({
    failureThreshold: positiveInt.default(5),
    failureWindowMs: positiveInt.default(60_000),
    recoveryTimeoutMs: positiveInt.default(30_000),
  }).strict().default({}),
  retry: z.object({
    maxAttempts: positiveInt.default(3),
    initialWaitMs: nonNegative.default(1_000),
    maxWaitMs: nonNegative.default(10_000),
    multiplier: z.number().min(1).default(2),
    jitterFactor: unitInterval.default(0.2),
    retryableErrorKinds: z.array(FailureKindSchema).default(['timeout', 'connection', 'io']),
  }).strict().default({}),
  timeouts: z.object({
    backendMs: positiveInt.default(5_000),
    embeddingMs: positiveInt.default(5_000),
    rerankMs: positiveInt.default(500),
  }).strict().default({}),
  fusion: z.object({
    k: nonNegative.default(60),
    vectorWeight: nonNegative.default(1),
    keywordWeight: nonNegative.default(1),
  }).strict().default({}),
  query: z.object({
    maxQueryLength: positiveInt.default(1_000),
    defaultResultLimit: positiveInt.default(10),
    maxResultLimit: positiveInt.default(100),
    defaultRerankTopK: z.number().int().nonnegative().default(20),
    maxRerankTopK: positiveInt.default(100),
    /** Backends are asked for resultLimit × this many hits */
    candidateMultiplier: positiveInt.default(2),
  }).strict().default({}),
  expansion: z.object({
    enabled: z.boolean().default(true),
    useSynonyms: z.boolean().default(true),
    useAcronyms: z.boolean().default(true),
    maxExpansionsPerTerm: positiveInt.default(5),
    maxExpansionFactor: z.number().min(1).default(3),
    minFrequency: unitInterval.default(0.2),
  }).strict().default({}),
  staleFallback: z.object({
    enabled: z.boolean().default(true),
    /** Least embedding similarity for serving another query's cached answer */
    minSimilarity: unitInterval.default(0.5),
  }).strict().default({}),
}).strict().superRefine((config, ctx) => {
  if (config.retry.maxWaitMs < config.retry.initialWaitMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['retry', 'maxWaitMs'],
      message: 'must be >= retry.initialWaitMs',
    });
  }
  if (config.query.defaultResultLimit > config.query.maxResultLimit) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['query', 'defaultResultLimit'],
      message: 'must be <= query.maxResultLimit',
    });
  }
  if (config.query.defaultRerankTopK > config.query.maxRerankTopK) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['query', 'defaultRerankTopK'],
      message: 'must be <= query.maxRerankTopK',
    });
  }
});

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Validate a configuration object and fill in defaults.
 *
 * @throws ConfigurationError naming the first offending key
 */
export function resolveEngineConfig(input: unknown = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.issues;
    const key = first && first.path.length > 0 ? first.path.join('.') : 'config';
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(key, details.join('; '));
  }
  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveEngineConfig({});

// ============================================================================
// ENVIRONMENT
// ============================================================================

type EnvValueType = 'number' | 'boolean' | 'list';

/** HRC_* variable → config path and value type. */
export const ENV_OVERRIDES: Readonly<Record<string, { path: readonly [string, string]; type: EnvValueType }>> = {
  HRC_CACHE_CAPACITY: { path: ['cache', 'capacity'], type: 'number' },
  HRC_EMBEDDING_CACHE_CAPACITY: { path: ['cache', 'embeddingCapacity'], type: 'number' },
  HRC_SEMANTIC_CACHE_ENABLED: { path: ['semanticCache', 'enabled'], type: 'boolean' },
  HRC_SEMANTIC_CACHE_CAPACITY: { path: ['semanticCache', 'capacity'], type: 'number' },
  HRC_SEMANTIC_CACHE_THRESHOLD: { path: ['semanticCache', 'similarityThreshold'], type: 'number' },
  HRC_SEMANTIC_CACHE_TTL_MS: { path: ['semanticCache', 'ttlMs'], type: 'number' },
  HRC_BREAKER_FAILURE_THRESHOLD: { path: ['circuitBreaker', 'failureThreshold'], type: 'number' },
  HRC_BREAKER_FAILURE_WINDOW_MS: { path: ['circuitBreaker', 'failureWindowMs'], type: 'number' },
  HRC_BREAKER_RECOVERY_TIMEOUT_MS: { path: ['circuitBreaker', 'recoveryTimeoutMs'], type: 'number' },
  HRC_RETRY_MAX_ATTEMPTS: { path: ['retry', 'maxAttempts'], type: 'number' },
  HRC_RETRY_INITIAL_WAIT_MS: { path: ['retry', 'initialWaitMs'], type: 'number' },
  HRC_RETRY_MAX_WAIT_MS: { path: ['retry', 'maxWaitMs'], type: 'number' },
  HRC_RETRY_MULTIPLIER: { path: ['retry', 'multiplier'], type: 'number' },
  HRC_RETRY_KINDS: { path: ['retry', 'retryableErrorKinds'], type: 'list' },
  HRC_BACKEND_TIMEOUT_MS: { path: ['timeouts', 'backendMs'], type: 'number' },
  HRC_EMBEDDING_TIMEOUT_MS: { path: ['timeouts', 'embeddingMs'], type: 'number' },
  HRC_RERANK_TIMEOUT_MS: { path: ['timeouts', 'rerankMs'], type: 'number' },
  HRC_FUSION_K: { path: ['fusion', 'k'], type: 'number' },
  HRC_DEFAULT_RESULT_LIMIT: { path: ['query', 'defaultResultLimit'], type: 'number' },
  HRC_MAX_RESULT_LIMIT: { path: ['query', 'maxResultLimit'], type: 'number' },
  HRC_MAX_RERANK_TOP_K: { path: ['query', 'maxRerankTopK'], type: 'number' },
  HRC_EXPANSION_ENABLED: { path: ['expansion', 'enabled'], type: 'boolean' },
  HRC_STALE_FALLBACK_ENABLED: { path: ['staleFallback', 'enabled'], type: 'boolean' },
};

function parseEnvValue(name: string, raw: string, type: EnvValueType): unknown {
  const value = raw.trim();
  switch (type) {
    case 'number': {
      const parsed = Number(value);
      if (value === '' || !Number.isFinite(parsed)) {
        throw new ConfigurationError(name, `expected a number, got "${raw}"`);
      }
      return parsed;
    }
    case 'boolean': {
      const lowered = value.toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
      if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
      throw new ConfigurationError(name, `expected a boolean, got "${raw}"`);
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
  }
}

/**
 * Nested partial config built from HRC_* variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, Record<string, unknown>> = {};
  for (const [name, { path, type }] of Object.entries(ENV_OVERRIDES)) {
    const raw = env[name];
    if (raw === undefined) continue;
    const [section, key] = path;
    const target = (result[section] ??= {});
    target[key] = parseEnvValue(name, raw, type);
  }
  return result;
}

// ============================================================================
// LOADING
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursive merge of plain objects; arrays and scalars from `override` win. */
export function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? mergeConfig(existing, value) : value;
  }
  return merged;
}

export interface LoadEngineConfigOptions {
  /** YAML file; falls back to env.HRC_CONFIG */
  path?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: EngineConfigInput;
}

/**
 * Load configuration from file, environment and overrides.
 *
 * @throws ConfigurationError when the file is unreadable, not YAML, or the
 * merged configuration fails validation
 */
export async function loadEngineConfig(options: LoadEngineConfigOptions = {}): Promise<EngineConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? env.HRC_CONFIG;

  let fromFile: Record<string, unknown> = {};
  if (path) {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new ConfigurationError('path', `cannot read ${path}: ${getErrorMessage(error)}`);
    }
    let parsed: unknown;
    try {
      parsed = parseYaml(text);
    } catch (error) {
      throw new ConfigurationError('path', `invalid YAML in ${path}: ${getErrorMessage(error)}`);
    }
    if (isPlainObject(parsed)) {
      fromFile = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new ConfigurationError('path', `${path} must contain a mapping at the top level`);
    }
  }

  const overrides: Record<string, unknown> = isPlainObject(options.overrides) ? options.overrides : {};
  return resolveEngineConfig(mergeConfig(mergeConfig(fromFile, configFromEnv(env)), overrides));
}
