/**
 * Application configuration from environment variables.
 *
 * Usage:
 *   const config = loadConfig(process.env);
 *   const result = validateConfig(config);
 *   if (!result.valid) console.error(result.errors);
 *
 * Map-valued variables use comma-separated pairs:
 *   QUOTA_BUDGETS="candidates=10000,llm=500"
 *   QUOTA_UNIT_COSTS="search=candidates:100,details=candidates:1"
 *
 * DATABASE_PATH selects the SQLite store; without it runs live in memory.
 */

import { DEFAULT_QUOTA_CONFIG, OperationCost, QuotaConfig, QuotaPeriod } from './domain/quota';
import { WorkflowError, validationError } from './domain/errors';
import { DEFAULT_BRANCH_CONFIG } from './engine/branch-executor';
import { DEFAULT_ORCHESTRATOR_CONFIG } from './engine/orchestrator';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from './engine/retry';
import { LogLevel, parseLogLevel } from './logger';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  storage: {
    /** SQLite database file. Unset keeps everything in memory. */
    databasePath?: string;
  };
  quota: QuotaConfig;
  fanOut: {
    maxConcurrency: number;
    searchLimit: number;
    topN: number;
  };
  cache: {
    memoryMaxEntries: number;
    searchTtlMs: number;
    detailsTtlMs: number;
    enrichmentTtlMs: number;
  };
  retry: RetryPolicy;
  review: {
    secret: string;
    baseUrl: string;
    /** Approvals older than this are expired by the periodic sweep; 0 disables it. */
    expiryMs: number;
  };
  documents: {
    maxBytes: number;
    baseUrl?: string;
  };
  candidateSource: {
    url?: string;
    apiKey?: string;
  };
  llm: {
    baseUrl?: string;
    model: string;
    apiKey?: string;
  };
  notify: {
    webhookUrl?: string;
    webhookSecret?: string;
  };
  editor: {
    url?: string;
    apiKey?: string;
  };
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Review secret used when REVIEW_SECRET is unset. Flagged by validateConfig. */
export const DEV_REVIEW_SECRET = 'dev-review-secret';

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Unset → fallback; anything else is parsed and left for validateConfig to judge. */
function num(value: string | undefined, fallback: number): number {
  const raw = text(value);
  return raw === undefined ? fallback : Number(raw);
}

function pairs(name: string, value: string): Array<[string, string]> {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const eq = part.indexOf('=');
      if (eq <= 0 || eq === part.length - 1) {
        throw new WorkflowError(validationError(`${name}: expected key=value, got "${part}"`, { variable: name }));
      }
      return [part.slice(0, eq).trim(), part.slice(eq + 1).trim()];
    });
}

export function parseBudgets(value: string): Record<string, number> {
  const budgets: Record<string, number> = {};
  for (const [resource, ceiling] of pairs('QUOTA_BUDGETS', value)) {
    budgets[resource] = Number(ceiling);
  }
  return budgets;
}

export function parseUnitCosts(value: string): Record<string, OperationCost> {
  const costs: Record<string, OperationCost> = {};
  for (const [operation, spec] of pairs('QUOTA_UNIT_COSTS', value)) {
    const colon = spec.indexOf(':');
    if (colon <= 0) {
      throw new WorkflowError(validationError(
        `QUOTA_UNIT_COSTS: expected operation=resource:units, got "${operation}=${spec}"`,
        { variable: 'QUOTA_UNIT_COSTS' },
      ));
    }
    costs[operation] = { resource: spec.slice(0, colon).trim(), units: Number(spec.slice(colon + 1)) };
  }
  return costs;
}

function parsePeriod(value: string | undefined): QuotaPeriod {
  const raw = text(value)?.toLowerCase();
  if (raw === undefined) return DEFAULT_QUOTA_CONFIG.period;
  if (raw === 'day' || raw === 'hour') return raw;
  throw new WorkflowError(validationError(`QUOTA_PERIOD must be "day" or "hour", got "${raw}"`, { variable: 'QUOTA_PERIOD' }));
}

/** Build the configuration from environment variables, applying defaults. */
export function loadConfig(env: Env = process.env): AppConfig {
  const budgets = text(env.QUOTA_BUDGETS);
  const unitCosts = text(env.QUOTA_UNIT_COSTS);
  const logLevel = text(env.LOG_LEVEL);
  const parsedLevel = parseLogLevel(logLevel);
  if (logLevel !== undefined && parsedLevel === undefined) {
    throw new WorkflowError(validationError(`LOG_LEVEL "${logLevel}" is not one of debug, info, warn, error`, { variable: 'LOG_LEVEL' }));
  }

  return {
    port: num(env.PORT, 5000),
    logLevel: parsedLevel ?? LogLevel.Info,
    storage: {
      databasePath: text(env.DATABASE_PATH),
    },
    quota: {
      period: parsePeriod(env.QUOTA_PERIOD),
      budgets: budgets ? parseBudgets(budgets) : { ...DEFAULT_QUOTA_CONFIG.budgets },
      unitCosts: unitCosts ? parseUnitCosts(unitCosts) : { ...DEFAULT_QUOTA_CONFIG.unitCosts },
    },
    fanOut: {
      maxConcurrency: num(env.FANOUT_MAX_CONCURRENCY, DEFAULT_ORCHESTRATOR_CONFIG.maxConcurrency),
      searchLimit: num(env.FANOUT_SEARCH_LIMIT, DEFAULT_BRANCH_CONFIG.searchLimit),
      topN: num(env.FANOUT_TOP_N, DEFAULT_BRANCH_CONFIG.topN),
    },
    cache: {
      memoryMaxEntries: num(env.CACHE_MEMORY_MAX_ENTRIES, 1000),
      searchTtlMs: num(env.CACHE_SEARCH_TTL_MS, DEFAULT_BRANCH_CONFIG.searchTtlMs),
      detailsTtlMs: num(env.CACHE_DETAILS_TTL_MS, DEFAULT_BRANCH_CONFIG.detailsTtlMs),
      enrichmentTtlMs: num(env.CACHE_ENRICHMENT_TTL_MS, DEFAULT_BRANCH_CONFIG.enrichmentTtlMs),
    },
    retry: {
      maxAttempts: num(env.RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts),
      baseMs: num(env.RETRY_BASE_MS, DEFAULT_RETRY_POLICY.baseMs),
      maxDelayMs: num(env.RETRY_MAX_DELAY_MS, DEFAULT_RETRY_POLICY.maxDelayMs),
    },
    review: {
      secret: text(env.REVIEW_SECRET) ?? DEV_REVIEW_SECRET,
      baseUrl: (text(env.REVIEW_BASE_URL) ?? 'http://localhost:5000/api').replace(/\/+$/, ''),
      expiryMs: num(env.APPROVAL_EXPIRY_MS, 0),
    },
    documents: {
      maxBytes: num(env.DOCUMENT_MAX_BYTES, 2 * 1024 * 1024),
      baseUrl: text(env.DOCUMENT_BASE_URL),
    },
    candidateSource: {
      url: text(env.CANDIDATE_SOURCE_URL),
      apiKey: text(env.CANDIDATE_SOURCE_API_KEY),
    },
    llm: {
      baseUrl: text(env.LLM_BASE_URL),
      model: text(env.LLM_MODEL) ?? 'gpt-4o-mini',
      apiKey: text(env.LLM_API_KEY),
    },
    notify: {
      webhookUrl: text(env.NOTIFY_WEBHOOK_URL),
      webhookSecret: text(env.NOTIFY_WEBHOOK_SECRET),
    },
    editor: {
      url: text(env.EDITOR_URL),
      apiKey: text(env.EDITOR_API_KEY),
    },
  };
}

function positiveInt(errors: string[], name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) errors.push(`${name} must be a positive integer, got ${value}`);
}

function nonNegativeInt(errors: string[], name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) errors.push(`${name} must be a non-negative integer, got ${value}`);
}

/** Check a configuration for consistency. */
export function validateConfig(config: AppConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`PORT must be between 0 and 65535, got ${config.port}`);
  }

  for (const [resource, ceiling] of Object.entries(config.quota.budgets)) {
    nonNegativeInt(errors, `QUOTA_BUDGETS.${resource}`, ceiling);
  }
  for (const [operation, cost] of Object.entries(config.quota.unitCosts)) {
    nonNegativeInt(errors, `QUOTA_UNIT_COSTS.${operation}`, cost.units);
    if (!(cost.resource in config.quota.budgets)) {
      errors.push(`QUOTA_UNIT_COSTS.${operation} charges "${cost.resource}", which has no budget`);
    }
  }

  positiveInt(errors, 'FANOUT_MAX_CONCURRENCY', config.fanOut.maxConcurrency);
  positiveInt(errors, 'FANOUT_SEARCH_LIMIT', config.fanOut.searchLimit);
  positiveInt(errors, 'FANOUT_TOP_N', config.fanOut.topN);
  if (config.fanOut.topN > config.fanOut.searchLimit) {
    warnings.push('FANOUT_TOP_N exceeds FANOUT_SEARCH_LIMIT; branches keep at most FANOUT_SEARCH_LIMIT results');
  }

  positiveInt(errors, 'CACHE_MEMORY_MAX_ENTRIES', config.cache.memoryMaxEntries);
  positiveInt(errors, 'CACHE_SEARCH_TTL_MS', config.cache.searchTtlMs);
  positiveInt(errors, 'CACHE_DETAILS_TTL_MS', config.cache.detailsTtlMs);
  positiveInt(errors, 'CACHE_ENRICHMENT_TTL_MS', config.cache.enrichmentTtlMs);

  positiveInt(errors, 'RETRY_MAX_ATTEMPTS', config.retry.maxAttempts);
  nonNegativeInt(errors, 'RETRY_BASE_MS', config.retry.baseMs);
  nonNegativeInt(errors, 'RETRY_MAX_DELAY_MS', config.retry.maxDelayMs);
  if (config.retry.maxDelayMs < config.retry.baseMs) {
    warnings.push('RETRY_MAX_DELAY_MS is below RETRY_BASE_MS; every retry waits at most RETRY_MAX_DELAY_MS');
  }

  positiveInt(errors, 'DOCUMENT_MAX_BYTES', config.documents.maxBytes);
  nonNegativeInt(errors, 'APPROVAL_EXPIRY_MS', config.review.expiryMs);

  if (config.review.secret === DEV_REVIEW_SECRET) {
    warnings.push('REVIEW_SECRET is not set; approval tokens use a development secret');
  }
  if (!/^https?:\/\//i.test(config.review.baseUrl)) {
    errors.push(`REVIEW_BASE_URL must be an http(s) URL, got "${config.review.baseUrl}"`);
  }

  if (!config.candidateSource.url) errors.push('CANDIDATE_SOURCE_URL is required');
  if (!config.llm.baseUrl) errors.push('LLM_BASE_URL is required');
  if (!config.editor.url) errors.push('EDITOR_URL is required');
  if (!config.notify.webhookUrl) {
    warnings.push('NOTIFY_WEBHOOK_URL is not set; approval requests are only logged');
  } else if (!config.notify.webhookSecret) {
    warnings.push('NOTIFY_WEBHOOK_SECRET is not set; webhook payloads are unsigned');
  }

  return { valid: errors.length === 0, errors, warnings };
}
