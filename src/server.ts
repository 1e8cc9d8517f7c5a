/**
 * Express server configuration.
 *
 * Assembles the services from configuration and mounts the API. Every
 * instance (store, ledger, cache, orchestrator) is created here once and
 * passed explicitly.
 */

import express from 'express';
import { AppConfig, loadConfig } from './config';
import { Collaborators } from './domain/collaborators';
import { WorkflowError, validationError } from './domain/errors';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { createSqliteStore } from './storage/sqlite-store';
import { RunEventPublisher } from './data-plane/publisher';
import { QuotaLedger } from './quota/quota-ledger';
import { ResultCache } from './cache/result-cache';
import { MemoryCacheTier, StoreCacheTier } from './cache/tiers';
import { Orchestrator } from './engine/orchestrator';
import { HttpDocumentSource } from './collaborators/http-document-source';
import { HttpCandidateSource } from './collaborators/http-candidate-source';
import { HttpDocumentEditor } from './collaborators/http-document-editor';
import { OpenAICompatibleTaskRunner } from './llm/openai-compatible';
import { WebhookNotifier } from './notifications/webhook';
import { LogNotifier } from './notifications/log-notifier';
import { buildReviewUrl } from './api/approval-token';
import { errorHandler } from './api/middleware';
import { createRunRoutes } from './api/runs';
import { createMaintenanceRoutes, createReviewRoutes } from './api/review';
import { Logger, logger as rootLogger } from './logger';

const VERSION = '0.1.0';
const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  publisher: RunEventPublisher;
  ledger: QuotaLedger;
  cache: ResultCache;
  orchestrator: Orchestrator;
}

export interface AppContextOptions {
  config?: AppConfig;
  store?: Store;
  /** Replace individual collaborators (tests, embedding). */
  collaborators?: Partial<Collaborators>;
  now?: () => Date;
  /** Zero-delay retries for tests. */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function required(value: string | undefined, variable: string): string {
  if (!value) {
    throw new WorkflowError(validationError(`${variable} is required`, { variable }));
  }
  return value;
}

function createCollaborators(config: AppConfig, overrides: Partial<Collaborators>, log: Logger): Collaborators {
  return {
    documents: overrides.documents ?? new HttpDocumentSource({
      baseUrl: config.documents.baseUrl,
      maxBytes: config.documents.maxBytes,
    }),
    tasks: overrides.tasks ?? new OpenAICompatibleTaskRunner({
      baseUrl: required(config.llm.baseUrl, 'LLM_BASE_URL'),
      model: config.llm.model,
      apiKey: config.llm.apiKey,
      logger: log,
    }),
    candidates: overrides.candidates ?? new HttpCandidateSource({
      baseUrl: required(config.candidateSource.url, 'CANDIDATE_SOURCE_URL'),
      apiKey: config.candidateSource.apiKey,
    }),
    notifier: overrides.notifier ?? (config.notify.webhookUrl
      ? new WebhookNotifier({
        url: config.notify.webhookUrl,
        signingSecret: config.notify.webhookSecret,
        logger: log,
      })
      : new LogNotifier(log)),
    editor: overrides.editor ?? new HttpDocumentEditor({
      baseUrl: required(config.editor.url, 'EDITOR_URL'),
      apiKey: config.editor.apiKey,
    }),
  };
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig();
  const log = options.logger ?? rootLogger;
  const store = options.store ?? (config.storage.databasePath
    ? createSqliteStore(config.storage.databasePath, { logger: log })
    : createMemoryStore());
  const now = options.now ?? (() => new Date());

  const publisher = new RunEventPublisher(store.events, { logger: log, now });
  const ledger = new QuotaLedger(store.quota, { config: config.quota, now, logger: log });
  const cache = new ResultCache(
    [
      new MemoryCacheTier({ maxEntries: config.cache.memoryMaxEntries, now: () => now().getTime() }),
      new StoreCacheTier(store.cacheEntries),
    ],
    { now: () => now().getTime(), logger: log },
  );

  const orchestrator = new Orchestrator({
    store,
    collaborators: createCollaborators(config, options.collaborators ?? {}, log),
    ledger,
    cache,
    publisher,
    reviewUrl: (runId) => buildReviewUrl(config.review.baseUrl, runId, config.review.secret),
    config: {
      maxConcurrency: config.fanOut.maxConcurrency,
      branch: {
        searchLimit: config.fanOut.searchLimit,
        topN: config.fanOut.topN,
        searchTtlMs: config.cache.searchTtlMs,
        detailsTtlMs: config.cache.detailsTtlMs,
        enrichmentTtlMs: config.cache.enrichmentTtlMs,
      },
    },
    retryPolicy: config.retry,
    retryHooks: options.sleep ? { sleep: options.sleep } : undefined,
    logger: log,
    now,
  });

  return { config, store, publisher, ledger, cache, orchestrator };
}

/** Create and configure the Express application. */
export function createApp(context: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: context.store.kind,
      activeFanOuts: context.orchestrator.activeFanOuts,
    });
  });

  app.use('/api', createRunRoutes(context.orchestrator));
  app.use('/api', createReviewRoutes(context.orchestrator, context.config.review.secret));
  app.use('/api', createMaintenanceRoutes(context.orchestrator, context.ledger));

  app.use(errorHandler);

  return app;
}
