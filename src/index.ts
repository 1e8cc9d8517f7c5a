/**
 * gapflow: document gap review workflow.
 *
 * Library entry point. The server starts from `main.ts`.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig, validateConfig } from './config';
export type { AppConfig } from './config';

export * from './domain/errors';
export * from './domain/run';
export * from './domain/candidate';
export * from './domain/collaborators';
export * from './domain/quota';
export * from './domain/cache';
export * from './domain/events';
export * from './domain/artifact';

export { Orchestrator, CreateRunInputSchema } from './engine/orchestrator';
export type { OrchestratorConfig, OrchestratorDeps } from './engine/orchestrator';
export { BranchExecutor } from './engine/branch-executor';
export { transitionRunState, isTerminalRunState } from './engine/state-machine';
export { QuotaLedger, periodKeyFor } from './quota/quota-ledger';
export { ResultCache } from './cache/result-cache';
export { MemoryCacheTier, StoreCacheTier } from './cache/tiers';
export type { CacheTier } from './cache/tiers';
export { normalizeCacheKey, identityCacheKey } from './cache/cache-key';
export { rank } from './ranking/ranking-engine';
export { DEFAULT_RANKING_CONFIG } from './ranking/defaults';
export { RunEventPublisher } from './data-plane/publisher';
export { createMemoryStore } from './storage/memory-store';
export { createSqliteStore } from './storage/sqlite-store';
export type { Store, StorageKind } from './storage/store';
export { synthesizeProjectPlans } from './engine/project-plans';

export { HttpDocumentSource } from './collaborators/http-document-source';
export { HttpCandidateSource } from './collaborators/http-candidate-source';
export { HttpDocumentEditor } from './collaborators/http-document-editor';
export { OpenAICompatibleTaskRunner } from './llm/openai-compatible';
export { WebhookNotifier } from './notifications/webhook';
export { LogNotifier } from './notifications/log-notifier';
export { createLogger, logger, setLogHandler, setLogLevel } from './logger';
