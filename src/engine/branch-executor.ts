/**
 * Branch Executor: researches one gap.
 *
 * search → details → rank → enrich, with every external lookup behind the
 * Result Cache and every search or details call admitted by the Quota
 * Ledger first. `execute` never throws; failures become a failed outcome.
 */

import { Candidate, CandidateListSchema, RankedCandidate } from '../domain/candidate';
import { CandidateSource, StructuredTaskRunner } from '../domain/collaborators';
import {
  WorkflowError,
  quotaExhaustedError,
  runCancelledError,
  toTypedError,
} from '../domain/errors';
import { QuotaOperations } from '../domain/quota';
import { BranchStatus, Gap, RunPreferences } from '../domain/run';
import { identityCacheKey, normalizeCacheKey } from '../cache/cache-key';
import { ResultCache } from '../cache/result-cache';
import { QuotaLedger } from '../quota/quota-ledger';
import { rank } from '../ranking/ranking-engine';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { BranchOutcome } from './collector';
import { DEFAULT_RETRY_POLICY, RetryHooks, RetryPolicy, invokeWithCorrection, withRetry } from './retry';
import { SummarizeCandidateOutputSchema, TaskNames } from './task-schemas';

export interface BranchExecutorConfig {
  /** Candidates requested per search. */
  searchLimit: number;
  /** Ranked candidates kept per gap. */
  topN: number;
  searchTtlMs: number;
  detailsTtlMs: number;
  enrichmentTtlMs: number;
}

export const DEFAULT_BRANCH_CONFIG: BranchExecutorConfig = {
  searchLimit: 8,
  topN: 3,
  searchTtlMs: 60 * 60 * 1000,
  detailsTtlMs: 24 * 60 * 60 * 1000,
  enrichmentTtlMs: 7 * 24 * 60 * 60 * 1000,
};

export interface BranchExecutorDeps {
  candidates: CandidateSource;
  tasks: StructuredTaskRunner;
  ledger: QuotaLedger;
  cache: ResultCache;
  config?: Partial<BranchExecutorConfig>;
  retryPolicy?: RetryPolicy;
  retryHooks?: Omit<RetryHooks, 'logger' | 'shouldAbort'>;
  logger?: Logger;
}

export interface BranchInput {
  runId: string;
  gap: Gap;
  preferences: RunPreferences;
  /** Reference time for ranking; the run's creation time. */
  referenceTime: string;
  isCancelled: () => boolean;
}

export function personalizationTip(topic: string, candidate: Candidate): string {
  const source = candidate.sourceName ?? candidate.title;
  return `Build a highlight around ${topic} referencing ${source}; ` +
    'cite concrete results from the material to show hands-on experience.';
}

/** Overlay detail records onto search items by id, keeping search order. */
export function mergeDetails(items: Candidate[], details: Candidate[]): Candidate[] {
  const byId = new Map(details.map((detail) => [detail.id, detail]));
  return items.map((item) => {
    const detail = byId.get(item.id);
    return detail ? { ...item, ...detail } : item;
  });
}

export class BranchExecutor {
  private config: BranchExecutorConfig;
  private retryPolicy: RetryPolicy;
  private log: Logger;

  constructor(private deps: BranchExecutorDeps) {
    this.config = { ...DEFAULT_BRANCH_CONFIG, ...deps.config };
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.log = (deps.logger ?? rootLogger).child({ component: 'branch-executor' });
  }

  async execute(input: BranchInput): Promise<BranchOutcome> {
    const { runId, gap } = input;
    const log = this.log.child({ runId, gapId: gap.id });
    const hooks: RetryHooks = { ...this.deps.retryHooks, logger: log, shouldAbort: input.isCancelled };

    try {
      this.checkCancelled(input);
      const query = gap.query ?? gap.topic;
      const found = await this.search(query, hooks);
      if (found.length === 0) {
        log.info('Search returned no candidates', { query });
        return { status: BranchStatus.Done, results: [] };
      }

      this.checkCancelled(input);
      const details = await this.details(found.map((c) => c.id), hooks);
      const merged = mergeDetails(found, details);

      const ranked = rank(merged, input.preferences, {
        now: input.referenceTime,
        topic: gap.topic,
        limit: this.config.topN,
      });

      this.checkCancelled(input);
      const results: RankedCandidate[] = [];
      for (const candidate of ranked) {
        results.push(await this.enrich(candidate, gap, hooks, log));
      }

      log.info('Branch completed', { found: found.length, ranked: results.length });
      return { status: BranchStatus.Done, results };
    } catch (err) {
      const error = { ...toTypedError(err), runId, gapId: gap.id };
      log.warn('Branch failed', errorContext(err));
      return { status: BranchStatus.Failed, error };
    }
  }

  private checkCancelled(input: BranchInput): void {
    if (input.isCancelled()) {
      throw new WorkflowError(runCancelledError(input.runId));
    }
  }

  /** Admit one gated call or throw QUOTA.EXHAUSTED. */
  private async admit(operation: string): Promise<void> {
    const charge = await this.deps.ledger.charge(operation);
    if (!charge.granted) {
      throw new WorkflowError(quotaExhaustedError(charge.resource, charge.units, charge.remaining));
    }
  }

  private search(query: string, hooks: RetryHooks): Promise<Candidate[]> {
    const limit = this.config.searchLimit;
    const key = normalizeCacheKey('search', query, { limit });
    return this.deps.cache.getOrLoad(key, this.config.searchTtlMs, CandidateListSchema, () =>
      withRetry('candidates.search', async () => {
        await this.admit(QuotaOperations.Search);
        return this.deps.candidates.search(query, limit);
      }, this.retryPolicy, hooks),
    );
  }

  private details(ids: string[], hooks: RetryHooks): Promise<Candidate[]> {
    const sorted = [...new Set(ids)].sort();
    const key = identityCacheKey('details', sorted);
    return this.deps.cache.getOrLoad(key, this.config.detailsTtlMs, CandidateListSchema, () =>
      withRetry('candidates.fetchDetails', async () => {
        await this.admit(QuotaOperations.Details);
        return this.deps.candidates.fetchDetails(sorted);
      }, this.retryPolicy, hooks),
    );
  }

  private async enrich(
    candidate: RankedCandidate,
    gap: Gap,
    hooks: RetryHooks,
    log: Logger,
  ): Promise<RankedCandidate> {
    const tip = personalizationTip(gap.topic, candidate);
    try {
      const enrichment = await this.deps.cache.getOrLoad(
        identityCacheKey('enrichment', [candidate.id]),
        this.config.enrichmentTtlMs,
        SummarizeCandidateOutputSchema,
        () => invokeWithCorrection(
          this.deps.tasks,
          TaskNames.SummarizeCandidate,
          {
            topic: gap.topic,
            title: candidate.title,
            description: candidate.description ?? '',
            url: candidate.url ?? '',
          },
          SummarizeCandidateOutputSchema,
          this.retryPolicy,
          hooks,
        ),
      );
      return { ...candidate, enrichment, personalizationTip: tip };
    } catch (err) {
      log.warn('Enrichment failed', { candidateId: candidate.id, ...errorContext(err) });
      const message = err instanceof Error ? err.message : String(err);
      return { ...candidate, enrichmentError: message, personalizationTip: tip };
    }
  }
}
