/**
 * Orchestrator: drives runs through the step table.
 *
 * Steps execute outside the per-run lock; their results are committed
 * under it after re-reading the latest checkpoint. A result for a run that
 * became terminal in the meantime (cancellation) is discarded. Branch
 * slots are committed the same way as each branch settles.
 *
 * Each fan-out in progress holds a cancellation token that lives exactly
 * as long as the fan-out; cancelling a run flips its token, if any.
 */

import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { Artifact } from '../domain/artifact';
import { Collaborators } from '../domain/collaborators';
import {
  TypedError,
  WorkflowError,
  artifactNotFoundError,
  runCancelledError,
  runNotAwaitingApprovalError,
  runNotFoundError,
  runRejectedError,
  toTypedError,
  validationError,
} from '../domain/errors';
import {
  APPROVAL_DECISIONS,
  ApprovalDecision,
  BranchStatus,
  Checkpoint,
  CreateRunInput,
  FailureReason,
  Gap,
  GapBranch,
  Run,
  RunContext,
  RunState,
} from '../domain/run';
import { ListOptions, Store } from '../storage/store';
import { ResultCache } from '../cache/result-cache';
import { QuotaLedger } from '../quota/quota-ledger';
import { RunEventPublisher } from '../data-plane/publisher';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { BranchExecutor, BranchExecutorConfig } from './branch-executor';
import { BranchOutcome, markRunning, settleSlot, unfinishedGapIds } from './collector';
import { runBounded } from './fan-out';
import { KeyedMutex } from './keyed-mutex';
import { DEFAULT_RETRY_POLICY, RetryHooks, RetryPolicy } from './retry';
import { SideEffectGuard } from './side-effects';
import { StepDefinition, StepEnv, StepResult, stepFor } from './steps';
import { isTerminalRunState, transitionRunState } from './state-machine';

export interface OrchestratorConfig {
  /** Branches running at once per run. */
  maxConcurrency: number;
  branch: Partial<BranchExecutorConfig>;
  /** Re-score the document after edits when the editor returns its text. */
  rescoreAfterEdits: boolean;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxConcurrency: 4,
  branch: {},
  rescoreAfterEdits: true,
};

export interface OrchestratorDeps {
  store: Store;
  collaborators: Collaborators;
  ledger: QuotaLedger;
  cache: ResultCache;
  /** Builds the reviewer link for a run. */
  reviewUrl: (runId: string) => string;
  publisher?: RunEventPublisher;
  config?: Partial<OrchestratorConfig>;
  retryPolicy?: RetryPolicy;
  /** Sleep and jitter overrides for retries (tests). */
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
  logger?: Logger;
  now?: () => Date;
}

const TargetSpecSchema = z.union([
  z.object({ ref: z.string().min(1) }).strict(),
  z.object({ text: z.string().min(1) }).strict(),
]);

export const CreateRunInputSchema = z.object({
  documentRef: z.string().min(1),
  targetSpec: TargetSpecSchema,
  preferences: z
    .object({
      sourceBoosts: z.record(z.number()).optional(),
      priorRatio: z.number().min(0).max(1).optional(),
    })
    .optional(),
});

interface FanOutToken {
  cancelled: boolean;
}

/** Outcome of committing a step result. */
interface CommitOutcome {
  run: Run;
  /** False when the result was discarded and driving should stop. */
  committed: boolean;
}

export class Orchestrator {
  private mutex = new KeyedMutex();
  private fanOuts = new Map<string, FanOutToken>();
  private config: OrchestratorConfig;
  private publisher: RunEventPublisher;
  private guard: SideEffectGuard;
  private branches: BranchExecutor;
  private retryPolicy: RetryPolicy;
  private log: Logger;
  private now: () => Date;

  constructor(private deps: OrchestratorDeps) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
    this.log = (deps.logger ?? rootLogger).child({ component: 'orchestrator' });
    this.now = deps.now ?? (() => new Date());
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.publisher = deps.publisher ?? new RunEventPublisher(deps.store.events, { logger: this.log, now: this.now });
    this.guard = new SideEffectGuard(deps.store.sideEffects, { logger: this.log, now: this.now });
    this.branches = new BranchExecutor({
      candidates: deps.collaborators.candidates,
      tasks: deps.collaborators.tasks,
      ledger: deps.ledger,
      cache: deps.cache,
      config: this.config.branch,
      retryPolicy: this.retryPolicy,
      retryHooks: deps.retryHooks,
      logger: this.log,
    });
  }

  get events(): RunEventPublisher {
    return this.publisher;
  }

  /** Runs whose branches are being launched or awaited right now. */
  get activeFanOuts(): number {
    return this.fanOuts.size;
  }

  // --- Run lifecycle ---

  async createRun(input: CreateRunInput): Promise<Run> {
    const parsed = CreateRunInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new WorkflowError(validationError('Invalid run input', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }));
    }

    const now = this.now().toISOString();
    const run: Run = {
      id: `run_${uuid()}`,
      state: RunState.Created,
      checkpointSeq: 0,
      createdAt: now,
      updatedAt: now,
      lastError: null,
      context: {
        documentRef: parsed.data.documentRef,
        targetSpec: parsed.data.targetSpec,
        preferences: parsed.data.preferences ?? {},
      },
    };

    const checkpoint = await this.deps.store.runs.append(run);
    this.log.info('Run created', { runId: run.id, documentRef: run.context.documentRef });
    await this.publisher.safePublish(this.publisher.runEvent(checkpoint.run, 'run.created'));
    return checkpoint.run;
  }

  /** Create a run and drive it until it suspends for approval or ends. */
  async start(input: CreateRunInput): Promise<Run> {
    const run = await this.createRun(input);
    return this.advance(run.id);
  }

  /**
   * Drive a run from its latest checkpoint. Safe to call for a run found
   * mid-flight after a restart: the current state's step runs again.
   */
  async advance(runId: string): Promise<Run> {
    let run = await this.getRun(runId);
    const log = this.log.child({ runId });

    for (;;) {
      if (isTerminalRunState(run.state)) return run;
      if (run.state === RunState.AwaitingApproval && run.context.approval?.requestedAt) return run;

      const step = stepFor(run.state);
      if (!step) return run;

      log.debug('Executing step', { state: run.state });
      let result: StepResult;
      try {
        result = await step.run(run, this.stepEnv(log.child({ state: run.state })));
      } catch (err) {
        log.error('Step failed', { state: run.state, ...errorContext(err) });
        return this.fail(runId, toTypedError(err), 'error');
      }

      const outcome = await this.commit(run, step, result);
      run = outcome.run;
      if (outcome.committed && result.kind === 'advance' && result.artifacts) {
        await this.saveArtifacts(run, result.artifacts);
      }
      if (!outcome.committed || result.kind === 'suspend') return run;
    }
  }

  /** Apply a reviewer decision to a suspended run. */
  async resume(runId: string, decision: ApprovalDecision): Promise<Run> {
    if (!APPROVAL_DECISIONS.includes(decision)) {
      throw new WorkflowError(validationError(`Invalid approval decision: ${String(decision)}`, { decision }));
    }

    const resumed = await this.mutex.runExclusive(runId, async () => {
      const latest = await this.getRun(runId);

      if (latest.state !== RunState.AwaitingApproval) {
        if (latest.context.approval?.decision === decision) {
          this.log.info('Repeated approval decision ignored', { runId, decision, state: latest.state });
          return { run: latest, proceed: false };
        }
        throw new WorkflowError(runNotAwaitingApprovalError(runId, latest.state));
      }

      const approval = { ...latest.context.approval, decision, decidedAt: this.now().toISOString() };
      if (decision === 'rejected') {
        const failed = await this.appendFailure(
          { ...latest, context: { ...latest.context, approval } },
          runRejectedError(runId),
          'rejected',
        );
        return { run: failed, proceed: false };
      }

      const next = await this.appendTransition(latest, RunState.Finalizing, { approval });
      return { run: next, proceed: true };
    });

    return resumed.proceed ? this.advance(runId) : resumed.run;
  }

  /** Fail a non-terminal run as cancelled. Terminal runs are returned unchanged. */
  async cancel(runId: string, reason?: string): Promise<Run> {
    return this.mutex.runExclusive(runId, async () => {
      const latest = await this.getRun(runId);
      if (isTerminalRunState(latest.state)) return latest;
      const fanOut = this.fanOuts.get(runId);
      if (fanOut) fanOut.cancelled = true;
      this.log.info('Cancelling run', { runId, state: latest.state, reason });
      return this.appendFailure(latest, runCancelledError(runId, reason), 'cancelled');
    });
  }

  /** Cancel every run that has waited for approval longer than `olderThanMs`. */
  async expireStaleApprovals(olderThanMs: number, now: Date = this.now()): Promise<Run[]> {
    if (!Number.isFinite(olderThanMs) || olderThanMs < 0) {
      throw new WorkflowError(validationError('olderThanMs must be a non-negative number', { olderThanMs }));
    }
    const cutoff = now.getTime() - olderThanMs;
    const waiting = await this.allRuns(RunState.AwaitingApproval);
    const expired: Run[] = [];
    for (const run of waiting) {
      if (Date.parse(run.updatedAt) >= cutoff) continue;
      const cancelled = await this.cancel(run.id, `approval expired after ${olderThanMs} ms without a decision`);
      if (cancelled.failureReason === 'cancelled') expired.push(cancelled);
    }
    if (expired.length > 0) {
      this.log.info('Expired stale approvals', { count: expired.length, olderThanMs });
    }
    return expired;
  }

  /**
   * Resume every run left mid-flight by a previous process. Runs waiting
   * for approval stay suspended.
   */
  async recover(): Promise<Run[]> {
    const candidates = (await this.allRuns()).filter(
      (run) => !isTerminalRunState(run.state) &&
        !(run.state === RunState.AwaitingApproval && run.context.approval?.requestedAt),
    );
    const recovered: Run[] = [];
    for (const run of candidates) {
      this.log.info('Recovering run', { runId: run.id, state: run.state });
      recovered.push(await this.advance(run.id));
    }
    return recovered;
  }

  // --- Queries ---

  async getRun(runId: string): Promise<Run> {
    const run = await this.deps.store.runs.getLatest(runId);
    if (!run) throw new WorkflowError(runNotFoundError(runId));
    return run;
  }

  async listRuns(options?: ListOptions & { state?: RunState }): Promise<Run[]> {
    return this.deps.store.runs.list(options);
  }

  async getHistory(runId: string): Promise<Checkpoint[]> {
    await this.getRun(runId);
    return this.deps.store.runs.history(runId);
  }

  /** Every saved artifact version of a run, newest first. */
  async listArtifacts(runId: string): Promise<Artifact[]> {
    await this.getRun(runId);
    return this.deps.store.artifacts.listByRun(runId);
  }

  /** Latest version of one artifact type. */
  async getArtifact(runId: string, type: string): Promise<Artifact> {
    await this.getRun(runId);
    const artifact = await this.deps.store.artifacts.getLatest(runId, type);
    if (!artifact) throw new WorkflowError(artifactNotFoundError(runId, type));
    return artifact;
  }

  // --- Internals ---

  private async allRuns(state?: RunState): Promise<Run[]> {
    const pageSize = 100;
    const runs: Run[] = [];
    for (let offset = 0; ; offset += pageSize) {
      const page = await this.deps.store.runs.list({ state, limit: pageSize, offset });
      runs.push(...page);
      if (page.length < pageSize) return runs;
    }
  }

  private stepEnv(log: Logger): StepEnv {
    return {
      collaborators: this.deps.collaborators,
      guard: this.guard,
      retryPolicy: this.retryPolicy,
      retryHooks: { ...this.deps.retryHooks, logger: log },
      log,
      now: this.now,
      reviewUrl: this.deps.reviewUrl,
      runBranches: (run) => this.runBranches(run),
      rescoreAfterEdits: this.config.rescoreAfterEdits,
    };
  }

  private async commit(run: Run, step: StepDefinition, result: StepResult): Promise<CommitOutcome> {
    return this.mutex.runExclusive(run.id, async () => {
      const latest = await this.getRun(run.id);
      if (isTerminalRunState(latest.state)) {
        this.log.info('Discarding step result for finished run', { runId: run.id, state: step.state, finalState: latest.state });
        return { run: latest, committed: false };
      }
      if (latest.state !== step.state) {
        this.log.warn('Run moved on while step executed; discarding result', {
          runId: run.id,
          stepState: step.state,
          currentState: latest.state,
        });
        return { run: latest, committed: false };
      }

      if (result.kind === 'suspend') {
        const suspended = await this.appendSnapshot(latest, latest.state, result.patch);
        await this.publisher.safePublish(this.publisher.runEvent(suspended, 'run.suspended'));
        this.log.info('Run suspended', { runId: run.id, state: suspended.state });
        return { run: suspended, committed: true };
      }

      return { run: await this.appendTransition(latest, step.next, result.patch), committed: true };
    });
  }

  /** Append a checkpoint moving `latest` to `next`. Caller holds the lock. */
  private async appendTransition(latest: Run, next: RunState, patch: Partial<RunContext>): Promise<Run> {
    const transition = transitionRunState(latest.state, next);
    if (!transition.success || !transition.newState) {
      throw new WorkflowError(transition.error ?? validationError(`Invalid transition to ${next}`));
    }
    const updated = await this.appendSnapshot(latest, transition.newState, patch);
    this.log.info('Run state changed', { runId: latest.id, from: latest.state, to: updated.state });
    await this.publisher.safePublish(this.publisher.runEvent(updated, 'run.state_changed', { from: latest.state }));
    if (updated.state === RunState.Completed) {
      await this.publisher.safePublish(this.publisher.runEvent(updated, 'run.completed'));
    }
    return updated;
  }

  private async appendSnapshot(latest: Run, state: RunState, patch: Partial<RunContext>): Promise<Run> {
    const checkpoint = await this.deps.store.runs.append({
      ...latest,
      state,
      updatedAt: this.now().toISOString(),
      context: { ...latest.context, ...patch },
    });
    return checkpoint.run;
  }

  /** Append a failure checkpoint. Caller holds the lock; `latest` is non-terminal. */
  private async appendFailure(latest: Run, error: TypedError, reason: FailureReason): Promise<Run> {
    const checkpoint = await this.deps.store.runs.append({
      ...latest,
      state: RunState.Failed,
      updatedAt: this.now().toISOString(),
      lastError: error.message,
      error: { ...error, runId: latest.id },
      failureReason: reason,
    });
    const failed = checkpoint.run;
    this.log.warn('Run failed', { runId: failed.id, from: latest.state, reason, code: error.code, error: error.message });
    await this.publisher.safePublish(this.publisher.runEvent(failed, 'run.failed', { from: latest.state, code: error.code }));
    return failed;
  }

  private async fail(runId: string, error: TypedError, reason: FailureReason): Promise<Run> {
    return this.mutex.runExclusive(runId, async () => {
      const latest = await this.getRun(runId);
      if (isTerminalRunState(latest.state)) return latest;
      return this.appendFailure(latest, error, reason);
    });
  }

  /** Save a committed step's artifacts. The run already holds their content, so a failed save is logged. */
  private async saveArtifacts(run: Run, drafts: Array<{ type: string; content: unknown }>): Promise<void> {
    const createdAt = this.now().toISOString();
    for (const draft of drafts) {
      try {
        const saved = await this.deps.store.artifacts.save({ runId: run.id, type: draft.type, content: draft.content, createdAt });
        this.log.debug('Artifact saved', { runId: run.id, type: saved.type, version: saved.version });
      } catch (err) {
        this.log.error('Failed to save artifact', { runId: run.id, type: draft.type, ...errorContext(err) });
      }
    }
  }

  /** Launch unfinished branches with bounded concurrency and wait for all of them. */
  private async runBranches(run: Run): Promise<Record<string, GapBranch>> {
    const token: FanOutToken = { cancelled: false };
    this.fanOuts.set(run.id, token);
    try {
      const gapsById = new Map<string, Gap>((run.context.gaps ?? []).map((gap) => [gap.id, gap]));
      const pending = unfinishedGapIds(run.context.branches ?? {});
      const tasks = pending.flatMap((gapId) => {
        const gap = gapsById.get(gapId);
        return gap ? [{ key: gapId, run: () => this.runBranch(run, gap, token) }] : [];
      });

      if (tasks.length > 0) {
        this.log.info('Launching branches', { runId: run.id, count: tasks.length, maxConcurrency: this.config.maxConcurrency });
      }

      await runBounded<BranchOutcome>(tasks, {
        maxConcurrency: this.config.maxConcurrency,
        shouldStop: () => token.cancelled,
        onSettled: (settlement) => this.commitBranch(
          run.id,
          settlement.key,
          settlement.ok
            ? settlement.value
            : { status: BranchStatus.Failed, error: { ...toTypedError(settlement.error), runId: run.id, gapId: settlement.key } },
        ),
      });

      const latest = await this.getRun(run.id);
      return latest.context.branches ?? {};
    } finally {
      if (this.fanOuts.get(run.id) === token) this.fanOuts.delete(run.id);
    }
  }

  private async runBranch(run: Run, gap: Gap, token: FanOutToken): Promise<BranchOutcome> {
    await this.updateSlots(run.id, gap.id, (slots, at) => markRunning(slots, gap.id, at));
    await this.publisher.safePublish(this.publisher.branchEvent(run.id, gap.id, 'branch.started', { query: gap.query }));
    return this.branches.execute({
      runId: run.id,
      gap,
      preferences: run.context.preferences,
      referenceTime: run.createdAt,
      isCancelled: () => token.cancelled,
    });
  }

  private async commitBranch(runId: string, gapId: string, outcome: BranchOutcome): Promise<void> {
    const accepted = await this.updateSlots(runId, gapId, (slots, at) => settleSlot(slots, gapId, outcome, at));
    if (!accepted) return;
    if (outcome.status === BranchStatus.Done) {
      await this.publisher.safePublish(
        this.publisher.branchEvent(runId, gapId, 'branch.done', { resultCount: outcome.results.length }),
      );
    } else {
      await this.publisher.safePublish(
        this.publisher.branchEvent(runId, gapId, 'branch.failed', { code: outcome.error.code, error: outcome.error.message }),
      );
    }
  }

  /**
   * Apply a slot update under the run lock. Returns false, discarding the
   * update, when the run has left `collecting` or the slot refuses it.
   */
  private async updateSlots(
    runId: string,
    gapId: string,
    update: (slots: Record<string, GapBranch>, at: string) => Record<string, GapBranch> | null,
  ): Promise<boolean> {
    return this.mutex.runExclusive(runId, async () => {
      const latest = await this.getRun(runId);
      if (latest.state !== RunState.Collecting) {
        // Another process may have ended the run; stop launching here too.
        const fanOut = this.fanOuts.get(runId);
        if (fanOut && isTerminalRunState(latest.state)) fanOut.cancelled = true;
        this.log.info('Discarding late branch update', { runId, gapId, state: latest.state });
        return false;
      }
      const slots = update(latest.context.branches ?? {}, this.now().toISOString());
      if (!slots) {
        this.log.info('Discarding branch update for settled slot', { runId, gapId });
        return false;
      }
      await this.appendSnapshot(latest, latest.state, { branches: slots });
      return true;
    });
  }
}
