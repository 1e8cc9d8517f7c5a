/**
 * Step table.
 *
 * Each non-terminal state maps to the work performed in it and the state
 * that follows. Steps read the run snapshot and return a context patch;
 * the orchestrator commits the patch and the transition under the run
 * lock. Steps are re-executed after a crash, so every external side
 * effect goes through the side-effect guard.
 */

import { z } from 'zod';
import { ArtifactDraft, ArtifactTypes } from '../domain/artifact';
import { Collaborators } from '../domain/collaborators';
import { WorkflowError, allBranchesFailedError, createTypedError } from '../domain/errors';
import { BranchStatus, Gap, GapBranch, Run, RunContext, RunState } from '../domain/run';
import { Logger, errorContext } from '../logger';
import { createPendingSlots, mergeBranches } from './collector';
import { synthesizeProjectPlans } from './project-plans';
import { RetryHooks, RetryPolicy, invokeWithCorrection, withRetry } from './retry';
import { SideEffectGuard } from './side-effects';
import { AnalyzeGapsOutputSchema, ScoreDocumentOutputSchema, TaskNames } from './task-schemas';

/** Artifacts are saved only once the step's checkpoint is committed. */
export type StepResult =
  | { kind: 'advance'; patch: Partial<RunContext>; artifacts?: Array<Omit<ArtifactDraft, 'runId' | 'createdAt'>> }
  | { kind: 'suspend'; patch: Partial<RunContext> };

/** What a step may use. Provided by the orchestrator. */
export interface StepEnv {
  collaborators: Collaborators;
  guard: SideEffectGuard;
  retryPolicy: RetryPolicy;
  retryHooks: RetryHooks;
  log: Logger;
  now: () => Date;
  reviewUrl(runId: string): string;
  /** Launch every unfinished branch and resolve with the settled slots. */
  runBranches(run: Run): Promise<Record<string, GapBranch>>;
  rescoreAfterEdits: boolean;
}

export type StepFn = (run: Run, env: StepEnv) => Promise<StepResult>;

export interface StepDefinition {
  state: RunState;
  next: RunState;
  run: StepFn;
}

function requireField<T>(run: Run, value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new WorkflowError(createTypedError({
      code: 'RUN.CONTEXT_INCOMPLETE',
      message: `Run ${run.id} reached ${run.state} without ${field}`,
      runId: run.id,
      retryable: false,
    }));
  }
  return value;
}

const created: StepFn = async () => ({ kind: 'advance', patch: {} });

const ingesting: StepFn = async (run, env) => {
  const { documents } = env.collaborators;
  const sourceText = await withRetry(
    'documents.fetchSourceText',
    () => documents.fetchSourceText(run.context.documentRef),
    env.retryPolicy,
    env.retryHooks,
  );
  const targetSpecText = await withRetry(
    'documents.fetchTargetSpec',
    () => documents.fetchTargetSpec(run.context.targetSpec),
    env.retryPolicy,
    env.retryHooks,
  );
  env.log.info('Ingested document', { sourceChars: sourceText.length, targetChars: targetSpecText.length });
  return { kind: 'advance', patch: { sourceText, targetSpecText } };
};

const analyzing: StepFn = async (run, env) => {
  const output = await invokeWithCorrection(
    env.collaborators.tasks,
    TaskNames.AnalyzeGaps,
    {
      sourceText: requireField(run, run.context.sourceText, 'sourceText'),
      targetSpecText: requireField(run, run.context.targetSpecText, 'targetSpecText'),
    },
    AnalyzeGapsOutputSchema,
    env.retryPolicy,
    env.retryHooks,
  );
  const gaps: Gap[] = output.gaps.map((gap) => ({
    id: gap.id,
    topic: gap.topic,
    query: gap.query ?? gap.topic,
    ...(gap.severity ? { severity: gap.severity } : {}),
  }));
  env.log.info('Gaps identified', { gapCount: gaps.length });
  return { kind: 'advance', patch: { gaps, analysisSummary: output.summary } };
};

const scoring: StepFn = async (run, env) => {
  const output = await invokeWithCorrection(
    env.collaborators.tasks,
    TaskNames.ScoreDocument,
    {
      sourceText: requireField(run, run.context.sourceText, 'sourceText'),
      targetSpecText: requireField(run, run.context.targetSpecText, 'targetSpecText'),
      gaps: run.context.gaps ?? [],
      summary: run.context.analysisSummary ?? '',
    },
    ScoreDocumentOutputSchema,
    env.retryPolicy,
    env.retryHooks,
  );
  return { kind: 'advance', patch: { score: output.score, insertions: output.insertions } };
};

const fanningOut: StepFn = async (run) => ({
  kind: 'advance',
  patch: { branches: createPendingSlots(run.id, run.context.gaps ?? []) },
});

const collecting: StepFn = async (run, env) => {
  const gaps = run.context.gaps ?? [];
  const branches = await env.runBranches(run);

  const failures: Record<string, string> = {};
  for (const gap of gaps) {
    const slot = branches[gap.id];
    if (slot?.status === BranchStatus.Failed) {
      failures[gap.id] = slot.error?.message ?? 'unknown error';
    }
  }
  if (gaps.length > 0 && Object.keys(failures).length === gaps.length) {
    throw new WorkflowError(allBranchesFailedError(run.id, failures));
  }

  const artifact = mergeBranches(gaps, branches);
  env.log.info('Branches merged', {
    succeeded: artifact.succeeded,
    failed: artifact.failed,
    artifactHash: artifact.artifactHash,
  });

  const projectPlans = await synthesizeProjectPlans(artifact, run.context, {
    tasks: env.collaborators.tasks,
    retryPolicy: env.retryPolicy,
    retryHooks: env.retryHooks,
    log: env.log,
  });

  return {
    kind: 'advance',
    patch: { branches, artifact, projectPlans },
    artifacts: [
      { type: ArtifactTypes.Research, content: artifact },
      ...(projectPlans.length > 0 ? [{ type: ArtifactTypes.ProjectPlans, content: projectPlans }] : []),
    ],
  };
};

const ApprovalRequestRecord = z.object({ messageRef: z.string() });

const awaitingApproval: StepFn = async (run, env) => {
  const reviewUrl = env.reviewUrl(run.id);
  const { result } = await env.guard.once(
    run.id,
    run.state,
    'approval_request',
    ApprovalRequestRecord,
    async () => {
      const summary = {
        runId: run.id,
        documentRef: run.context.documentRef,
        reviewUrl,
        score: run.context.score,
        gapCount: run.context.gaps?.length ?? 0,
        insertions: run.context.insertions ?? [],
        artifact: run.context.artifact,
        projectPlans: run.context.projectPlans ?? [],
      };
      const sent = await withRetry(
        'notifier.sendApprovalRequest',
        () => env.collaborators.notifier.sendApprovalRequest(run.id, summary),
        env.retryPolicy,
        env.retryHooks,
      );
      return { messageRef: sent.messageRef };
    },
  );
  return {
    kind: 'suspend',
    patch: {
      approval: { ...run.context.approval, requestRef: result.messageRef, requestedAt: env.now().toISOString() },
    },
  };
};

const AppliedEditsRecord = z.object({
  applied: z.number(),
  editRef: z.string().optional(),
  updatedText: z.string().optional(),
});

const CompletionRecord = z.object({ sent: z.boolean() });

const finalizing: StepFn = async (run, env) => {
  const { editor, notifier, tasks } = env.collaborators;
  const insertions = run.context.insertions ?? [];

  const { result: edits } = await env.guard.once(
    run.id,
    run.state,
    'apply_edits',
    AppliedEditsRecord,
    async (idempotencyKey) => {
      const applied = await withRetry(
        'editor.applyEdits',
        () => editor.applyEdits(run.context.documentRef, insertions, idempotencyKey),
        env.retryPolicy,
        env.retryHooks,
      );
      return { applied: applied.applied, editRef: applied.editRef, updatedText: applied.updatedText };
    },
  );

  let finalScore = run.context.finalization?.finalScore;
  if (env.rescoreAfterEdits && edits.updatedText !== undefined && finalScore === undefined) {
    try {
      const rescored = await invokeWithCorrection(
        tasks,
        TaskNames.ScoreDocument,
        {
          sourceText: edits.updatedText,
          targetSpecText: run.context.targetSpecText ?? '',
          gaps: run.context.gaps ?? [],
          summary: run.context.analysisSummary ?? '',
        },
        ScoreDocumentOutputSchema,
        env.retryPolicy,
        env.retryHooks,
      );
      finalScore = rescored.score;
    } catch (err) {
      env.log.warn('Re-scoring the edited document failed; completing without a final score', errorContext(err));
    }
  }

  await env.guard.once(run.id, run.state, 'completion', CompletionRecord, async () => {
    const summary = {
      runId: run.id,
      documentRef: run.context.documentRef,
      applied: edits.applied,
      finalScore,
    };
    await withRetry(
      'notifier.sendCompletion',
      () => notifier.sendCompletion(run.id, summary),
      env.retryPolicy,
      env.retryHooks,
    );
    return { sent: true };
  });

  return {
    kind: 'advance',
    patch: {
      finalization: {
        applied: edits.applied,
        editRef: edits.editRef,
        finalScore,
        completedAt: env.now().toISOString(),
      },
    },
  };
};

/** The workflow, in order. */
export const STEP_TABLE: readonly StepDefinition[] = [
  { state: RunState.Created, next: RunState.Ingesting, run: created },
  { state: RunState.Ingesting, next: RunState.Analyzing, run: ingesting },
  { state: RunState.Analyzing, next: RunState.Scoring, run: analyzing },
  { state: RunState.Scoring, next: RunState.FanningOut, run: scoring },
  { state: RunState.FanningOut, next: RunState.Collecting, run: fanningOut },
  { state: RunState.Collecting, next: RunState.AwaitingApproval, run: collecting },
  { state: RunState.AwaitingApproval, next: RunState.Finalizing, run: awaitingApproval },
  { state: RunState.Finalizing, next: RunState.Completed, run: finalizing },
];

export function stepFor(state: RunState): StepDefinition | undefined {
  return STEP_TABLE.find((step) => step.state === state);
}
