/**
 * Run domain model.
 *
 * A run is one execution of the review workflow over a single document.
 * Its context accumulates the working data of every step; the run itself
 * is only ever replaced by a newer checkpoint, never edited in place.
 */

import { RankedCandidate } from './candidate';
import { TypedError } from './errors';

/** Run lifecycle states, in workflow order. */
export enum RunState {
  Created = 'created',
  Ingesting = 'ingesting',
  Analyzing = 'analyzing',
  Scoring = 'scoring',
  FanningOut = 'fanning_out',
  Collecting = 'collecting',
  AwaitingApproval = 'awaiting_approval',
  Finalizing = 'finalizing',
  Completed = 'completed',
  Failed = 'failed',
}

/** Per-gap branch states. */
export enum BranchStatus {
  Pending = 'pending',
  Running = 'running',
  Done = 'done',
  Failed = 'failed',
}

export type FailureReason = 'error' | 'rejected' | 'cancelled';

export type ApprovalDecision = 'approved' | 'rejected';

export const APPROVAL_DECISIONS: readonly ApprovalDecision[] = ['approved', 'rejected'];

/** Valid state transitions for runs. Failed is reachable from every non-terminal state. */
export const VALID_RUN_TRANSITIONS: Record<RunState, RunState[]> = {
  [RunState.Created]: [RunState.Ingesting, RunState.Failed],
  [RunState.Ingesting]: [RunState.Analyzing, RunState.Failed],
  [RunState.Analyzing]: [RunState.Scoring, RunState.Failed],
  [RunState.Scoring]: [RunState.FanningOut, RunState.Failed],
  [RunState.FanningOut]: [RunState.Collecting, RunState.Failed],
  [RunState.Collecting]: [RunState.AwaitingApproval, RunState.Failed],
  [RunState.AwaitingApproval]: [RunState.Finalizing, RunState.Failed],
  [RunState.Finalizing]: [RunState.Completed, RunState.Failed],
  [RunState.Completed]: [],
  [RunState.Failed]: [],
};

/** A gap identified by the analysis step; one research branch is spawned per gap. */
export interface Gap {
  id: string;
  topic: string;
  /** Search query used by the branch executor. */
  query: string;
  severity?: 'low' | 'medium' | 'high';
}

/** Text proposed for insertion into the source document. */
export interface Insertion {
  section: string;
  content: string;
  reason?: string;
}

export interface DocumentScore {
  overall: number;
  breakdown: Record<string, number>;
}

/** Caller-supplied ranking preferences carried with the run. */
export interface RunPreferences {
  /** Per-source multipliers, keyed by source name. Clamped by the ranking engine. */
  sourceBoosts?: Record<string, number>;
  /** Overrides the pooled prior used for shrinkage. */
  priorRatio?: number;
}

/** One fan-out unit. Immutable once done or failed. */
export interface GapBranch {
  runId: string;
  gapId: string;
  status: BranchStatus;
  results: RankedCandidate[] | null;
  error: TypedError | null;
  startedAt?: string;
  completedAt?: string;
}

export const NO_RESULTS_NOTE = 'no results';

export interface MergedGapEntry {
  gapId: string;
  topic: string;
  status: BranchStatus.Done | BranchStatus.Failed;
  results: RankedCandidate[];
  note?: typeof NO_RESULTS_NOTE;
  error?: string;
}

/** Barrier output: every gap in gap-id order. */
export interface MergedArtifact {
  gaps: MergedGapEntry[];
  succeeded: number;
  failed: number;
  /** sha256 of the canonical JSON of `gaps`. */
  artifactHash: string;
}

/** A portfolio project combining several missing skills. */
export interface ProjectPlan {
  title: string;
  skillsCombined: string[];
  /** Ids of the researched candidates the project builds on. */
  tutorialRefs?: string[];
  personalizationTip: string;
  cvBlurb: string;
  estimatedBuildTime?: string;
  roleFitNote?: string;
}

export interface ApprovalRecord {
  requestRef?: string;
  requestedAt?: string;
  decision?: ApprovalDecision;
  decidedAt?: string;
}

export interface FinalizationRecord {
  applied: number;
  editRef?: string;
  finalScore?: DocumentScore;
  completedAt: string;
}

/** Target specification: a reference to fetch or inline text. */
export type TargetSpecInput = { ref: string } | { text: string };

/** Accumulated working data of a run. */
export interface RunContext {
  documentRef: string;
  targetSpec: TargetSpecInput;
  preferences: RunPreferences;
  sourceText?: string;
  targetSpecText?: string;
  analysisSummary?: string;
  gaps?: Gap[];
  score?: DocumentScore;
  insertions?: Insertion[];
  branches?: Record<string, GapBranch>;
  artifact?: MergedArtifact;
  /** Empty when synthesis was skipped or failed. */
  projectPlans?: ProjectPlan[];
  approval?: ApprovalRecord;
  finalization?: FinalizationRecord;
}

/** A single workflow execution. */
export interface Run {
  id: string;
  state: RunState;
  /** Sequence number of the checkpoint this snapshot was read from. */
  checkpointSeq: number;
  createdAt: string;
  updatedAt: string;
  /** Verbatim message of the failure that ended the run. */
  lastError: string | null;
  error?: TypedError;
  failureReason?: FailureReason;
  context: RunContext;
}

/** A persisted, self-contained snapshot of a run. */
export interface Checkpoint {
  seq: number;
  runId: string;
  state: RunState;
  run: Run;
  createdAt: string;
}

/** Input for creating a new run. */
export interface CreateRunInput {
  documentRef: string;
  targetSpec: TargetSpecInput;
  preferences?: RunPreferences;
}

/** Compact run listing entry. */
export interface RunSummary {
  id: string;
  state: RunState;
  documentRef: string;
  lastError: string | null;
  failureReason?: FailureReason;
  createdAt: string;
  updatedAt: string;
}

export function toRunSummary(run: Run): RunSummary {
  return {
    id: run.id,
    state: run.state,
    documentRef: run.context.documentRef,
    lastError: run.lastError,
    failureReason: run.failureReason,
    createdAt: run.createdAt,
    updatedAt: run.updatedAt,
  };
}
