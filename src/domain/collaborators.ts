/**
 * Collaborator contracts consumed by the core.
 *
 * Implementations throw WorkflowError with the codes documented on each
 * method. The orchestrator owns retry policy; implementations do not retry.
 */

import { z } from 'zod';
import { Candidate } from './candidate';
import { DocumentScore, Insertion, MergedArtifact, ProjectPlan, TargetSpecInput } from './run';

export interface DocumentSource {
  /** Throws SOURCE.NOT_FOUND, SOURCE.SIZE_EXCEEDED or UPSTREAM.UNAVAILABLE. */
  fetchSourceText(documentRef: string): Promise<string>;
  /** Inline text is returned as-is; references are fetched. */
  fetchTargetSpec(target: TargetSpecInput): Promise<string>;
}

export interface StructuredTaskOptions {
  /** Set on the corrective retry after a schema violation. */
  correctionHint?: string;
}

export interface StructuredTaskRunner {
  /** Throws SCHEMA.VIOLATION or UPSTREAM.UNAVAILABLE. */
  invokeStructuredTask<T>(
    taskName: string,
    inputs: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: StructuredTaskOptions,
  ): Promise<T>;
}

export interface CandidateSource {
  /** Expensive; always gated by the quota ledger. */
  search(query: string, limit: number): Promise<Candidate[]>;
  /** Cheap; still gated. Returns whatever subset of ids is known. */
  fetchDetails(ids: string[]): Promise<Candidate[]>;
}

export interface ApprovalSummary {
  runId: string;
  documentRef: string;
  reviewUrl: string;
  score?: DocumentScore;
  gapCount: number;
  insertions: Insertion[];
  artifact?: MergedArtifact;
  projectPlans: ProjectPlan[];
}

export interface CompletionSummary {
  runId: string;
  documentRef: string;
  applied: number;
  finalScore?: DocumentScore;
}

export interface Notifier {
  sendApprovalRequest(runId: string, summary: ApprovalSummary): Promise<{ messageRef: string }>;
  sendCompletion(runId: string, summary: CompletionSummary): Promise<void>;
}

export interface ApplyEditsResult {
  applied: number;
  editRef?: string;
  /** Document text after the edits, when the editor can return it. */
  updatedText?: string;
}

export interface DocumentEditor {
  applyEdits(documentRef: string, insertions: Insertion[], idempotencyKey: string): Promise<ApplyEditsResult>;
}

/** All collaborators the orchestrator needs. */
export interface Collaborators {
  documents: DocumentSource;
  tasks: StructuredTaskRunner;
  candidates: CandidateSource;
  notifier: Notifier;
  editor: DocumentEditor;
}
