/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure a run can record is a TypedError with a namespaced code.
 * Collaborators and core modules throw WorkflowError, which carries the
 * TypedError so the orchestrator can classify it without string matching
 * on messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'RUN'
  | 'BRANCH'
  | 'QUOTA'
  | 'UPSTREAM'
  | 'SCHEMA'
  | 'SOURCE'
  | 'VALIDATION'
  | 'AUTH'
  | 'SYSTEM';

/** Typed suggested fix that agents can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and events. */
export interface TypedError {
  /** Namespaced error code (e.g., "QUOTA.EXHAUSTED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  runId?: string;
  gapId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  gapId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    gapId: params.gapId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error wrapper thrown across module boundaries. */
export class WorkflowError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'WorkflowError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Narrow an unknown error to a WorkflowError, optionally of one code. */
export function isWorkflowError(err: unknown, code?: string): err is WorkflowError {
  if (!(err instanceof WorkflowError)) return false;
  return code === undefined || err.typedError.code === code;
}

/**
 * Convert anything thrown into a TypedError. Unknown errors become
 * SYSTEM.INTERNAL with the original message preserved.
 */
export function toTypedError(err: unknown): TypedError {
  if (err instanceof WorkflowError) return err.typedError;
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  });
}

// --- Error codes ---

export const ErrorCodes = {
  QuotaExhausted: 'QUOTA.EXHAUSTED',
  QuotaUnknownResource: 'QUOTA.UNKNOWN_RESOURCE',
  UpstreamUnavailable: 'UPSTREAM.UNAVAILABLE',
  SchemaViolation: 'SCHEMA.VIOLATION',
  SourceNotFound: 'SOURCE.NOT_FOUND',
  SourceSizeExceeded: 'SOURCE.SIZE_EXCEEDED',
  RunCancelled: 'RUN.CANCELLED',
  RunRejected: 'RUN.REJECTED',
  RunNotFound: 'RUN.NOT_FOUND',
  RunInvalidTransition: 'RUN.INVALID_TRANSITION',
  RunNotAwaitingApproval: 'RUN.NOT_AWAITING_APPROVAL',
  CheckpointConflict: 'RUN.CHECKPOINT_CONFLICT',
  AllBranchesFailed: 'BRANCH.ALL_FAILED',
  ArtifactNotFound: 'ARTIFACT.NOT_FOUND',
} as const;

// --- Factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function authError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message,
    retryable: false,
  });
}

export function quotaExhaustedError(resource: string, units: number, remaining: number): TypedError {
  return createTypedError({
    code: ErrorCodes.QuotaExhausted,
    message: `Quota exhausted for "${resource}": requested ${units} units, ${remaining} remaining this period`,
    retryable: false,
    details: { resource, units, remaining },
    suggestedFixes: [
      { type: 'WAIT_FOR_PERIOD_ROLLOVER', params: { resource } },
      { type: 'RAISE_BUDGET', params: { resource } },
    ],
  });
}

export function unknownQuotaResourceError(resource: string): TypedError {
  return createTypedError({
    code: ErrorCodes.QuotaUnknownResource,
    message: `No quota budget configured for resource "${resource}"`,
    retryable: false,
    details: { resource },
  });
}

/**
 * Upstream failure that is expected to clear on its own (network errors,
 * HTTP 429 and 5xx).
 */
export function upstreamUnavailableError(service: string, message: string, statusCode?: number): TypedError {
  return createTypedError({
    code: ErrorCodes.UpstreamUnavailable,
    message: `${service} unavailable: ${message}`,
    retryable: true,
    details: statusCode !== undefined ? { service, statusCode } : { service },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } }],
  });
}

export function schemaViolationError(taskName: string, issues: string[]): TypedError {
  return createTypedError({
    code: ErrorCodes.SchemaViolation,
    message: `Structured task "${taskName}" returned output that does not match its schema: ${issues.join('; ')}`,
    retryable: true,
    details: { taskName, issues },
    suggestedFixes: [{ type: 'RETRY_WITH_CORRECTION', params: { taskName } }],
  });
}

export function sourceNotFoundError(ref: string): TypedError {
  return createTypedError({
    code: ErrorCodes.SourceNotFound,
    message: `Document not found: ${ref}`,
    retryable: false,
    details: { ref },
  });
}

export function sizeExceededError(ref: string, maxBytes: number, actualBytes?: number): TypedError {
  return createTypedError({
    code: ErrorCodes.SourceSizeExceeded,
    message: `Document ${ref} exceeds the ${maxBytes} byte limit`,
    retryable: false,
    details: { ref, maxBytes, actualBytes },
    suggestedFixes: [{ type: 'SHORTEN_DOCUMENT', params: { maxBytes } }],
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: ErrorCodes.RunNotFound,
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runCancelledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: ErrorCodes.RunCancelled,
    message: reason ? `Run cancelled: ${reason}` : 'Run cancelled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function runRejectedError(runId: string): TypedError {
  return createTypedError({
    code: ErrorCodes.RunRejected,
    message: 'Run rejected by reviewer',
    runId,
    retryable: false,
  });
}

export function runInvalidTransitionError(from: string, to: string, runId?: string): TypedError {
  return createTypedError({
    code: ErrorCodes.RunInvalidTransition,
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    retryable: false,
    details: { from, to },
  });
}

export function runNotAwaitingApprovalError(runId: string, state: string): TypedError {
  return createTypedError({
    code: ErrorCodes.RunNotAwaitingApproval,
    message: `Run ${runId} is not awaiting approval (state: ${state})`,
    runId,
    retryable: false,
    details: { state },
  });
}

export function checkpointConflictError(runId: string, expectedSeq: number, latestSeq: number): TypedError {
  return createTypedError({
    code: ErrorCodes.CheckpointConflict,
    message: `Run ${runId} was checkpointed concurrently (expected seq ${expectedSeq}, latest ${latestSeq})`,
    runId,
    retryable: true,
    details: { expectedSeq, latestSeq },
  });
}

export function allBranchesFailedError(runId: string, failures: Record<string, string>): TypedError {
  return createTypedError({
    code: ErrorCodes.AllBranchesFailed,
    message: `All ${Object.keys(failures).length} research branches failed`,
    runId,
    retryable: false,
    details: { failures },
  });
}

export function artifactNotFoundError(runId: string, type: string): TypedError {
  return createTypedError({
    code: ErrorCodes.ArtifactNotFound,
    message: `Run ${runId} has no ${type} artifact`,
    runId,
    retryable: false,
    details: { type },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
