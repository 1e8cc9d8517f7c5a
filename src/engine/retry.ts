/**
 * Retry policies for collaborator calls.
 *
 * UPSTREAM.UNAVAILABLE is retried with jittered exponential backoff up to
 * a cap; every other error propagates on the first attempt. Schema
 * violations from structured tasks get exactly one corrective retry.
 */

import { z } from 'zod';
import { ErrorCodes, WorkflowError, isWorkflowError } from '../domain/errors';
import { StructuredTaskRunner } from '../domain/collaborators';
import { Logger, errorContext } from '../logger';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  baseMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseMs: 250,
  maxDelayMs: 8000,
};

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Returns a value in [0, 1). */
  random?: () => number;
  logger?: Logger;
  /** Checked before each retry; a true result stops retrying and rethrows. */
  shouldAbort?: () => boolean;
}

/**
 * Delay before retry number `attempt` (1-based): full jitter over
 * `min(maxDelayMs, baseMs * 2^(attempt-1))`, never below half the window.
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const window = Math.min(policy.maxDelayMs, policy.baseMs * Math.pow(2, attempt - 1));
  return Math.round(window / 2 + random() * (window / 2));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryable(err: unknown): boolean {
  return isWorkflowError(err, ErrorCodes.UpstreamUnavailable);
}

/** Run `fn`, retrying upstream outages per `policy`. */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err) || attempt >= attempts || hooks.shouldAbort?.()) {
        throw err;
      }
      const delay = computeBackoff(policy, attempt, random);
      hooks.logger?.warn('Upstream unavailable, retrying', {
        operation: label,
        attempt,
        maxAttempts: attempts,
        delayMs: delay,
        ...errorContext(err),
      });
      await wait(delay);
    }
  }
}

/**
 * Invoke a structured task, retrying once with a correction hint when the
 * output violates the schema. Upstream outages are retried per `policy`
 * around each invocation.
 */
export async function invokeWithCorrection<T>(
  tasks: StructuredTaskRunner,
  taskName: string,
  inputs: Record<string, unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  try {
    return await withRetry(taskName, () => tasks.invokeStructuredTask(taskName, inputs, schema), policy, hooks);
  } catch (err) {
    if (!(err instanceof WorkflowError) || err.code !== ErrorCodes.SchemaViolation) throw err;
    hooks.logger?.warn('Structured task output rejected, retrying with correction', {
      task: taskName,
      ...errorContext(err),
    });
    const correctionHint = `Your previous response did not match the required schema: ${err.message}. ` +
      'Respond again with valid JSON that matches the schema exactly.';
    return withRetry(
      taskName,
      () => tasks.invokeStructuredTask(taskName, inputs, schema, { correctionHint }),
      policy,
      hooks,
    );
  }
}
