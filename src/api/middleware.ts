/**
 * API middleware: typed error responses and request logging.
 */

import { Request, Response, NextFunction } from 'express';
import { ErrorCodes, TypedError, WorkflowError, apiError, createTypedError, validationError } from '../domain/errors';
import { logger } from '../logger';

const CONFLICT_CODES: ReadonlySet<string> = new Set([
  ErrorCodes.RunInvalidTransition,
  ErrorCodes.RunNotAwaitingApproval,
  ErrorCodes.CheckpointConflict,
]);

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('AUTH.')) return 403;
  if (CONFLICT_CODES.has(error.code)) return 409;
  return 500;
}

/** Write a thrown value as a typed JSON error response. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof WorkflowError) {
    const status = getHttpStatus(err.typedError);
    if (status >= 500) {
      logger.error('Request failed', { code: err.typedError.code, message: err.message });
    } else {
      logger.warn('Request error', { code: err.typedError.code, status });
    }
    res.status(status).json(apiError(err.typedError));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  })));
}

function isBodyParseError(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/** Global error handling middleware (body parser failures and anything routes pass on). */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(err)) {
    res.status(400).json(apiError(validationError(`Malformed JSON body: ${err.message}`)));
    return;
  }
  sendError(res, err);
}

/** Parse an optional non-negative integer query parameter. */
export function intQuery(value: unknown, name: string, fallback: number, max?: number): number {
  if (value === undefined) return fallback;
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new WorkflowError(validationError(`${name} must be a non-negative integer`, { [name]: value }));
  }
  return max !== undefined ? Math.min(parsed, max) : parsed;
}
