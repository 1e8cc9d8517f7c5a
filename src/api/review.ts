/**
 * Reviewer and operator routes.
 *
 * GET  /review?runId=&token= - What the reviewer is asked to approve
 * POST /review/decision - { runId, token, decision }
 * POST /maintenance/expire-approvals - { olderThanMs }
 * GET  /quota - Ledger usage for the current period
 */

import { Router } from 'express';
import { z } from 'zod';
import { WorkflowError, authError, validationError } from '../domain/errors';
import { Orchestrator } from '../engine/orchestrator';
import { QuotaLedger } from '../quota/quota-ledger';
import { logger } from '../logger';
import { verifyApprovalToken } from './approval-token';
import { sendError } from './middleware';

const DecisionBodySchema = z.object({
  runId: z.string().min(1),
  token: z.string().min(1),
  decision: z.enum(['approved', 'rejected']),
});

const ReviewQuerySchema = z.object({
  runId: z.string().min(1),
  token: z.string().min(1),
});

const ExpireBodySchema = z.object({
  olderThanMs: z.number().int().nonnegative(),
});

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new WorkflowError(validationError(`Invalid ${what}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    }));
  }
  return parsed.data;
}

export function createReviewRoutes(orchestrator: Orchestrator, reviewSecret: string): Router {
  const router = Router();

  router.post('/review/decision', async (req, res) => {
    try {
      const body = parseInput(DecisionBodySchema, req.body, 'review decision');
      if (!verifyApprovalToken(body.runId, body.token, reviewSecret)) {
        logger.warn('Rejected review decision with an invalid token', { runId: body.runId });
        throw new WorkflowError(authError('Invalid approval token'));
      }
      const run = await orchestrator.resume(body.runId, body.decision);
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/review', async (req, res) => {
    try {
      const query = parseInput(ReviewQuerySchema, req.query, 'review link');
      if (!verifyApprovalToken(query.runId, query.token, reviewSecret)) {
        throw new WorkflowError(authError('Invalid approval token'));
      }
      const run = await orchestrator.getRun(query.runId);
      res.json({
        runId: run.id,
        state: run.state,
        documentRef: run.context.documentRef,
        score: run.context.score,
        insertions: run.context.insertions ?? [],
        artifact: run.context.artifact,
        approval: run.context.approval,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

export function createMaintenanceRoutes(orchestrator: Orchestrator, ledger: QuotaLedger): Router {
  const router = Router();

  router.post('/maintenance/expire-approvals', async (req, res) => {
    try {
      const body = parseInput(ExpireBodySchema, req.body, 'expiry request');
      const expired = await orchestrator.expireStaleApprovals(body.olderThanMs);
      res.json({ expired: expired.map((run) => run.id), count: expired.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/quota', async (_req, res) => {
    try {
      const entries = await ledger.usage();
      res.json({ periodKey: ledger.currentPeriodKey(), entries });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
