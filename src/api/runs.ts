/**
 * Run API routes.
 *
 * POST /runs - Start a run (202; progression continues in the background)
 * GET  /runs - List run summaries
 * GET  /runs/:runId - Get a run, lastError verbatim
 * GET  /runs/:runId/checkpoints - Checkpoint history, oldest first
 * GET  /runs/:runId/events - Run events
 * GET  /runs/:runId/artifacts - Saved artifacts, every version, newest first
 * GET  /runs/:runId/artifacts/:type - Latest version of one artifact type
 * POST /runs/:runId/cancel - Cancel a non-terminal run
 */

import { Router } from 'express';
import { z } from 'zod';
import { WorkflowError, validationError } from '../domain/errors';
import { RunState, toRunSummary } from '../domain/run';
import { Orchestrator } from '../engine/orchestrator';
import { errorContext, logger } from '../logger';
import { intQuery, sendError } from './middleware';

const RUN_STATES: ReadonlySet<string> = new Set(Object.values(RunState));

function parseState(value: unknown): RunState | undefined {
  if (value === undefined) return undefined;
  const state = Object.values(RunState).find((candidate) => candidate === value);
  if (!state) {
    throw new WorkflowError(validationError(`Unknown run state: ${String(value)}`, {
      state: value,
      allowed: [...RUN_STATES],
    }));
  }
  return state;
}

const CancelBodySchema = z.object({ reason: z.string().max(500).optional() });

export function createRunRoutes(orchestrator: Orchestrator): Router {
  const router = Router();
  const log = logger.child({ component: 'api' });

  router.post('/runs', async (req, res) => {
    try {
      const run = await orchestrator.createRun(req.body);

      // Failures land in the run state; the log keeps anything that escapes it.
      orchestrator.advance(run.id).catch((err: unknown) => {
        log.error('Background run progression failed', { runId: run.id, ...errorContext(err) });
      });

      res.status(202).json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs', async (req, res) => {
    try {
      const state = parseState(req.query.state);
      const limit = intQuery(req.query.limit, 'limit', 100, 1000);
      const offset = intQuery(req.query.offset, 'offset', 0);
      const runs = await orchestrator.listRuns({ state, limit, offset });
      res.json({ runs: runs.map(toRunSummary), limit, offset });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId', async (req, res) => {
    try {
      const run = await orchestrator.getRun(req.params.runId);
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/checkpoints', async (req, res) => {
    try {
      const checkpoints = await orchestrator.getHistory(req.params.runId);
      res.json({ checkpoints, total: checkpoints.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/events', async (req, res) => {
    try {
      await orchestrator.getRun(req.params.runId);
      const limit = intQuery(req.query.limit, 'limit', 1000, 10_000);
      const offset = intQuery(req.query.offset, 'offset', 0);
      const events = await orchestrator.events.getEventsByRun(req.params.runId, { limit, offset });
      res.json({ events, total: events.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/artifacts', async (req, res) => {
    try {
      const artifacts = await orchestrator.listArtifacts(req.params.runId);
      res.json({ artifacts, total: artifacts.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/artifacts/:type', async (req, res) => {
    try {
      const artifact = await orchestrator.getArtifact(req.params.runId, req.params.type);
      res.json({ artifact });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/runs/:runId/cancel', async (req, res) => {
    try {
      const body = CancelBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw new WorkflowError(validationError('Invalid cancel request', {
          issues: body.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        }));
      }
      const run = await orchestrator.cancel(req.params.runId, body.data.reason);
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
