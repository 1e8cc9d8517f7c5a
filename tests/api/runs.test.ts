import { Server } from 'http';
import { z } from 'zod';
import { createApprovalToken } from '../../src/api/approval-token';
import { loadConfig } from '../../src/config';
import { createApp, createAppContext, AppContext } from '../../src/server';
import { PROJECT_PLAN, createHarness } from '../helpers/harness';
import { captureLogs, noSleep, resetLogHandler, ManualClock } from '../helpers/fakes';

interface ApiResponse {
  status: number;
  body: unknown;
}

const RunEnvelope = z.object({
  run: z.object({ id: z.string(), state: z.string() }).passthrough(),
});

const SECRET = 'test-secret';

describe('Run API', () => {
  let ctx: AppContext;
  let server: Server;
  let baseUrl: string;

  async function request(method: string, path: string, body?: unknown, rawBody?: string): Promise<ApiResponse> {
    const init: RequestInit = { method, headers: { 'Content-Type': 'application/json' } };
    if (rawBody !== undefined) init.body = rawBody;
    else if (body !== undefined) init.body = JSON.stringify(body);
    const res = await fetch(`${baseUrl}${path}`, init);
    return { status: res.status, body: await res.json() };
  }

  async function waitForState(runId: string, state: string): Promise<void> {
    for (let i = 0; i < 500; i++) {
      const run = await ctx.orchestrator.getRun(runId);
      if (run.state === state) return;
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    throw new Error(`Run ${runId} never reached ${state}`);
  }

  async function startRun(): Promise<string> {
    const res = await request('POST', '/api/runs', {
      documentRef: 'resume.md',
      targetSpec: { text: 'Needs Kubernetes.' },
    });
    const { run } = RunEnvelope.parse(res.body);
    await waitForState(run.id, 'awaiting_approval');
    return run.id;
  }

  beforeEach(async () => {
    captureLogs();
    const clock = new ManualClock(new Date('2026-03-01T12:00:00.000Z'));
    // Reuse the harness fakes as the app's collaborators.
    const { fakes } = createHarness({ clock });
    const config = loadConfig({
      REVIEW_SECRET: SECRET,
      REVIEW_BASE_URL: 'https://review.test/api',
      CANDIDATE_SOURCE_URL: 'https://candidates.test',
      LLM_BASE_URL: 'https://llm.test',
      EDITOR_URL: 'https://editor.test',
    });
    ctx = createAppContext({ config, collaborators: fakes, now: clock.now, sleep: noSleep });

    server = await new Promise<Server>((resolve) => {
      const listening = createApp(ctx).listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    resetLogHandler();
  });

  it('GET /health reports status', async () => {
    const res = await request('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0', storage: 'memory', activeFanOuts: 0 });
  });

  describe('POST /api/runs', () => {
    it('accepts a run and progresses it to awaiting approval in the background', async () => {
      const res = await request('POST', '/api/runs', {
        documentRef: 'resume.md',
        targetSpec: { text: 'Needs Kubernetes.' },
      });

      expect(res.status).toBe(202);
      const { run } = RunEnvelope.parse(res.body);
      expect(run.id).toMatch(/^run_/);
      expect(run.state).toBe('created');

      await waitForState(run.id, 'awaiting_approval');
      const fetched = await request('GET', `/api/runs/${run.id}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body).toMatchObject({
        run: { id: run.id, state: 'awaiting_approval', context: { documentRef: 'resume.md' } },
      });
    });

    it('rejects invalid input with 400', async () => {
      const res = await request('POST', '/api/runs', { targetSpec: { text: 'x' } });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA', message: 'Invalid run input' } });
    });

    it('rejects a malformed JSON body with 400', async () => {
      const res = await request('POST', '/api/runs', undefined, '{"documentRef":');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA' } });
    });
  });

  describe('GET /api/runs', () => {
    it('returns 404 for an unknown run', async () => {
      const res = await request('GET', '/api/runs/run_missing');
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { code: 'RUN.NOT_FOUND' } });
    });

    it('lists summaries filtered by state', async () => {
      const runId = await startRun();

      const res = await request('GET', '/api/runs?state=awaiting_approval');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        runs: [expect.objectContaining({ id: runId, state: 'awaiting_approval', documentRef: 'resume.md' })],
        limit: 100,
        offset: 0,
      });
    });

    it('rejects an unknown state filter', async () => {
      const res = await request('GET', '/api/runs?state=sleeping');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { message: 'Unknown run state: sleeping' } });
    });

    it('returns checkpoint history oldest first', async () => {
      const runId = await startRun();

      const res = await request('GET', `/api/runs/${runId}/checkpoints`);
      const body = z.object({
        checkpoints: z.array(z.object({ seq: z.number(), run: z.object({ state: z.string() }) })),
        total: z.number(),
      }).parse(res.body);

      expect(body.checkpoints[0].run.state).toBe('created');
      expect(body.checkpoints[body.total - 1].run.state).toBe('awaiting_approval');
      const seqs = body.checkpoints.map((checkpoint) => checkpoint.seq);
      expect(seqs).toEqual([...seqs].sort((a, b) => a - b));
    });
  });

  describe('artifacts', () => {
    it('lists saved versions and returns the latest of a type', async () => {
      const runId = await startRun();
      for (let i = 0; i < 500 && (await ctx.orchestrator.listArtifacts(runId)).length < 2; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }

      const list = await request('GET', `/api/runs/${runId}/artifacts`);
      expect(list.status).toBe(200);
      expect(list.body).toMatchObject({
        total: 2,
        artifacts: [{ type: 'project_plans', version: 1 }, { type: 'research', version: 1 }],
      });

      const plans = await request('GET', `/api/runs/${runId}/artifacts/project_plans`);
      expect(plans.status).toBe(200);
      expect(plans.body).toEqual({
        artifact: {
          runId,
          type: 'project_plans',
          version: 1,
          content: [PROJECT_PLAN],
          createdAt: '2026-03-01T12:00:00.000Z',
        },
      });
    });

    it('returns 404 for a type the run never saved', async () => {
      const runId = await startRun();
      const res = await request('GET', `/api/runs/${runId}/artifacts/cover_letter`);
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { code: 'ARTIFACT.NOT_FOUND' } });
    });
  });

  describe('review', () => {
    it('shows the review payload for a valid token', async () => {
      const runId = await startRun();
      const token = createApprovalToken(runId, SECRET);

      const res = await request('GET', `/api/review?runId=${runId}&token=${token}`);
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        runId,
        state: 'awaiting_approval',
        documentRef: 'resume.md',
        score: { overall: 62 },
        insertions: [{ section: 'Experience', content: 'Operated Kubernetes clusters.' }],
        approval: { requestRef: 'msg-1' },
      });
    });

    it('refuses a bad token with 403', async () => {
      const runId = await startRun();

      const res = await request('GET', `/api/review?runId=${runId}&token=not-the-token`);
      expect(res.status).toBe(403);
      expect(res.body).toMatchObject({ error: { code: 'AUTH.FORBIDDEN', message: 'Invalid approval token' } });
    });

    it('completes the run on approval', async () => {
      const runId = await startRun();

      const res = await request('POST', '/api/review/decision', {
        runId,
        token: createApprovalToken(runId, SECRET),
        decision: 'approved',
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        run: {
          id: runId,
          state: 'completed',
          context: { approval: { decision: 'approved' }, finalScore: { overall: 81 } },
        },
      });
    });

    it('answers a decision on a finished run with 409', async () => {
      const runId = await startRun();
      const token = createApprovalToken(runId, SECRET);
      await request('POST', '/api/review/decision', { runId, token, decision: 'rejected' });

      const res = await request('POST', '/api/review/decision', { runId, token, decision: 'approved' });
      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ error: { code: 'RUN.NOT_AWAITING_APPROVAL' } });
    });

    it('refuses a decision with a bad token', async () => {
      const runId = await startRun();

      const res = await request('POST', '/api/review/decision', { runId, token: 'forged', decision: 'approved' });
      expect(res.status).toBe(403);
      expect((await ctx.orchestrator.getRun(runId)).state).toBe('awaiting_approval');
    });
  });

  describe('POST /api/runs/:runId/cancel', () => {
    it('fails a waiting run as cancelled', async () => {
      const runId = await startRun();

      const res = await request('POST', `/api/runs/${runId}/cancel`, { reason: 'withdrawn' });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        run: { id: runId, state: 'failed', failureReason: 'cancelled', error: { code: 'RUN.CANCELLED' } },
      });
    });

    it('returns 404 for an unknown run', async () => {
      const res = await request('POST', '/api/runs/run_missing/cancel', {});
      expect(res.status).toBe(404);
    });
  });

  describe('maintenance', () => {
    it('reports quota usage for the current period', async () => {
      const res = await request('GET', '/api/quota');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        periodKey: '2026-03-01',
        entries: [{
          resource: 'candidates',
          periodKey: '2026-03-01',
          consumed: 0,
          ceiling: 10_000,
          updatedAt: '2026-03-01T12:00:00.000Z',
        }],
      });
    });

    it('rejects a negative expiry window', async () => {
      const res = await request('POST', '/api/maintenance/expire-approvals', { olderThanMs: -1 });
      expect(res.status).toBe(400);
    });
  });
});
