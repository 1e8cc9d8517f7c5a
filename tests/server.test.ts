import { loadConfig } from '../src/config';
import { createAppContext } from '../src/server';
import { createHarness } from './helpers/harness';
import { captureLogs, resetLogHandler } from './helpers/fakes';

const ENV = {
  CANDIDATE_SOURCE_URL: 'https://candidates.test',
  LLM_BASE_URL: 'https://llm.test',
  EDITOR_URL: 'https://editor.test',
};

describe('createAppContext', () => {
  beforeEach(() => {
    captureLogs();
  });

  afterEach(() => {
    resetLogHandler();
  });

  it('keeps runs in memory without a database path', async () => {
    const ctx = createAppContext({ config: loadConfig(ENV), collaborators: createHarness().fakes });
    expect(ctx.store.kind).toBe('memory');
    await ctx.store.close();
  });

  it('opens the SQLite store when a database path is configured', async () => {
    const { fakes } = createHarness();
    const ctx = createAppContext({ config: loadConfig({ ...ENV, DATABASE_PATH: ':memory:' }), collaborators: fakes });
    try {
      expect(ctx.store.kind).toBe('sqlite');
      const created = await ctx.orchestrator.createRun({ documentRef: 'resume.md', targetSpec: { text: 'Needs Go.' } });
      expect((await ctx.store.runs.getLatest(created.id))?.state).toBe('created');
    } finally {
      await ctx.store.close();
    }
  });
});
