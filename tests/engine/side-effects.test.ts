import { z } from 'zod';
import { SideEffectGuard } from '../../src/engine/side-effects';
import { createMemoryStore } from '../../src/storage/memory-store';
import { captureLogs, deferred, rejectionCode, resetLogHandler } from '../helpers/fakes';

const Applied = z.object({ applied: z.number() });

function createGuard() {
  const store = createMemoryStore();
  const guard = new SideEffectGuard(store.sideEffects, { now: () => new Date('2026-03-01T00:00:00.000Z') });
  return { store, guard };
}

beforeEach(() => {
  captureLogs();
});

afterEach(() => {
  resetLogHandler();
});

describe('SideEffectGuard', () => {
  test('performs an effect once and replays its result', async () => {
    const { store, guard } = createGuard();
    const keys: string[] = [];
    const perform = async (key: string) => {
      keys.push(key);
      return { applied: 2 };
    };

    const first = await guard.once('run_1', 'finalizing', 'apply_edits', Applied, perform);
    const second = await guard.once('run_1', 'finalizing', 'apply_edits', Applied, perform);

    expect(first).toEqual({ result: { applied: 2 }, replayed: false });
    expect(second).toEqual({ result: { applied: 2 }, replayed: true });
    expect(keys).toEqual(['run_1:finalizing:apply_edits']);
    expect(await store.sideEffects.get('run_1:finalizing:apply_edits')).toEqual({
      key: 'run_1:finalizing:apply_edits',
      runId: 'run_1',
      result: { applied: 2 },
      performedAt: '2026-03-01T00:00:00.000Z',
    });
  });

  test('concurrent callers share one attempt', async () => {
    const { guard } = createGuard();
    const gate = deferred();
    let calls = 0;
    const perform = async () => {
      calls++;
      await gate.promise;
      return { applied: 1 };
    };

    const first = guard.once('run_1', 'finalizing', 'apply_edits', Applied, perform);
    const second = guard.once('run_1', 'finalizing', 'apply_edits', Applied, perform);
    gate.resolve();

    const results = await Promise.all([first, second]);
    expect(calls).toBe(1);
    expect(results.map((r) => r.result)).toEqual([{ applied: 1 }, { applied: 1 }]);
  });

  test('a failed attempt records nothing', async () => {
    const { store, guard } = createGuard();
    await expect(guard.once('run_1', 'finalizing', 'apply_edits', Applied, async () => {
      throw new Error('editor down');
    })).rejects.toThrow('editor down');

    expect(await store.sideEffects.get('run_1:finalizing:apply_edits')).toBeNull();
  });

  test('a record of the wrong shape is reported', async () => {
    const { store, guard } = createGuard();
    await store.sideEffects.record({
      key: 'run_1:finalizing:apply_edits',
      runId: 'run_1',
      result: { applied: 'yes' },
      performedAt: '2026-03-01T00:00:00.000Z',
    });

    const code = await rejectionCode(guard.once('run_1', 'finalizing', 'apply_edits', Applied, async () => ({ applied: 1 })));
    expect(code).toBe('SYSTEM.SIDE_EFFECT_RECORD_INVALID');
  });
});
