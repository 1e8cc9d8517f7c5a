import { QuotaLedger, periodKeyFor } from '../../src/quota/quota-ledger';
import { createMemoryStore } from '../../src/storage/memory-store';
import { createSqliteStore } from '../../src/storage/sqlite-store';
import { Store } from '../../src/storage/store';
import { ManualClock, captureLogs, rejectionCode, resetLogHandler } from '../helpers/fakes';

function createLedger(clock = new ManualClock(new Date('2026-03-01T12:00:00.000Z'))) {
  const ledger = new QuotaLedger(createMemoryStore().quota, {
    config: {
      budgets: { candidates: 100 },
      unitCosts: {
        search: { resource: 'candidates', units: 80 },
        details: { resource: 'candidates', units: 1 },
      },
    },
    now: clock.now,
  });
  return { ledger, clock };
}

beforeEach(() => {
  captureLogs();
});

afterEach(() => {
  resetLogHandler();
});

describe('periodKeyFor', () => {
  test('daily buckets use the UTC date', () => {
    expect(periodKeyFor(new Date('2026-03-01T23:59:59.999Z'), 'day')).toBe('2026-03-01');
  });

  test('hourly buckets include the UTC hour', () => {
    expect(periodKeyFor(new Date('2026-03-01T12:34:56.000Z'), 'hour')).toBe('2026-03-01T12');
  });
});

describe('QuotaLedger.tryConsume', () => {
  test('concurrent requests never overshoot the ceiling', async () => {
    const { ledger } = createLedger();
    const results = await Promise.all(
      Array.from({ length: 10 }, () => ledger.tryConsume('candidates', 30)),
    );

    expect(results.filter(Boolean)).toHaveLength(3);
    const [entry] = await ledger.usage('candidates');
    expect(entry.consumed).toBe(90);
  });

  test('a denial leaves consumption unchanged', async () => {
    const { ledger } = createLedger();
    expect(await ledger.tryConsume('candidates', 60)).toBe(true);
    expect(await ledger.tryConsume('candidates', 41)).toBe(false);
    expect(await ledger.remaining('candidates')).toBe(40);
  });

  test('zero units always succeed without an entry', async () => {
    const { ledger } = createLedger();
    expect(await ledger.tryConsume('candidates', 0)).toBe(true);
    expect(await ledger.usage()).toEqual([{
      resource: 'candidates',
      periodKey: '2026-03-01',
      consumed: 0,
      ceiling: 100,
      updatedAt: '2026-03-01T12:00:00.000Z',
    }]);
  });

  test('unknown resources and invalid units are rejected', async () => {
    const { ledger } = createLedger();
    expect(await rejectionCode(ledger.tryConsume('llm', 1))).toBe('QUOTA.UNKNOWN_RESOURCE');
    expect(await rejectionCode(ledger.tryConsume('candidates', -1))).toBe('VALIDATION.QUOTA_UNITS');
    expect(await rejectionCode(ledger.tryConsume('candidates', 1.5))).toBe('VALIDATION.QUOTA_UNITS');
  });

  test('a new period starts from zero', async () => {
    const { ledger, clock } = createLedger();
    expect(await ledger.tryConsume('candidates', 100)).toBe(true);
    expect(await ledger.tryConsume('candidates', 1)).toBe(false);

    clock.advance(24 * 60 * 60 * 1000);
    expect(ledger.currentPeriodKey()).toBe('2026-03-02');
    expect(await ledger.tryConsume('candidates', 100)).toBe(true);
  });
});

describe('QuotaLedger.charge', () => {
  test('one of two 80-unit searches fits a budget of 100', async () => {
    const { ledger } = createLedger();
    const first = await ledger.charge('search');
    const second = await ledger.charge('search');

    expect(first).toEqual({ granted: true, resource: 'candidates', units: 80, remaining: 20 });
    expect(second).toEqual({ granted: false, resource: 'candidates', units: 80, remaining: 20 });
  });

  test('cheap operations still fit after an expensive one', async () => {
    const { ledger } = createLedger();
    await ledger.charge('search');
    expect(await ledger.charge('details')).toEqual({ granted: true, resource: 'candidates', units: 1, remaining: 19 });
  });

  test('unknown operations are rejected', async () => {
    const { ledger } = createLedger();
    expect(await rejectionCode(ledger.charge('transcode'))).toBe('QUOTA.UNKNOWN_OPERATION');
  });

  test.each([
    ['memory', () => createMemoryStore()],
    ['sqlite', () => createSqliteStore(':memory:')],
  ])('grants exactly one of two simultaneous 80-unit searches on the %s store', async (_kind, open: () => Store) => {
    const store = open();
    const clock = new ManualClock(new Date('2026-03-01T12:00:00.000Z'));
    const ledger = new QuotaLedger(store.quota, {
      config: {
        budgets: { candidates: 100 },
        unitCosts: { search: { resource: 'candidates', units: 80 } },
      },
      now: clock.now,
    });

    const results = await Promise.all([ledger.charge('search'), ledger.charge('search')]);

    expect(results.map((result) => result.granted).sort()).toEqual([false, true]);
    expect(results.map((result) => result.remaining)).toEqual([20, 20]);
    expect((await store.quota.get('candidates', '2026-03-01'))?.consumed).toBe(80);
    await store.close();
  });
});

describe('QuotaLedger.usage', () => {
  test('lists budgeted resources only, with zero for untouched ones', async () => {
    const store = createMemoryStore();
    const ledger = new QuotaLedger(store.quota, {
      config: { budgets: { llm: 50, candidates: 100 }, unitCosts: {} },
      now: () => new Date('2026-03-01T12:00:00.000Z'),
    });
    await store.quota.tryIncrement('retired', '2026-03-01', 5, 10, '2026-03-01T11:00:00.000Z');
    await ledger.tryConsume('llm', 7);

    expect(await ledger.usage()).toEqual([
      { resource: 'candidates', periodKey: '2026-03-01', consumed: 0, ceiling: 100, updatedAt: '2026-03-01T12:00:00.000Z' },
      { resource: 'llm', periodKey: '2026-03-01', consumed: 7, ceiling: 50, updatedAt: '2026-03-01T12:00:00.000Z' },
    ]);
    expect(await ledger.usage('llm')).toEqual([
      { resource: 'llm', periodKey: '2026-03-01', consumed: 7, ceiling: 50, updatedAt: '2026-03-01T12:00:00.000Z' },
    ]);
  });
});
