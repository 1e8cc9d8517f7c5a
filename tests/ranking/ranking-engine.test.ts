import {
  clampBoost,
  compareCodeUnits,
  durationFit,
  keywordBonus,
  rank,
  recencyDecay,
  shrunkRatio,
  velocity,
  wilsonLowerBound,
} from '../../src/ranking/ranking-engine';
import { DEFAULT_RANKING_CONFIG } from '../../src/ranking/defaults';
import { makeCandidate } from '../helpers/fakes';

const NOW = '2026-03-01T00:00:00.000Z';

describe('scoring terms', () => {
  test('wilsonLowerBound', () => {
    expect(wilsonLowerBound(0, 0)).toBe(0);
    expect(wilsonLowerBound(50, 1000)).toBeCloseTo(0.03813, 5);
    expect(wilsonLowerBound(10, 10)).toBeCloseTo(0.72246, 5);
    expect(wilsonLowerBound(1, 2)).toBeCloseTo(0.09453, 5);
  });

  test('shrunkRatio falls back to the prior without data', () => {
    expect(shrunkRatio(0, 0, 0.3, 100)).toBeCloseTo(0.3, 10);
    expect(shrunkRatio(100, 100, 0, 100)).toBeCloseTo(0.5, 10);
  });

  test('velocity saturates with signals per day', () => {
    expect(velocity(50, 0, 1, 50)).toBeCloseTo(0.63212, 5);
    expect(velocity(0, 0, 10, 50)).toBe(0);
  });

  test('recencyDecay keeps young items whole and floors old ones', () => {
    const threshold = DEFAULT_RANKING_CONFIG.recencyThresholdDays;
    expect(recencyDecay(10, DEFAULT_RANKING_CONFIG)).toBe(1);
    expect(recencyDecay(threshold + 1460, DEFAULT_RANKING_CONFIG)).toBeCloseTo(0.5, 10);
    expect(recencyDecay(threshold + 365 * 20, DEFAULT_RANKING_CONFIG)).toBe(0.25);
  });

  test('durationFit peaks at the ideal length', () => {
    expect(durationFit(90 * 60, DEFAULT_RANKING_CONFIG)).toBeCloseTo(1.1, 10);
    expect(durationFit(6 * 60 * 60, DEFAULT_RANKING_CONFIG)).toBeCloseTo(0.95, 10);
  });

  test('clampBoost bounds boosts and ignores non-finite values', () => {
    expect(clampBoost(5)).toBe(2);
    expect(clampBoost(0.1)).toBe(0.5);
    expect(clampBoost(1.3)).toBe(1.3);
    expect(clampBoost(Number.NaN)).toBe(1);
  });

  test('keywordBonus counts words, phrases and the topic', () => {
    const candidate = makeCandidate('a', { title: 'Hands-on Kubernetes full course' });
    // words: hands-on, course; phrase: full course; topic: kubernetes
    expect(keywordBonus(candidate, 'Kubernetes', DEFAULT_RANKING_CONFIG)).toBeCloseTo(0.14, 10);
  });

  test('keywordBonus penalizes comparisons', () => {
    const candidate = makeCandidate('a', { title: 'Terraform vs Pulumi' });
    expect(keywordBonus(candidate, undefined, DEFAULT_RANKING_CONFIG)).toBeCloseTo(-0.02, 10);
  });
});

describe('rank', () => {
  test('identical inputs give identical output', () => {
    const candidates = [
      makeCandidate('a', { positiveSignals: 20 }),
      makeCandidate('b', { positiveSignals: 90, comments: 40 }),
      makeCandidate('c', { views: 50, positiveSignals: 49 }),
    ];
    expect(rank(candidates, {}, { now: NOW })).toEqual(rank(candidates, {}, { now: NOW }));
  });

  test('orders by score and numbers ranks from one', () => {
    const ranked = rank(
      [makeCandidate('weak', { positiveSignals: 50 }), makeCandidate('strong', { positiveSignals: 200 })],
      {},
      { now: NOW },
    );
    expect(ranked.map((c) => [c.id, c.rank])).toEqual([['strong', 1], ['weak', 2]]);
    expect(ranked[0].score).toBeGreaterThan(ranked[1].score);
  });

  test('breaks score ties by id', () => {
    const ranked = rank([makeCandidate('b'), makeCandidate('a')], {}, { now: NOW });
    expect(ranked.map((c) => c.id)).toEqual(['a', 'b']);
    expect(ranked[0].score).toBe(ranked[1].score);
  });

  test('orders ids by code unit, not locale', () => {
    expect(['b', 'B', 'a', '_', 'a'].sort(compareCodeUnits)).toEqual(['B', '_', 'a', 'a', 'b']);
  });

  test('drops short and unknown-length candidates', () => {
    const ranked = rank(
      [
        makeCandidate('short', { durationSeconds: 600 }),
        makeCandidate('unknown', { durationSeconds: undefined }),
        makeCandidate('long'),
      ],
      {},
      { now: NOW },
    );
    expect(ranked.map((c) => c.id)).toEqual(['long']);
  });

  test('applies clamped source boosts by normalized name', () => {
    const [boosted] = rank(
      [makeCandidate('a', { sourceName: '  Good   Channel ' })],
      { sourceBoosts: { 'good channel': 10 } },
      { now: NOW },
    );
    expect(boosted.signals.preferenceBoost).toBe(2);
  });

  test('a supplied prior ratio overrides the pooled one', () => {
    const [candidate] = rank([makeCandidate('a', { views: 0, positiveSignals: 0 })], { priorRatio: 0.4 }, { now: NOW });
    expect(candidate.signals.shrunkRatio).toBeCloseTo(0.4, 10);
  });

  test('limits the output to the top entries', () => {
    const ranked = rank([makeCandidate('a'), makeCandidate('b'), makeCandidate('c')], {}, { now: NOW, limit: 2 });
    expect(ranked.map((c) => c.id)).toEqual(['a', 'b']);
  });

  test('rejects an invalid reference time', () => {
    expect(() => rank([makeCandidate('a')], {}, { now: 'not a date' })).toThrow(RangeError);
  });
});
