/**
 * Ranking Engine: deterministic scoring of candidates for one gap.
 *
 * `rank` is pure: the reference time comes from `options.now`, never the
 * clock, so identical inputs always produce identical ordered output.
 */

import { Candidate, RankedCandidate, ScoreSignals } from '../domain/candidate';
import { RunPreferences } from '../domain/run';
import { DEFAULT_RANKING_CONFIG, DEFAULT_SOURCE_BOOSTS, RankingConfig } from './defaults';

const MS_PER_DAY = 86_400_000;

export interface RankOptions {
  /** Reference time for age-based terms. */
  now: Date | string | number;
  /** Gap topic; candidates mentioning it get a bonus. */
  topic?: string;
  limit?: number;
  config?: Partial<RankingConfig>;
}

/** Engagement counts after cleaning, with `n` the sample size. */
interface Engagement {
  positive: number;
  n: number;
}

function count(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

function engagement(candidate: Candidate): Engagement {
  const positive = count(candidate.positiveSignals);
  if (candidate.negativeSignals !== undefined) {
    return { positive, n: positive + count(candidate.negativeSignals) };
  }
  const n = Math.max(count(candidate.views), positive);
  return { positive, n };
}

/** Lower bound of the Wilson score interval for `positive / n`. */
export function wilsonLowerBound(positive: number, n: number, z = DEFAULT_RANKING_CONFIG.z): number {
  if (n <= 0) return 0;
  const p = Math.min(positive, n) / n;
  const z2 = z * z;
  const centre = p + z2 / (2 * n);
  const margin = z * Math.sqrt((p * (1 - p)) / n + z2 / (4 * n * n));
  return Math.max(0, (centre - margin) / (1 + z2 / n));
}

/** Blend a candidate's ratio toward `prior` with pseudo-count `k`. */
export function shrunkRatio(positive: number, n: number, prior: number, k: number): number {
  if (n + k <= 0) return prior;
  return (Math.min(positive, n) + k * prior) / (n + k);
}

export function velocity(positive: number, comments: number, ageDays: number, scale: number): number {
  const perDay = (positive + comments) / Math.max(1, ageDays);
  return 1 - Math.exp(-perDay / scale);
}

export function recencyDecay(ageDays: number, config: RankingConfig): number {
  const over = Math.floor(ageDays) - config.recencyThresholdDays;
  if (over <= 0) return 1;
  return Math.max(config.recencyFloor, Math.exp((-Math.LN2 * over) / config.recencyHalfLifeDays));
}

export function durationFit(seconds: number, config: RankingConfig): number {
  const deviation = Math.abs(seconds - config.idealDurationSeconds);
  const x = Math.max(0, 1 - deviation / config.durationSpanSeconds);
  return 0.95 + 0.15 * x;
}

/** Clamp a boost into [min, max]; non-finite values count as no boost. */
export function clampBoost(value: number, min = DEFAULT_RANKING_CONFIG.boostMin, max = DEFAULT_RANKING_CONFIG.boostMax): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(max, Math.max(min, value));
}

function normalizeSourceName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Lower-cased source name → clamped boost. */
export function buildBoostMap(boosts: Record<string, number>, config: RankingConfig): Map<string, number> {
  const map = new Map<string, number>();
  for (const [name, value] of Object.entries(boosts)) {
    const key = normalizeSourceName(name);
    if (!key || !Number.isFinite(value)) continue;
    map.set(key, clampBoost(value, config.boostMin, config.boostMax));
  }
  return map;
}

export function keywordBonus(candidate: Candidate, topic: string | undefined, config: RankingConfig): number {
  const text = `${candidate.title} ${candidate.description ?? ''}`.toLowerCase();
  const { words, phrases, comparisonPattern } = config.keywords;
  const wordHits = words.filter((word) => text.includes(word.toLowerCase())).length;
  const phraseHits = phrases.filter((phrase) => text.includes(phrase.toLowerCase())).length;

  let bonus = Math.min(config.wordBonusCap, wordHits * config.wordBonus);
  bonus += Math.min(config.phraseBonusCap, phraseHits * config.phraseBonus);
  const normalizedTopic = topic?.trim().toLowerCase();
  if (normalizedTopic && text.includes(normalizedTopic)) bonus += config.topicBonus;
  if (comparisonPattern.test(text)) bonus -= config.comparisonPenalty;
  return bonus;
}

function toEpochMs(value: Date | string | number): number {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number') return value;
  return Date.parse(value);
}

function ageInDays(publishedAt: string | undefined, nowMs: number): number | undefined {
  if (!publishedAt) return undefined;
  const published = Date.parse(publishedAt);
  if (Number.isNaN(published)) return undefined;
  return Math.max(0, (nowMs - published) / MS_PER_DAY);
}

/** Plain UTF-16 code-unit order, independent of locale. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score, filter and order candidates. Candidates shorter than
 * `minDurationSeconds` (missing duration counts as zero) are excluded.
 * Ties on score break by id, then by input position.
 */
export function rank(
  candidates: Candidate[],
  preferences: RunPreferences,
  options: RankOptions,
): RankedCandidate[] {
  const config: RankingConfig = { ...DEFAULT_RANKING_CONFIG, ...options.config };
  const nowMs = toEpochMs(options.now);
  if (Number.isNaN(nowMs)) {
    throw new RangeError(`Invalid ranking reference time: ${String(options.now)}`);
  }

  const eligible = candidates
    .map((candidate, index) => ({ candidate, index }))
    .filter(({ candidate }) => count(candidate.durationSeconds) >= config.minDurationSeconds);

  const samples = eligible.map(({ candidate }) => engagement(candidate));
  const pooled = samples.reduce(
    (acc, s) => ({ positive: acc.positive + Math.min(s.positive, s.n), n: acc.n + s.n }),
    { positive: 0, n: 0 },
  );
  const prior = preferences.priorRatio !== undefined && Number.isFinite(preferences.priorRatio)
    ? Math.min(1, Math.max(0, preferences.priorRatio))
    : pooled.n > 0 ? pooled.positive / pooled.n : 0;

  const boosts = buildBoostMap(preferences.sourceBoosts ?? DEFAULT_SOURCE_BOOSTS, config);

  const scored = eligible.map(({ candidate, index }, i) => {
    const { positive, n } = samples[i];
    const age = ageInDays(candidate.publishedAt, nowMs);
    const signals: ScoreSignals = {
      wilsonLowerBound: wilsonLowerBound(positive, n, config.z),
      shrunkRatio: shrunkRatio(positive, n, prior, config.shrinkageWeight),
      velocity: age === undefined ? 0 : velocity(positive, count(candidate.comments), age, config.velocityScale),
      recency: age === undefined ? 1 : recencyDecay(age, config),
      durationFit: durationFit(count(candidate.durationSeconds), config),
      preferenceBoost: candidate.sourceName
        ? boosts.get(normalizeSourceName(candidate.sourceName)) ?? 1
        : 1,
      keywordBonus: keywordBonus(candidate, options.topic, config),
    };
    const additive = Math.max(
      0,
      config.weights.confidence * signals.wilsonLowerBound +
        config.weights.shrinkage * signals.shrunkRatio +
        config.weights.velocity * signals.velocity +
        signals.keywordBonus,
    );
    const score = additive * signals.recency * signals.durationFit * signals.preferenceBoost;
    return { candidate, index, score, signals };
  });

  scored.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    const byId = compareCodeUnits(a.candidate.id, b.candidate.id);
    if (byId !== 0) return byId;
    return a.index - b.index;
  });

  const limited = options.limit !== undefined ? scored.slice(0, Math.max(0, options.limit)) : scored;
  return limited.map(({ candidate, score, signals }, i) => ({
    ...candidate,
    score,
    rank: i + 1,
    signals,
  }));
}
