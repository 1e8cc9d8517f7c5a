/**
 * Default ranking configuration.
 */

export interface KeywordTerms {
  /** Single-word markers of practical content. */
  words: string[];
  /** Multi-word markers, scored separately from words. */
  phrases: string[];
  /** Markers of comparison content, which is penalized. */
  comparisonPattern: RegExp;
}

export interface RankingWeights {
  confidence: number;
  shrinkage: number;
  velocity: number;
}

export interface RankingConfig {
  weights: RankingWeights;
  /** z for the Wilson lower bound (1.96 ≈ 95%). */
  z: number;
  /** Pseudo-count pulling sparse candidates toward the prior. */
  shrinkageWeight: number;
  /** Signals per day at which velocity reaches ~63%. */
  velocityScale: number;
  recencyThresholdDays: number;
  recencyHalfLifeDays: number;
  recencyFloor: number;
  minDurationSeconds: number;
  idealDurationSeconds: number;
  durationSpanSeconds: number;
  boostMin: number;
  boostMax: number;
  keywords: KeywordTerms;
  wordBonus: number;
  wordBonusCap: number;
  phraseBonus: number;
  phraseBonusCap: number;
  topicBonus: number;
  comparisonPenalty: number;
}

export const DEFAULT_KEYWORDS: KeywordTerms = {
  words: ['tutorial', 'course', 'project', 'hands-on', 'beginner'],
  phrases: ['full course', 'end to end', 'from scratch', 'hands on', 'for beginners'],
  comparisonPattern: /\bvs\b|versus|compare/,
};

export const DEFAULT_RANKING_CONFIG: RankingConfig = {
  weights: { confidence: 0.5, shrinkage: 0.3, velocity: 0.2 },
  z: 1.96,
  shrinkageWeight: 100,
  velocityScale: 50,
  recencyThresholdDays: 365 * 3,
  recencyHalfLifeDays: 365 * 4,
  recencyFloor: 0.25,
  minDurationSeconds: 15 * 60,
  idealDurationSeconds: 90 * 60,
  durationSpanSeconds: 70 * 60,
  boostMin: 0.5,
  boostMax: 2.0,
  keywords: DEFAULT_KEYWORDS,
  wordBonus: 0.02,
  wordBonusCap: 0.12,
  phraseBonus: 0.05,
  phraseBonusCap: 0.1,
  topicBonus: 0.05,
  comparisonPenalty: 0.02,
};

/** Trusted sources used when a run supplies no boosts of its own. */
export const DEFAULT_SOURCE_BOOSTS: Record<string, number> = {
  'freeCodeCamp.org': 1.1,
  'Tech With Tim': 1.1,
  TechWithTim: 1.1,
  'IBM Technology': 1.1,
};
