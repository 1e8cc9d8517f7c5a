/**
 * Candidate domain model: items found for a gap and scored by the
 * ranking engine.
 */

import { z } from 'zod';

/** Raw signal fields of one candidate item. */
export interface Candidate {
  id: string;
  title: string;
  description?: string;
  /** Source attribution (channel, publisher, author). */
  sourceName?: string;
  url?: string;
  durationSeconds?: number;
  /** ISO-8601 publication time. */
  publishedAt?: string;
  views?: number;
  positiveSignals?: number;
  negativeSignals?: number;
  comments?: number;
}

/** Summary attached to a candidate by the enrichment stage. */
export interface CandidateEnrichment {
  summary: string;
  keyPoints: string[];
  difficultyLevel?: string;
  prerequisites: string[];
}

/** Per-term breakdown of a candidate's composite score. */
export interface ScoreSignals {
  wilsonLowerBound: number;
  shrunkRatio: number;
  velocity: number;
  recency: number;
  durationFit: number;
  preferenceBoost: number;
  keywordBonus: number;
}

export interface RankedCandidate extends Candidate {
  score: number;
  /** 1-based position in the ranked list. */
  rank: number;
  signals: ScoreSignals;
  enrichment?: CandidateEnrichment;
  enrichmentError?: string;
  personalizationTip?: string;
}

const nonNegative = z.number().finite().nonnegative();

export const CandidateSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  sourceName: z.string().optional(),
  url: z.string().optional(),
  durationSeconds: nonNegative.optional(),
  publishedAt: z.string().optional(),
  views: nonNegative.optional(),
  positiveSignals: nonNegative.optional(),
  negativeSignals: nonNegative.optional(),
  comments: nonNegative.optional(),
});

export const CandidateListSchema = z.array(CandidateSchema);

export const CandidateEnrichmentSchema = z.object({
  summary: z.string(),
  keyPoints: z.array(z.string()),
  difficultyLevel: z.string().optional(),
  prerequisites: z.array(z.string()),
});
