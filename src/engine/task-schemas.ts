/**
 * Structured task names and output schemas.
 */

import { z } from 'zod';
import { CandidateEnrichmentSchema } from '../domain/candidate';

export const TaskNames = {
  AnalyzeGaps: 'analyze_gaps',
  ScoreDocument: 'score_document',
  SummarizeCandidate: 'summarize_candidate',
  GenerateProjects: 'generate_projects',
} as const;

export const GapSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  query: z.string().min(1).optional(),
  severity: z.enum(['low', 'medium', 'high']).optional(),
});

export const AnalyzeGapsOutputSchema = z
  .object({
    summary: z.string(),
    gaps: z.array(GapSchema),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.gaps.forEach((gap, index) => {
      if (seen.has(gap.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['gaps', index, 'id'],
          message: `Duplicate gap id "${gap.id}"`,
        });
      }
      seen.add(gap.id);
    });
  });

export type AnalyzeGapsOutput = z.infer<typeof AnalyzeGapsOutputSchema>;

export const InsertionSchema = z.object({
  section: z.string().min(1),
  content: z.string().min(1),
  reason: z.string().optional(),
});

export const DocumentScoreSchema = z.object({
  overall: z.number().min(0).max(100),
  breakdown: z.record(z.number()),
});

export const ScoreDocumentOutputSchema = z.object({
  score: DocumentScoreSchema,
  insertions: z.array(InsertionSchema),
});

export type ScoreDocumentOutput = z.infer<typeof ScoreDocumentOutputSchema>;

export const SummarizeCandidateOutputSchema = CandidateEnrichmentSchema;

/** Plans requested per run. */
export const PROJECT_PLAN_COUNT = 2;

export const ProjectPlanSchema = z.object({
  title: z.string().min(1),
  skillsCombined: z.array(z.string().min(1)).min(1),
  tutorialRefs: z.array(z.string().min(1)).optional(),
  personalizationTip: z.string().min(1),
  cvBlurb: z.string().min(1),
  estimatedBuildTime: z.string().optional(),
  roleFitNote: z.string().optional(),
});

export const GenerateProjectsOutputSchema = z.object({
  projects: z.array(ProjectPlanSchema).max(PROJECT_PLAN_COUNT),
});

export type GenerateProjectsOutput = z.infer<typeof GenerateProjectsOutputSchema>;
