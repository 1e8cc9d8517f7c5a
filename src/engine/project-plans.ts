/**
 * Project plan synthesis: after the barrier, ask for portfolio projects
 * that combine the missing skills, built on the researched tutorials.
 *
 * Synthesis is best effort. An empty skill list or catalog skips the
 * task; a task failure is logged and yields no plans.
 */

import { StructuredTaskRunner } from '../domain/collaborators';
import { BranchStatus, MergedArtifact, ProjectPlan } from '../domain/run';
import { Logger, errorContext } from '../logger';
import { RetryHooks, RetryPolicy, invokeWithCorrection } from './retry';
import { GenerateProjectsOutputSchema, TaskNames } from './task-schemas';

export const MAX_PLAN_SKILLS = 8;
export const TUTORIALS_PER_SKILL = 3;

export interface CatalogTutorial {
  id: string;
  title: string;
  url?: string;
  personalizationTip?: string;
}

export interface CatalogEntry {
  gapId: string;
  skill: string;
  tutorials: CatalogTutorial[];
}

export interface ProjectPlanEnv {
  tasks: StructuredTaskRunner;
  retryPolicy: RetryPolicy;
  retryHooks: RetryHooks;
  log: Logger;
}

/** Distinct gap topics in artifact (gap-id) order, capped. */
export function missingSkills(artifact: MergedArtifact): string[] {
  const skills: string[] = [];
  for (const entry of artifact.gaps) {
    if (!skills.includes(entry.topic)) skills.push(entry.topic);
    if (skills.length === MAX_PLAN_SKILLS) break;
  }
  return skills;
}

/** Top-ranked tutorials of every successful gap that found any. */
export function buildCatalog(artifact: MergedArtifact): CatalogEntry[] {
  return artifact.gaps
    .filter((entry) => entry.status === BranchStatus.Done && entry.results.length > 0)
    .map((entry) => ({
      gapId: entry.gapId,
      skill: entry.topic,
      tutorials: entry.results.slice(0, TUTORIALS_PER_SKILL).map((result) => ({
        id: result.id,
        title: result.title,
        ...(result.url ? { url: result.url } : {}),
        ...(result.personalizationTip ? { personalizationTip: result.personalizationTip } : {}),
      })),
    }));
}

export async function synthesizeProjectPlans(
  artifact: MergedArtifact,
  context: { sourceText?: string; targetSpecText?: string },
  env: ProjectPlanEnv,
): Promise<ProjectPlan[]> {
  const skills = missingSkills(artifact);
  const catalog = buildCatalog(artifact);
  if (skills.length === 0 || catalog.length === 0) {
    env.log.info('Skipping project plans', { skills: skills.length, catalogEntries: catalog.length });
    return [];
  }

  try {
    const output = await invokeWithCorrection(
      env.tasks,
      TaskNames.GenerateProjects,
      {
        missingSkills: skills,
        catalog,
        sourceText: context.sourceText ?? '',
        targetSpecText: context.targetSpecText ?? '',
      },
      GenerateProjectsOutputSchema,
      env.retryPolicy,
      env.retryHooks,
    );
    env.log.info('Project plans generated', { count: output.projects.length });
    return output.projects;
  } catch (err) {
    env.log.warn('Project plan synthesis failed; continuing without plans', errorContext(err));
    return [];
  }
}
