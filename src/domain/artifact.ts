/**
 * Saved run outputs. Each save of a type creates the next version; readers
 * get the latest unless they ask for the history.
 */

export const ArtifactTypes = {
  Research: 'research',
  ProjectPlans: 'project_plans',
} as const;

export interface Artifact {
  runId: string;
  type: string;
  /** 1 for the first save of this type in the run. */
  version: number;
  content: unknown;
  createdAt: string;
}

/** An artifact before the store assigns its version. */
export type ArtifactDraft = Omit<Artifact, 'version'>;
