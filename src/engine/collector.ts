/**
 * Branch slots and the barrier merge.
 *
 * Each gap owns one slot; a slot accepts exactly one terminal outcome and
 * is immutable afterwards. The merge orders slots by gap id, so the
 * artifact and its hash do not depend on completion order.
 */

import { createHash } from 'crypto';
import { RankedCandidate } from '../domain/candidate';
import { TypedError } from '../domain/errors';
import {
  BranchStatus,
  Gap,
  GapBranch,
  MergedArtifact,
  MergedGapEntry,
  NO_RESULTS_NOTE,
} from '../domain/run';
import { compareCodeUnits } from '../ranking/ranking-engine';

export type BranchOutcome =
  | { status: BranchStatus.Done; results: RankedCandidate[] }
  | { status: BranchStatus.Failed; error: TypedError };

export function isTerminalBranch(branch: GapBranch): boolean {
  return branch.status === BranchStatus.Done || branch.status === BranchStatus.Failed;
}

export function createPendingSlots(runId: string, gaps: Gap[]): Record<string, GapBranch> {
  const slots: Record<string, GapBranch> = {};
  for (const gap of gaps) {
    slots[gap.id] = { runId, gapId: gap.id, status: BranchStatus.Pending, results: null, error: null };
  }
  return slots;
}

/** Gap ids whose slots still need a branch, in gap-id order. */
export function unfinishedGapIds(slots: Record<string, GapBranch>): string[] {
  return Object.values(slots)
    .filter((slot) => !isTerminalBranch(slot))
    .map((slot) => slot.gapId)
    .sort(compareCodeUnits);
}

/** Returns the updated slots, or null when the slot is missing or already terminal. */
export function markRunning(
  slots: Record<string, GapBranch>,
  gapId: string,
  at: string,
): Record<string, GapBranch> | null {
  const slot = slots[gapId];
  if (!slot || isTerminalBranch(slot)) return null;
  return { ...slots, [gapId]: { ...slot, status: BranchStatus.Running, startedAt: at } };
}

/**
 * Record a branch's terminal outcome. Returns null (discard) when the slot
 * is missing or already terminal.
 */
export function settleSlot(
  slots: Record<string, GapBranch>,
  gapId: string,
  outcome: BranchOutcome,
  at: string,
): Record<string, GapBranch> | null {
  const slot = slots[gapId];
  if (!slot || isTerminalBranch(slot)) return null;
  const settled: GapBranch = outcome.status === BranchStatus.Done
    ? { ...slot, status: BranchStatus.Done, results: outcome.results, error: null, completedAt: at }
    : { ...slot, status: BranchStatus.Failed, results: null, error: outcome.error, completedAt: at };
  return { ...slots, [gapId]: settled };
}

/** JSON with object keys sorted at every level; undefined members are dropped. */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : canonicalJson(item))).join(',')}]`;
  }
  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
  return `{${members.join(',')}}`;
}

export function hashArtifact(entries: MergedGapEntry[]): string {
  return createHash('sha256').update(canonicalJson(entries)).digest('hex');
}

/**
 * Merge slots into the artifact, one entry per gap in gap-id order. Failed
 * and empty branches are present with the "no results" note.
 */
export function mergeBranches(gaps: Gap[], slots: Record<string, GapBranch>): MergedArtifact {
  const ordered = [...gaps].sort((a, b) => compareCodeUnits(a.id, b.id));
  const entries = ordered.map((gap): MergedGapEntry => {
    const slot = slots[gap.id];
    if (slot && slot.status === BranchStatus.Done) {
      const results = slot.results ?? [];
      return results.length > 0
        ? { gapId: gap.id, topic: gap.topic, status: BranchStatus.Done, results }
        : { gapId: gap.id, topic: gap.topic, status: BranchStatus.Done, results, note: NO_RESULTS_NOTE };
    }
    return {
      gapId: gap.id,
      topic: gap.topic,
      status: BranchStatus.Failed,
      results: [],
      note: NO_RESULTS_NOTE,
      error: slot?.error?.message ?? 'Branch did not complete',
    };
  });

  const failed = entries.filter((entry) => entry.status === BranchStatus.Failed).length;
  return {
    gaps: entries,
    succeeded: entries.length - failed,
    failed,
    artifactHash: hashArtifact(entries),
  };
}
