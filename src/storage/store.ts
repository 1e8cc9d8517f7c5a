/**
 * Storage layer interfaces.
 *
 * Defines the persistence contract with pluggable backends. Runs are an
 * append-only checkpoint log: the current run is the latest checkpoint.
 */

import { Artifact, ArtifactDraft } from '../domain/artifact';
import { CacheEntry } from '../domain/cache';
import { RunEvent } from '../domain/events';
import { QuotaLedgerEntry } from '../domain/quota';
import { Checkpoint, Run, RunState } from '../domain/run';
import { SideEffectRecord } from '../domain/side-effect';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for the run checkpoint log. */
export interface RunStore {
  /**
   * Append a snapshot. `run.checkpointSeq` must equal the sequence of the
   * latest stored checkpoint (0 for a new run); otherwise the append is
   * rejected with RUN.CHECKPOINT_CONFLICT. Returns the stored checkpoint,
   * whose run carries the new sequence number.
   */
  append(run: Run): Promise<Checkpoint>;
  getLatest(runId: string): Promise<Run | null>;
  /** All checkpoints of a run, oldest first. */
  history(runId: string): Promise<Checkpoint[]>;
  /** Latest snapshot of each run, newest first. */
  list(options?: ListOptions & { state?: RunState }): Promise<Run[]>;
}

/** Store interface for run events. */
export interface EventStore {
  create(event: RunEvent): Promise<RunEvent>;
  listByRun(runId: string, options?: ListOptions): Promise<RunEvent[]>;
}

/** Store interface for quota ledger entries. */
export interface QuotaStore {
  get(resource: string, periodKey: string): Promise<QuotaLedgerEntry | null>;
  /**
   * Atomically add `units` to the entry when the result stays within
   * `ceiling`. Returns the updated entry, or null (and changes nothing)
   * when the increment would exceed the ceiling.
   */
  tryIncrement(
    resource: string,
    periodKey: string,
    units: number,
    ceiling: number,
    updatedAt: string,
  ): Promise<QuotaLedgerEntry | null>;
  /** Entries of one period, ordered by resource. */
  listByPeriod(periodKey: string): Promise<QuotaLedgerEntry[]>;
}

/** Store interface for the durable cache tier. */
export interface CacheEntryStore {
  get(key: string): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
}

/** Store interface for performed side effects. */
export interface SideEffectStore {
  get(key: string): Promise<SideEffectRecord | null>;
  /** First write wins; a second record for the same key returns the existing one. */
  record(record: SideEffectRecord): Promise<SideEffectRecord>;
}

/** Store interface for versioned run artifacts. */
export interface ArtifactStore {
  /** Save the next version of `draft.type` for the run. */
  save(draft: ArtifactDraft): Promise<Artifact>;
  getLatest(runId: string, type: string): Promise<Artifact | null>;
  /** Every version of every type, newest first. */
  listByRun(runId: string): Promise<Artifact[]>;
}

export type StorageKind = 'memory' | 'sqlite';

/** Composite store interface. */
export interface Store {
  kind: StorageKind;
  runs: RunStore;
  events: EventStore;
  quota: QuotaStore;
  cacheEntries: CacheEntryStore;
  sideEffects: SideEffectStore;
  artifacts: ArtifactStore;
  /** Release the backend. The store is unusable afterwards. */
  close(): Promise<void>;
}
