/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every value is
 * deep-copied on the way in and out, so callers never alias store state.
 * Single-threaded execution makes each method body atomic, which is what
 * QuotaStore.tryIncrement relies on.
 */

import { Artifact, ArtifactDraft } from '../domain/artifact';
import { CacheEntry } from '../domain/cache';
import { WorkflowError, checkpointConflictError } from '../domain/errors';
import { RunEvent } from '../domain/events';
import { QuotaLedgerEntry } from '../domain/quota';
import { Checkpoint, Run, RunState } from '../domain/run';
import { SideEffectRecord } from '../domain/side-effect';
import {
  Store,
  RunStore,
  EventStore,
  QuotaStore,
  CacheEntryStore,
  SideEffectStore,
  ArtifactStore,
  ListOptions,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private logs = new Map<string, Checkpoint[]>();

  async append(run: Run): Promise<Checkpoint> {
    const log = this.logs.get(run.id) ?? [];
    const latestSeq = log.length > 0 ? log[log.length - 1].seq : 0;
    if (run.checkpointSeq !== latestSeq) {
      throw new WorkflowError(checkpointConflictError(run.id, run.checkpointSeq, latestSeq));
    }
    const seq = latestSeq + 1;
    const snapshot: Run = { ...deepCopy(run), checkpointSeq: seq };
    const checkpoint: Checkpoint = {
      seq,
      runId: run.id,
      state: run.state,
      run: snapshot,
      createdAt: run.updatedAt,
    };
    log.push(checkpoint);
    this.logs.set(run.id, log);
    return deepCopy(checkpoint);
  }

  async getLatest(runId: string): Promise<Run | null> {
    const log = this.logs.get(runId);
    if (!log || log.length === 0) return null;
    return deepCopy(log[log.length - 1].run);
  }

  async history(runId: string): Promise<Checkpoint[]> {
    return deepCopy(this.logs.get(runId) ?? []);
  }

  async list(options?: ListOptions & { state?: RunState }): Promise<Run[]> {
    const latest: Run[] = [];
    for (const log of this.logs.values()) {
      if (log.length > 0) latest.push(log[log.length - 1].run);
    }
    const filtered = options?.state ? latest.filter((r) => r.state === options.state) : latest;
    filtered.sort((a, b) => {
      if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
    return applyListOptions(filtered, options).map(deepCopy);
  }
}

class MemoryEventStore implements EventStore {
  private data: RunEvent[] = [];

  async create(event: RunEvent): Promise<RunEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions): Promise<RunEvent[]> {
    const items = this.data.filter((e) => e.runId === runId);
    return applyListOptions(items, options).map(deepCopy);
  }
}

class MemoryQuotaStore implements QuotaStore {
  private data = new Map<string, QuotaLedgerEntry>();

  private static key(resource: string, periodKey: string): string {
    return `${resource}\u0000${periodKey}`;
  }

  async get(resource: string, periodKey: string): Promise<QuotaLedgerEntry | null> {
    const entry = this.data.get(MemoryQuotaStore.key(resource, periodKey));
    return entry ? { ...entry } : null;
  }

  async tryIncrement(
    resource: string,
    periodKey: string,
    units: number,
    ceiling: number,
    updatedAt: string,
  ): Promise<QuotaLedgerEntry | null> {
    const key = MemoryQuotaStore.key(resource, periodKey);
    const existing = this.data.get(key);
    const consumed = existing?.consumed ?? 0;
    if (consumed + units > ceiling) return null;
    const updated: QuotaLedgerEntry = {
      resource,
      periodKey,
      consumed: consumed + units,
      ceiling,
      updatedAt,
    };
    this.data.set(key, updated);
    return { ...updated };
  }

  async listByPeriod(periodKey: string): Promise<QuotaLedgerEntry[]> {
    return [...this.data.values()]
      .filter((e) => e.periodKey === periodKey)
      .sort((a, b) => (a.resource < b.resource ? -1 : a.resource > b.resource ? 1 : 0))
      .map((e) => ({ ...e }));
  }
}

class MemoryCacheEntryStore implements CacheEntryStore {
  private data = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.data.get(key);
    return entry ? deepCopy(entry) : null;
  }

  async set(entry: CacheEntry): Promise<void> {
    this.data.set(entry.key, deepCopy(entry));
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async clear(): Promise<void> {
    this.data.clear();
  }
}

class MemorySideEffectStore implements SideEffectStore {
  private data = new Map<string, SideEffectRecord>();

  async get(key: string): Promise<SideEffectRecord | null> {
    const record = this.data.get(key);
    return record ? deepCopy(record) : null;
  }

  async record(record: SideEffectRecord): Promise<SideEffectRecord> {
    const existing = this.data.get(record.key);
    if (existing) return deepCopy(existing);
    this.data.set(record.key, deepCopy(record));
    return deepCopy(record);
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data: Artifact[] = [];

  async save(draft: ArtifactDraft): Promise<Artifact> {
    const versions = this.data
      .filter((a) => a.runId === draft.runId && a.type === draft.type)
      .map((a) => a.version);
    const artifact: Artifact = { ...deepCopy(draft), version: Math.max(0, ...versions) + 1 };
    this.data.push(artifact);
    return deepCopy(artifact);
  }

  async getLatest(runId: string, type: string): Promise<Artifact | null> {
    let latest: Artifact | null = null;
    for (const artifact of this.data) {
      if (artifact.runId !== runId || artifact.type !== type) continue;
      if (!latest || artifact.version > latest.version) latest = artifact;
    }
    return latest ? deepCopy(latest) : null;
  }

  async listByRun(runId: string): Promise<Artifact[]> {
    return this.data
      .filter((a) => a.runId === runId)
      .sort((a, b) => {
        if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
        if (a.version !== b.version) return b.version - a.version;
        return a.type < b.type ? -1 : a.type > b.type ? 1 : 0;
      })
      .map(deepCopy);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    kind: 'memory',
    runs: new MemoryRunStore(),
    events: new MemoryEventStore(),
    quota: new MemoryQuotaStore(),
    cacheEntries: new MemoryCacheEntryStore(),
    sideEffects: new MemorySideEffectStore(),
    artifacts: new MemoryArtifactStore(),
    close: async () => undefined,
  };
}
