/**
 * SQLite storage implementation over better-sqlite3.
 *
 * Values are stored as JSON next to the columns that queries filter and
 * order on. Calls are synchronous, so each method body completes before
 * any other code in this process runs; read-then-write methods also take
 * an IMMEDIATE transaction so a second process on the same file waits for
 * the write lock instead of interleaving.
 */

import Database from 'better-sqlite3';
import { Artifact, ArtifactDraft } from '../domain/artifact';
import { CacheEntry } from '../domain/cache';
import { WorkflowError, checkpointConflictError } from '../domain/errors';
import { RunEvent } from '../domain/events';
import { QuotaLedgerEntry } from '../domain/quota';
import { Checkpoint, Run, RunState } from '../domain/run';
import { SideEffectRecord } from '../domain/side-effect';
import { Logger, logger as rootLogger } from '../logger';
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

const SCHEMA = `
CREATE TABLE IF NOT EXISTS run_checkpoints (
  run_id TEXT NOT NULL,
  seq INTEGER NOT NULL,
  state TEXT NOT NULL,
  run_created_at TEXT NOT NULL,
  created_at TEXT NOT NULL,
  run_json TEXT NOT NULL,
  PRIMARY KEY (run_id, seq)
);
CREATE INDEX IF NOT EXISTS run_checkpoints_by_created ON run_checkpoints (run_created_at, run_id);

CREATE TABLE IF NOT EXISTS run_events (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL,
  run_id TEXT NOT NULL,
  event_json TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS run_events_by_run ON run_events (run_id, seq);

CREATE TABLE IF NOT EXISTS quota_ledger (
  resource TEXT NOT NULL,
  period_key TEXT NOT NULL,
  consumed INTEGER NOT NULL,
  ceiling INTEGER NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (resource, period_key)
);

CREATE TABLE IF NOT EXISTS cache_entries (
  key TEXT PRIMARY KEY,
  entry_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS side_effects (
  key TEXT PRIMARY KEY,
  run_id TEXT NOT NULL,
  record_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS artifacts (
  run_id TEXT NOT NULL,
  type TEXT NOT NULL,
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  content_json TEXT NOT NULL,
  PRIMARY KEY (run_id, type, version)
);
`;

interface QuotaRow {
  resource: string;
  period_key: string;
  consumed: number;
  ceiling: number;
  updated_at: string;
}

interface CheckpointRow {
  seq: number;
  created_at: string;
  run_json: string;
}

interface ArtifactRow {
  run_id: string;
  type: string;
  version: number;
  created_at: string;
  content_json: string;
}

/** Rows only ever hold JSON this module wrote. */
function fromJson<T>(text: string): T {
  const value: T = JSON.parse(text);
  return value;
}

function toQuotaEntry(row: QuotaRow): QuotaLedgerEntry {
  return {
    resource: row.resource,
    periodKey: row.period_key,
    consumed: row.consumed,
    ceiling: row.ceiling,
    updatedAt: row.updated_at,
  };
}

function toArtifact(row: ArtifactRow): Artifact {
  return {
    runId: row.run_id,
    type: row.type,
    version: row.version,
    content: fromJson<unknown>(row.content_json),
    createdAt: row.created_at,
  };
}

function pageOf(options?: ListOptions): { limit: number; offset: number } {
  return { limit: options?.limit ?? 100, offset: options?.offset ?? 0 };
}

class SqliteRunStore implements RunStore {
  constructor(private db: Database.Database) {}

  async append(run: Run): Promise<Checkpoint> {
    const append = this.db.transaction((input: Run): Checkpoint => {
      const row = this.db
        .prepare<[string], { seq: number | null }>('SELECT MAX(seq) AS seq FROM run_checkpoints WHERE run_id = ?')
        .get(input.id);
      const latestSeq = row?.seq ?? 0;
      if (input.checkpointSeq !== latestSeq) {
        throw new WorkflowError(checkpointConflictError(input.id, input.checkpointSeq, latestSeq));
      }
      const seq = latestSeq + 1;
      const json = JSON.stringify({ ...input, checkpointSeq: seq });
      this.db
        .prepare<[string, number, string, string, string, string]>(
          `INSERT INTO run_checkpoints (run_id, seq, state, run_created_at, created_at, run_json)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(input.id, seq, input.state, input.createdAt, input.updatedAt, json);
      return { seq, runId: input.id, state: input.state, run: fromJson<Run>(json), createdAt: input.updatedAt };
    });
    return append.immediate(run);
  }

  async getLatest(runId: string): Promise<Run | null> {
    const row = this.db
      .prepare<[string], { run_json: string }>(
        'SELECT run_json FROM run_checkpoints WHERE run_id = ? ORDER BY seq DESC LIMIT 1',
      )
      .get(runId);
    return row ? fromJson<Run>(row.run_json) : null;
  }

  async history(runId: string): Promise<Checkpoint[]> {
    const rows = this.db
      .prepare<[string], CheckpointRow>(
        'SELECT seq, created_at, run_json FROM run_checkpoints WHERE run_id = ? ORDER BY seq',
      )
      .all(runId);
    return rows.map((row) => {
      const run = fromJson<Run>(row.run_json);
      return { seq: row.seq, runId, state: run.state, run, createdAt: row.created_at };
    });
  }

  async list(options?: ListOptions & { state?: RunState }): Promise<Run[]> {
    const rows = this.db
      .prepare<{ state: string | null; limit: number; offset: number }, { run_json: string }>(
        `SELECT c.run_json FROM run_checkpoints c
         JOIN (SELECT run_id, MAX(seq) AS seq FROM run_checkpoints GROUP BY run_id) latest
           ON latest.run_id = c.run_id AND latest.seq = c.seq
         WHERE @state IS NULL OR c.state = @state
         ORDER BY c.run_created_at DESC, c.run_id ASC
         LIMIT @limit OFFSET @offset`,
      )
      .all({ state: options?.state ?? null, ...pageOf(options) });
    return rows.map((row) => fromJson<Run>(row.run_json));
  }
}

class SqliteEventStore implements EventStore {
  constructor(private db: Database.Database) {}

  async create(event: RunEvent): Promise<RunEvent> {
    const json = JSON.stringify(event);
    this.db
      .prepare<[string, string, string]>('INSERT INTO run_events (id, run_id, event_json) VALUES (?, ?, ?)')
      .run(event.id, event.runId, json);
    return fromJson<RunEvent>(json);
  }

  async listByRun(runId: string, options?: ListOptions): Promise<RunEvent[]> {
    const { limit, offset } = pageOf(options);
    const rows = this.db
      .prepare<[string, number, number], { event_json: string }>(
        'SELECT event_json FROM run_events WHERE run_id = ? ORDER BY seq LIMIT ? OFFSET ?',
      )
      .all(runId, limit, offset);
    return rows.map((row) => fromJson<RunEvent>(row.event_json));
  }
}

class SqliteQuotaStore implements QuotaStore {
  constructor(private db: Database.Database) {}

  async get(resource: string, periodKey: string): Promise<QuotaLedgerEntry | null> {
    const row = this.db
      .prepare<[string, string], QuotaRow>('SELECT * FROM quota_ledger WHERE resource = ? AND period_key = ?')
      .get(resource, periodKey);
    return row ? toQuotaEntry(row) : null;
  }

  async tryIncrement(
    resource: string,
    periodKey: string,
    units: number,
    ceiling: number,
    updatedAt: string,
  ): Promise<QuotaLedgerEntry | null> {
    const increment = this.db.transaction((): QuotaLedgerEntry | null => {
      const existing = this.db
        .prepare<[string, string], QuotaRow>('SELECT * FROM quota_ledger WHERE resource = ? AND period_key = ?')
        .get(resource, periodKey);
      const consumed = existing?.consumed ?? 0;
      if (consumed + units > ceiling) return null;

      if (existing) {
        const result = this.db
          .prepare<[number, number, string, string, string, number, number]>(
            `UPDATE quota_ledger SET consumed = consumed + ?, ceiling = ?, updated_at = ?
             WHERE resource = ? AND period_key = ? AND consumed + ? <= ?`,
          )
          .run(units, ceiling, updatedAt, resource, periodKey, units, ceiling);
        if (result.changes === 0) return null;
      } else {
        this.db
          .prepare<[string, string, number, number, string]>(
            'INSERT INTO quota_ledger (resource, period_key, consumed, ceiling, updated_at) VALUES (?, ?, ?, ?, ?)',
          )
          .run(resource, periodKey, units, ceiling, updatedAt);
      }
      return { resource, periodKey, consumed: consumed + units, ceiling, updatedAt };
    });
    return increment.immediate();
  }

  async listByPeriod(periodKey: string): Promise<QuotaLedgerEntry[]> {
    return this.db
      .prepare<[string], QuotaRow>('SELECT * FROM quota_ledger WHERE period_key = ? ORDER BY resource')
      .all(periodKey)
      .map(toQuotaEntry);
  }
}

class SqliteCacheEntryStore implements CacheEntryStore {
  constructor(private db: Database.Database) {}

  async get(key: string): Promise<CacheEntry | null> {
    const row = this.db
      .prepare<[string], { entry_json: string }>('SELECT entry_json FROM cache_entries WHERE key = ?')
      .get(key);
    return row ? fromJson<CacheEntry>(row.entry_json) : null;
  }

  async set(entry: CacheEntry): Promise<void> {
    this.db
      .prepare<[string, string]>(
        `INSERT INTO cache_entries (key, entry_json) VALUES (?, ?)
         ON CONFLICT (key) DO UPDATE SET entry_json = excluded.entry_json`,
      )
      .run(entry.key, JSON.stringify(entry));
  }

  async delete(key: string): Promise<boolean> {
    return this.db.prepare<[string]>('DELETE FROM cache_entries WHERE key = ?').run(key).changes > 0;
  }

  async clear(): Promise<void> {
    this.db.prepare('DELETE FROM cache_entries').run();
  }
}

class SqliteSideEffectStore implements SideEffectStore {
  constructor(private db: Database.Database) {}

  async get(key: string): Promise<SideEffectRecord | null> {
    const row = this.db
      .prepare<[string], { record_json: string }>('SELECT record_json FROM side_effects WHERE key = ?')
      .get(key);
    return row ? fromJson<SideEffectRecord>(row.record_json) : null;
  }

  async record(record: SideEffectRecord): Promise<SideEffectRecord> {
    const insert = this.db.transaction((): SideEffectRecord => {
      this.db
        .prepare<[string, string, string]>('INSERT OR IGNORE INTO side_effects (key, run_id, record_json) VALUES (?, ?, ?)')
        .run(record.key, record.runId, JSON.stringify(record));
      const row = this.db
        .prepare<[string], { record_json: string }>('SELECT record_json FROM side_effects WHERE key = ?')
        .get(record.key);
      if (!row) throw new Error(`Side effect ${record.key} vanished after insert`);
      return fromJson<SideEffectRecord>(row.record_json);
    });
    return insert.immediate();
  }
}

class SqliteArtifactStore implements ArtifactStore {
  constructor(private db: Database.Database) {}

  async save(draft: ArtifactDraft): Promise<Artifact> {
    const save = this.db.transaction((): Artifact => {
      const row = this.db
        .prepare<[string, string], { version: number }>(
          'SELECT COALESCE(MAX(version), 0) AS version FROM artifacts WHERE run_id = ? AND type = ?',
        )
        .get(draft.runId, draft.type);
      const version = (row?.version ?? 0) + 1;
      const json = JSON.stringify(draft.content ?? null);
      this.db
        .prepare<[string, string, number, string, string]>(
          'INSERT INTO artifacts (run_id, type, version, created_at, content_json) VALUES (?, ?, ?, ?, ?)',
        )
        .run(draft.runId, draft.type, version, draft.createdAt, json);
      return toArtifact({
        run_id: draft.runId,
        type: draft.type,
        version,
        created_at: draft.createdAt,
        content_json: json,
      });
    });
    return save.immediate();
  }

  async getLatest(runId: string, type: string): Promise<Artifact | null> {
    const row = this.db
      .prepare<[string, string], ArtifactRow>(
        'SELECT * FROM artifacts WHERE run_id = ? AND type = ? ORDER BY version DESC LIMIT 1',
      )
      .get(runId, type);
    return row ? toArtifact(row) : null;
  }

  async listByRun(runId: string): Promise<Artifact[]> {
    return this.db
      .prepare<[string], ArtifactRow>(
        'SELECT * FROM artifacts WHERE run_id = ? ORDER BY created_at DESC, version DESC, type ASC',
      )
      .all(runId)
      .map(toArtifact);
  }
}

export interface SqliteStoreOptions {
  logger?: Logger;
}

/**
 * Open (creating when missing) a SQLite database and return a store over
 * it. Pass ":memory:" for a private, non-persistent database.
 */
export function createSqliteStore(filename: string, options: SqliteStoreOptions = {}): Store {
  const log = (options.logger ?? rootLogger).child({ component: 'sqlite-store' });
  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  log.info('SQLite store opened', { filename });

  return {
    kind: 'sqlite',
    runs: new SqliteRunStore(db),
    events: new SqliteEventStore(db),
    quota: new SqliteQuotaStore(db),
    cacheEntries: new SqliteCacheEntryStore(db),
    sideEffects: new SqliteSideEffectStore(db),
    artifacts: new SqliteArtifactStore(db),
    close: async () => {
      if (db.open) db.close();
    },
  };
}
