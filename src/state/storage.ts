/**
 * State Storage (InMemory + SQLite)
 *
 * Append-only snapshot persistence plus per-scope lock records. Every method
 * that checks and mutates (append, insert, compare-and-swap) does so atomically.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { StaleLockError } from "../errors.js";
import type { LockToken, ResourceRecord, SnapshotDraft, SnapshotVersionInfo, StateSnapshot } from "../types.js";

/** Lock fields supplied by the caller; storage assigns the fence. */
export type LockRequest = Omit<LockToken, "fence">;

export interface StateStorage {
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Snapshots
  /** Append the next version; fails with StaleLockError unless `lockId` holds the scope. */
  appendSnapshot(scope: string, draft: SnapshotDraft, lockId: string, createdAt: string): Promise<StateSnapshot>;
  getLatestSnapshot(scope: string): Promise<StateSnapshot | null>;
  getSnapshot(scope: string, version: number): Promise<StateSnapshot | null>;
  listSnapshots(scope: string): Promise<SnapshotVersionInfo[]>;

  // Locks
  /** Grant the lock if the scope is free. */
  insertLock(request: LockRequest): Promise<LockToken | null>;
  /** Replace the lock `expectedLockId` if it is still current and its lease ended at or before `now`. */
  replaceExpiredLock(expectedLockId: string, request: LockRequest, now: string): Promise<LockToken | null>;
  renewLock(scope: string, lockId: string, leaseExpiresAt: string): Promise<LockToken | null>;
  /** Delete the scope's lock; with a lockId, only if it matches. */
  deleteLock(scope: string, lockId?: string): Promise<LockToken | null>;
  getLock(scope: string): Promise<LockToken | null>;
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryStateStorage implements StateStorage {
  private snapshots = new Map<string, StateSnapshot[]>();
  private locks = new Map<string, LockToken>();
  private fences = new Map<string, number>();

  async initialize(): Promise<void> {}

  async appendSnapshot(scope: string, draft: SnapshotDraft, lockId: string, createdAt: string): Promise<StateSnapshot> {
    const lock = this.locks.get(scope);
    if (!lock || lock.id !== lockId) {
      throw new StaleLockError(scope, lockId);
    }

    const history = this.snapshots.get(scope) ?? [];
    const latest = history[history.length - 1];
    const snapshot: StateSnapshot = {
      scope,
      version: (latest?.version ?? 0) + 1,
      createdAt,
      runId: draft.runId,
      complete: draft.complete,
      resources: structuredClone(draft.resources),
    };
    history.push(snapshot);
    this.snapshots.set(scope, history);
    return structuredClone(snapshot);
  }

  async getLatestSnapshot(scope: string): Promise<StateSnapshot | null> {
    const history = this.snapshots.get(scope);
    const latest = history?.[history.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async getSnapshot(scope: string, version: number): Promise<StateSnapshot | null> {
    const found = this.snapshots.get(scope)?.find((s) => s.version === version);
    return found ? structuredClone(found) : null;
  }

  async listSnapshots(scope: string): Promise<SnapshotVersionInfo[]> {
    return (this.snapshots.get(scope) ?? []).map(toVersionInfo).reverse();
  }

  async insertLock(request: LockRequest): Promise<LockToken | null> {
    if (this.locks.has(request.scope)) return null;
    return this.grant(request);
  }

  async replaceExpiredLock(expectedLockId: string, request: LockRequest, now: string): Promise<LockToken | null> {
    const current = this.locks.get(request.scope);
    if (!current || current.id !== expectedLockId) return null;
    if (Date.parse(current.leaseExpiresAt) > Date.parse(now)) return null;
    return this.grant(request);
  }

  async renewLock(scope: string, lockId: string, leaseExpiresAt: string): Promise<LockToken | null> {
    const current = this.locks.get(scope);
    if (!current || current.id !== lockId) return null;
    const renewed = { ...current, leaseExpiresAt };
    this.locks.set(scope, renewed);
    return { ...renewed };
  }

  async deleteLock(scope: string, lockId?: string): Promise<LockToken | null> {
    const current = this.locks.get(scope);
    if (!current || (lockId !== undefined && current.id !== lockId)) return null;
    this.locks.delete(scope);
    return { ...current };
  }

  async getLock(scope: string): Promise<LockToken | null> {
    const current = this.locks.get(scope);
    return current ? { ...current } : null;
  }

  async close(): Promise<void> {
    this.snapshots.clear();
    this.locks.clear();
    this.fences.clear();
  }

  private grant(request: LockRequest): LockToken {
    const fence = (this.fences.get(request.scope) ?? 0) + 1;
    this.fences.set(request.scope, fence);
    const token: LockToken = { ...request, fence };
    this.locks.set(request.scope, token);
    return { ...token };
  }
}

// ── SQLite ──────────────────────────────────────────────────────

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const resourceRecordSchema: z.ZodType<ResourceRecord> = z.object({
  address: z.string(),
  type: z.string(),
  name: z.string(),
  schemaVersion: z.number(),
  externalId: z.string(),
  attributes: z.record(z.string(), scalarSchema),
  outputs: z.record(z.string(), scalarSchema),
  dependencies: z.array(z.string()),
  updatedAt: z.string(),
});

const resourcesSchema = z.record(z.string(), resourceRecordSchema);

const snapshotRowSchema = z.object({
  scope: z.string(),
  version: z.number(),
  created_at: z.string(),
  run_id: z.string().nullable(),
  complete: z.number(),
  resources_json: z.string(),
});

const versionRowSchema = snapshotRowSchema.omit({ resources_json: true }).extend({
  resource_count: z.number(),
});

const lockRowSchema = z.object({
  scope: z.string(),
  lock_id: z.string(),
  fence: z.number(),
  holder: z.string(),
  operation: z.string(),
  acquired_at: z.string(),
  lease_expires_at: z.string(),
});

export class SQLiteStateStorage implements StateStorage {
  private db: import("better-sqlite3").Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    const Database = (await import("better-sqlite3")).default;
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
    }
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        scope TEXT NOT NULL,
        version INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        run_id TEXT,
        complete INTEGER NOT NULL,
        resource_count INTEGER NOT NULL,
        resources_json TEXT NOT NULL,
        PRIMARY KEY (scope, version)
      );

      CREATE TABLE IF NOT EXISTS scope_locks (
        scope TEXT PRIMARY KEY,
        lock_id TEXT NOT NULL,
        fence INTEGER NOT NULL,
        holder TEXT NOT NULL,
        operation TEXT NOT NULL,
        acquired_at TEXT NOT NULL,
        lease_expires_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS scope_fences (
        scope TEXT PRIMARY KEY,
        fence INTEGER NOT NULL
      );
    `);
  }

  async appendSnapshot(scope: string, draft: SnapshotDraft, lockId: string, createdAt: string): Promise<StateSnapshot> {
    const db = this.requireDb();
    const append = db.transaction((): StateSnapshot => {
      const lock = this.readLock(scope);
      if (!lock || lock.id !== lockId) {
        throw new StaleLockError(scope, lockId);
      }
      const latest = z
        .object({ version: z.number().nullable() })
        .parse(db.prepare("SELECT MAX(version) AS version FROM snapshots WHERE scope = ?").get(scope));
      const version = (latest.version ?? 0) + 1;
      db.prepare(
        `INSERT INTO snapshots (scope, version, created_at, run_id, complete, resource_count, resources_json) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      ).run(
        scope,
        version,
        createdAt,
        draft.runId ?? null,
        draft.complete ? 1 : 0,
        Object.keys(draft.resources).length,
        JSON.stringify(draft.resources),
      );
      return {
        scope,
        version,
        createdAt,
        runId: draft.runId,
        complete: draft.complete,
        resources: structuredClone(draft.resources),
      };
    });
    return append.immediate();
  }

  async getLatestSnapshot(scope: string): Promise<StateSnapshot | null> {
    const row = this.requireDb()
      .prepare("SELECT * FROM snapshots WHERE scope = ? ORDER BY version DESC LIMIT 1")
      .get(scope);
    return row ? rowToSnapshot(row) : null;
  }

  async getSnapshot(scope: string, version: number): Promise<StateSnapshot | null> {
    const row = this.requireDb().prepare("SELECT * FROM snapshots WHERE scope = ? AND version = ?").get(scope, version);
    return row ? rowToSnapshot(row) : null;
  }

  async listSnapshots(scope: string): Promise<SnapshotVersionInfo[]> {
    const rows = this.requireDb()
      .prepare(
        "SELECT scope, version, created_at, run_id, complete, resource_count FROM snapshots WHERE scope = ? ORDER BY version DESC",
      )
      .all(scope);
    return rows.map((raw) => {
      const row = versionRowSchema.parse(raw);
      return {
        version: row.version,
        createdAt: row.created_at,
        runId: row.run_id ?? undefined,
        complete: row.complete === 1,
        resourceCount: row.resource_count,
      };
    });
  }

  async insertLock(request: LockRequest): Promise<LockToken | null> {
    const db = this.requireDb();
    const insert = db.transaction((): LockToken | null => {
      if (this.readLock(request.scope)) return null;
      return this.grant(request);
    });
    return insert.immediate();
  }

  async replaceExpiredLock(expectedLockId: string, request: LockRequest, now: string): Promise<LockToken | null> {
    const db = this.requireDb();
    const replace = db.transaction((): LockToken | null => {
      const current = this.readLock(request.scope);
      if (!current || current.id !== expectedLockId) return null;
      if (Date.parse(current.leaseExpiresAt) > Date.parse(now)) return null;
      db.prepare("DELETE FROM scope_locks WHERE scope = ?").run(request.scope);
      return this.grant(request);
    });
    return replace.immediate();
  }

  async renewLock(scope: string, lockId: string, leaseExpiresAt: string): Promise<LockToken | null> {
    const db = this.requireDb();
    const changed = db
      .prepare("UPDATE scope_locks SET lease_expires_at = ? WHERE scope = ? AND lock_id = ?")
      .run(leaseExpiresAt, scope, lockId).changes;
    return changed > 0 ? this.readLock(scope) : null;
  }

  async deleteLock(scope: string, lockId?: string): Promise<LockToken | null> {
    const db = this.requireDb();
    const remove = db.transaction((): LockToken | null => {
      const current = this.readLock(scope);
      if (!current || (lockId !== undefined && current.id !== lockId)) return null;
      db.prepare("DELETE FROM scope_locks WHERE scope = ?").run(scope);
      return current;
    });
    return remove.immediate();
  }

  async getLock(scope: string): Promise<LockToken | null> {
    return this.readLock(scope);
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private requireDb(): import("better-sqlite3").Database {
    if (!this.db) {
      throw new Error("SQLite state storage is not initialized");
    }
    return this.db;
  }

  private readLock(scope: string): LockToken | null {
    const row = this.requireDb().prepare("SELECT * FROM scope_locks WHERE scope = ?").get(scope);
    if (!row) return null;
    const r = lockRowSchema.parse(row);
    return {
      id: r.lock_id,
      scope: r.scope,
      fence: r.fence,
      holder: r.holder,
      operation: r.operation,
      acquiredAt: r.acquired_at,
      leaseExpiresAt: r.lease_expires_at,
    };
  }

  /** Must run inside a transaction. */
  private grant(request: LockRequest): LockToken {
    const db = this.requireDb();
    db.prepare(
      `INSERT INTO scope_fences (scope, fence) VALUES (?, 1)
       ON CONFLICT(scope) DO UPDATE SET fence = fence + 1`,
    ).run(request.scope);
    const { fence } = z
      .object({ fence: z.number() })
      .parse(db.prepare("SELECT fence FROM scope_fences WHERE scope = ?").get(request.scope));

    db.prepare(
      `INSERT INTO scope_locks (scope, lock_id, fence, holder, operation, acquired_at, lease_expires_at) VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ).run(request.scope, request.id, fence, request.holder, request.operation, request.acquiredAt, request.leaseExpiresAt);

    return { ...request, fence };
  }
}

// ── Helpers ─────────────────────────────────────────────────────

function rowToSnapshot(raw: unknown): StateSnapshot {
  const row = snapshotRowSchema.parse(raw);
  return {
    scope: row.scope,
    version: row.version,
    createdAt: row.created_at,
    runId: row.run_id ?? undefined,
    complete: row.complete === 1,
    resources: resourcesSchema.parse(JSON.parse(row.resources_json)),
  };
}

function toVersionInfo(snapshot: StateSnapshot): SnapshotVersionInfo {
  return {
    version: snapshot.version,
    createdAt: snapshot.createdAt,
    runId: snapshot.runId,
    complete: snapshot.complete,
    resourceCount: Object.keys(snapshot.resources).length,
  };
}
