/**
 * State Store
 *
 * Versioned snapshots per scope, guarded by a lease-based lock. A holder keeps
 * its lease alive with a heartbeat; a lease that runs out may be reclaimed by
 * another process, after which the old holder's writes fail with StaleLock.
 */

import { randomUUID } from "node:crypto";
import * as os from "node:os";
import { LockHeldError, StaleLockError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import type {
  AcquireLockOptions,
  LockToken,
  LockWaitStrategy,
  SnapshotDraft,
  SnapshotVersionInfo,
  StateSnapshot,
} from "../types.js";
import type { LockRequest, StateStorage } from "./storage.js";
import { deepFreeze, sleep } from "../utils.js";

export const DEFAULT_LEASE_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 500;

export type StateStoreOptions = {
  /** Lease length; the holder renews every third of it. */
  leaseMs?: number;
  /** Renew held leases in the background (default true). */
  heartbeat?: boolean;
  /** Used when acquireLock is called without a wait strategy. */
  defaultWait?: LockWaitStrategy;
  /** Default lock holder description. */
  holder?: string;
  now?: () => number;
  logger?: Logger;
};

export class StateStore {
  private storage: StateStorage;
  private leaseMs: number;
  private heartbeat: boolean;
  private defaultWait: LockWaitStrategy;
  private holder: string;
  private now: () => number;
  private log: Logger;
  /** lock id → heartbeat timer */
  private heartbeats = new Map<string, ReturnType<typeof setInterval>>();

  constructor(storage: StateStorage, options: StateStoreOptions = {}) {
    this.storage = storage;
    this.leaseMs = options.leaseMs ?? DEFAULT_LEASE_MS;
    this.heartbeat = options.heartbeat ?? true;
    this.defaultWait = options.defaultWait ?? { mode: "fail-fast" };
    this.holder = options.holder ?? `${os.hostname()}:${process.pid}`;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? getLogger("state");
  }

  async initialize(): Promise<void> {
    await this.storage.initialize();
  }

  async close(): Promise<void> {
    for (const timer of this.heartbeats.values()) clearInterval(timer);
    this.heartbeats.clear();
    await this.storage.close();
  }

  // ── Snapshots ─────────────────────────────────────────────────

  /** Latest snapshot of a scope, or null when nothing was ever committed. */
  async readSnapshot(scope: string): Promise<StateSnapshot | null> {
    const snapshot = await this.storage.getLatestSnapshot(scope);
    return snapshot ? deepFreeze(snapshot) : null;
  }

  async readSnapshotVersion(scope: string, version: number): Promise<StateSnapshot | null> {
    const snapshot = await this.storage.getSnapshot(scope, version);
    return snapshot ? deepFreeze(snapshot) : null;
  }

  /** Committed versions, newest first. */
  async listVersions(scope: string): Promise<SnapshotVersionInfo[]> {
    return this.storage.listSnapshots(scope);
  }

  /**
   * Commit a new snapshot version. The token must still hold the scope.
   *
   * @throws StaleLockError when the lock was released or reclaimed
   */
  async writeSnapshot(scope: string, draft: SnapshotDraft, token: LockToken): Promise<StateSnapshot> {
    if (token.scope !== scope) {
      throw new StaleLockError(scope, token.id);
    }
    const snapshot = await this.storage.appendSnapshot(scope, draft, token.id, this.isoNow());
    this.log.debug("Snapshot committed", {
      scope,
      version: snapshot.version,
      complete: snapshot.complete,
      resources: Object.keys(snapshot.resources).length,
    });
    return deepFreeze(snapshot);
  }

  // ── Locks ─────────────────────────────────────────────────────

  /**
   * Take the exclusive lock for a scope.
   *
   * @throws LockHeldError when the scope stays locked past the wait strategy
   */
  async acquireLock(scope: string, options: AcquireLockOptions = {}): Promise<LockToken> {
    const wait = options.wait ?? this.defaultWait;
    const deadline = this.now() + (wait.mode === "wait" ? wait.timeoutMs : 0);
    const pollIntervalMs = wait.mode === "wait" ? wait.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS : 0;

    for (;;) {
      const token = await this.tryAcquire(scope, options);
      if (token) {
        this.log.info("Lock acquired", { scope, lockId: token.id, fence: token.fence });
        this.startHeartbeat(token);
        return token;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        const current = await this.storage.getLock(scope);
        throw new LockHeldError(scope, current?.holder, current?.acquiredAt);
      }
      await sleep(Math.min(pollIntervalMs, remaining));
    }
  }

  /**
   * Extend the lease of a held lock.
   *
   * @throws StaleLockError when the token no longer holds the scope
   */
  async renewLock(token: LockToken): Promise<LockToken> {
    const renewed = await this.storage.renewLock(token.scope, token.id, this.leaseExpiry());
    if (!renewed) {
      throw new StaleLockError(token.scope, token.id);
    }
    return renewed;
  }

  /** Release a held lock. Returns false when the token no longer holds it. */
  async releaseLock(scope: string, token: LockToken): Promise<boolean> {
    this.stopHeartbeat(token.id);
    const released = await this.storage.deleteLock(scope, token.id);
    if (released) {
      this.log.info("Lock released", { scope, lockId: token.id });
    } else {
      this.log.warn("Lock was no longer held at release", { scope, lockId: token.id });
    }
    return released !== null;
  }

  /** Break whatever lock holds a scope. Returns the removed lock. */
  async forceReleaseLock(scope: string): Promise<LockToken | null> {
    const removed = await this.storage.deleteLock(scope);
    if (removed) {
      this.stopHeartbeat(removed.id);
      this.log.warn("Lock force-released", { scope, lockId: removed.id, holder: removed.holder });
    }
    return removed;
  }

  async getLock(scope: string): Promise<LockToken | null> {
    return this.storage.getLock(scope);
  }

  /** Whether a lock's lease has run out. */
  isExpired(lock: LockToken): boolean {
    return Date.parse(lock.leaseExpiresAt) <= this.now();
  }

  // ── Internals ─────────────────────────────────────────────────

  private async tryAcquire(scope: string, options: AcquireLockOptions): Promise<LockToken | null> {
    const request: LockRequest = {
      id: randomUUID(),
      scope,
      holder: options.holder ?? this.holder,
      operation: options.operation ?? "apply",
      acquiredAt: this.isoNow(),
      leaseExpiresAt: this.leaseExpiry(),
    };

    const inserted = await this.storage.insertLock(request);
    if (inserted) return inserted;

    const current = await this.storage.getLock(scope);
    if (!current) {
      // Released between the two calls
      return this.storage.insertLock(request);
    }
    if (!this.isExpired(current)) return null;

    this.log.warn("Reclaiming expired lock", {
      scope,
      lockId: current.id,
      holder: current.holder,
      leaseExpiresAt: current.leaseExpiresAt,
    });
    return this.storage.replaceExpiredLock(current.id, request, this.isoNow());
  }

  private startHeartbeat(token: LockToken): void {
    if (!this.heartbeat) return;
    const intervalMs = Math.max(1, Math.floor(this.leaseMs / 3));
    const timer = setInterval(() => {
      this.renewLock(token).catch((err: unknown) => {
        this.stopHeartbeat(token.id);
        this.log.error("Lock heartbeat failed", {
          scope: token.scope,
          lockId: token.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }, intervalMs);
    timer.unref();
    this.heartbeats.set(token.id, timer);
  }

  private stopHeartbeat(lockId: string): void {
    const timer = this.heartbeats.get(lockId);
    if (timer) {
      clearInterval(timer);
      this.heartbeats.delete(lockId);
    }
  }

  private isoNow(): string {
    return new Date(this.now()).toISOString();
  }

  private leaseExpiry(): string {
    return new Date(this.now() + this.leaseMs).toISOString();
  }
}
