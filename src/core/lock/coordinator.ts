import { sleep } from '../../utils/file-mutex.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { LockBlocker } from '../errors.js';
import type { AcquireResult, LockRecord, LockState, LockStore, ReclaimedLock, ReleaseResult } from './types.js';

export interface LockCoordinatorOptions {
  store: LockStore;
  /** A lock whose heartbeat is older than this may be reclaimed by another agent. */
  staleAfterMs: number;
  /** Delay between attempts while waiting for a busy resource. */
  pollMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface Heartbeat {
  stop(): Promise<void>;
}

type BatchOutcome =
  | { ok: true; acquired: string[]; reclaimed: ReclaimedLock[] }
  | { ok: false; blocker: LockBlocker };

/**
 * Advisory per-path locks shared across processes through a {@link LockStore}.
 *
 * A batch is taken in sorted path order and rolled back entirely if any path is held, so
 * two agents requesting overlapping sets can never each hold part of what the other needs.
 */
export class LockCoordinator {
  private readonly store: LockStore;
  private readonly staleAfterMs: number;
  private readonly pollMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(opts: LockCoordinatorOptions) {
    if (!Number.isFinite(opts.staleAfterMs) || opts.staleAfterMs <= 0) {
      throw new RangeError(`lock stale window must be positive, got ${opts.staleAfterMs}ms`);
    }
    this.store = opts.store;
    this.staleAfterMs = opts.staleAfterMs;
    this.pollMs = opts.pollMs ?? 250;
    this.now = opts.now ?? Date.now;
    this.log = (opts.logger ?? silentLogger()).child('locks');
  }

  /**
   * Try to take every resource for `agentId`/`taskId`. Retries every `pollMs` until
   * `timeoutMs` has passed; `0` means a single attempt.
   */
  async acquire(resources: Iterable<string>, agentId: string, taskId: string, timeoutMs = 0): Promise<AcquireResult> {
    const sorted = sortedUnique(resources);
    const deadline = Date.now() + Math.max(0, timeoutMs);
    let attempts = 0;

    for (;;) {
      attempts += 1;
      const outcome = await this.store.update((state) => this.takeBatch(state, sorted, agentId, taskId));
      if (outcome.ok) {
        for (const r of outcome.reclaimed) {
          this.log.warn(`reclaimed stale lock on ${r.resource}`, { previousAgentId: r.previousAgentId, heartbeatAt: r.heartbeatAt });
        }
        this.log.debug(`acquired ${outcome.acquired.length} lock(s)`, { agentId, taskId, attempts });
        return { success: true, acquired: outcome.acquired, reclaimed: outcome.reclaimed, attempts };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.log.debug(`lock conflict on ${outcome.blocker.resource}`, { blocker: outcome.blocker, attempts });
        return { success: false, blocker: outcome.blocker, attempts };
      }
      await sleep(Math.min(this.pollMs, remaining));
    }
  }

  /** Drop `agentId`'s locks on `resources`. Paths that are free or held by others are left alone. */
  async release(resources: Iterable<string>, agentId: string): Promise<ReleaseResult> {
    const sorted = sortedUnique(resources);
    return await this.store.update((state) => {
      const released: string[] = [];
      const notOwned: string[] = [];
      for (const path of sorted) {
        const rec = state.locks[path];
        if (!rec) continue;
        if (rec.owner_agent_id !== agentId) {
          notOwned.push(path);
          continue;
        }
        delete state.locks[path];
        released.push(path);
      }
      return { released, notOwned };
    });
  }

  isStale(record: LockRecord, now: number = this.now()): boolean {
    const heartbeat = Date.parse(record.heartbeat_at);
    if (Number.isNaN(heartbeat)) return true;
    return now - heartbeat > this.staleAfterMs;
  }

  /** What `acquire` would do right now, without writing anything. */
  async simulate(resources: Iterable<string>, agentId: string, taskId: string): Promise<AcquireResult> {
    const state = await this.store.read();
    const outcome = this.takeBatch(state, sortedUnique(resources), agentId, taskId);
    return outcome.ok
      ? { success: true, acquired: outcome.acquired, reclaimed: outcome.reclaimed, attempts: 1 }
      : { success: false, blocker: outcome.blocker, attempts: 1 };
  }

  /** Refresh `heartbeat_at` on the locks `agentId` still owns; returns the refreshed paths. */
  async heartbeat(resources: Iterable<string>, agentId: string): Promise<string[]> {
    const sorted = sortedUnique(resources);
    const at = new Date(this.now()).toISOString();
    return await this.store.update((state) => {
      const refreshed: string[] = [];
      for (const path of sorted) {
        const rec = state.locks[path];
        if (rec && rec.owner_agent_id === agentId) {
          rec.heartbeat_at = at;
          refreshed.push(path);
        }
      }
      return refreshed;
    });
  }

  startHeartbeat(resources: Iterable<string>, agentId: string, intervalMs: number): Heartbeat {
    const paths = sortedUnique(resources);
    let inFlight: Promise<void> = Promise.resolve();

    const timer = setInterval(() => {
      inFlight = this.heartbeat(paths, agentId).then(
        (refreshed) => {
          if (refreshed.length < paths.length) {
            this.log.warn('heartbeat found locks no longer owned', { agentId, expected: paths.length, refreshed: refreshed.length });
          }
        },
        (err: unknown) => {
          this.log.warn('heartbeat failed', { error: err instanceof Error ? err.message : String(err) });
        }
      );
    }, intervalMs);
    timer.unref();

    return {
      stop: async () => {
        clearInterval(timer);
        await inFlight;
      }
    };
  }

  /** Current records sorted by path, optionally only the one for `resource`. */
  async list(resource?: string): Promise<LockRecord[]> {
    const state = await this.store.read();
    return Object.values(state.locks)
      .filter((r) => resource === undefined || r.resource_path === resource)
      .sort((a, b) => a.resource_path.localeCompare(b.resource_path));
  }

  /** Remove every stale record; returns what was removed. */
  async prune(): Promise<LockRecord[]> {
    const now = this.now();
    return await this.store.update((state) => {
      const removed: LockRecord[] = [];
      for (const [path, rec] of Object.entries(state.locks)) {
        if (this.isStale(rec, now)) {
          removed.push(rec);
          delete state.locks[path];
        }
      }
      return removed.sort((a, b) => a.resource_path.localeCompare(b.resource_path));
    });
  }

  private takeBatch(state: LockState, sorted: readonly string[], agentId: string, taskId: string): BatchOutcome {
    const now = this.now();
    const at = new Date(now).toISOString();
    const acquired: string[] = [];
    const reclaimed: ReclaimedLock[] = [];
    // Previous record (or none) for every path touched in this batch, for rollback.
    const undo: Array<{ path: string; previous: LockRecord | undefined }> = [];

    for (const path of sorted) {
      const existing = state.locks[path];

      if (existing && !(existing.owner_agent_id === agentId && existing.task_id === taskId)) {
        if (!this.isStale(existing, now)) {
          for (const u of undo.reverse()) {
            if (u.previous) state.locks[u.path] = u.previous;
            else delete state.locks[u.path];
          }
          return {
            ok: false,
            blocker: { agentId: existing.owner_agent_id, resource: path, taskId: existing.task_id }
          };
        }
        reclaimed.push({
          resource: path,
          previousAgentId: existing.owner_agent_id,
          previousTaskId: existing.task_id,
          heartbeatAt: existing.heartbeat_at
        });
      }

      undo.push({ path, previous: existing ? { ...existing } : undefined });
      const reentrant = existing !== undefined && existing.owner_agent_id === agentId && existing.task_id === taskId;
      state.locks[path] = {
        resource_path: path,
        owner_agent_id: agentId,
        task_id: taskId,
        acquired_at: reentrant ? existing.acquired_at : at,
        heartbeat_at: at
      };
      acquired.push(path);
    }

    return { ok: true, acquired, reclaimed };
  }
}

function sortedUnique(resources: Iterable<string>): string[] {
  return [...new Set(resources)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
