import { z } from 'zod';

import { TimestampIso } from '../ledger/types.js';
import type { LockBlocker } from '../errors.js';

export const LockRecordSchema = z
  .object({
    resource_path: z.string().min(1),
    owner_agent_id: z.string().min(1),
    task_id: z.string().min(1),
    acquired_at: TimestampIso,
    heartbeat_at: TimestampIso
  })
  .strict();

export type LockRecord = z.infer<typeof LockRecordSchema>;

/** On-disk shape of `state/locks.json`; one record per resource path. */
export const LockStateSchema = z
  .object({
    version: z.literal(1),
    locks: z.record(LockRecordSchema)
  })
  .strict();

export type LockState = z.infer<typeof LockStateSchema>;

export function emptyLockState(): LockState {
  return { version: 1, locks: {} };
}

/** A stale lock taken over during acquisition; recorded as a warning, not a failure. */
export interface ReclaimedLock {
  resource: string;
  previousAgentId: string;
  previousTaskId: string;
  heartbeatAt: string;
}

export type AcquireResult =
  | { success: true; acquired: string[]; reclaimed: ReclaimedLock[]; attempts: number }
  | { success: false; blocker: LockBlocker; attempts: number };

export interface ReleaseResult {
  released: string[];
  /** Requested paths held by someone else; left untouched. */
  notOwned: string[];
}

export interface LockStore {
  read(): Promise<LockState>;
  /**
   * Read-modify-write under the store's exclusive lock. `mutate` may change `state` in
   * place; the result is persisted atomically before `update` resolves.
   */
  update<T>(mutate: (state: LockState) => T): Promise<T>;
}
