import { z } from 'zod';

import { TimestampIso } from '../ledger/types.js';

export const CacheEntrySchema = z
  .object({
    resource_hash: z.string().min(1),
    check_kind: z.string().min(1),
    result: z.unknown(),
    created_at: TimestampIso,
    ttl_seconds: z.number().positive()
  })
  .strict();

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export const CacheStateSchema = z
  .object({
    version: z.literal(1),
    entries: z.array(CacheEntrySchema)
  })
  .strict();

export type CacheState = z.infer<typeof CacheStateSchema>;

export function emptyCacheState(): CacheState {
  return { version: 1, entries: [] };
}

export interface CacheStore {
  read(): Promise<CacheState>;
  update<T>(mutate: (state: CacheState) => T): Promise<T>;
  /** Overwrite without parsing the current document; resolves to it when it was readable. */
  replace(state: CacheState): Promise<CacheState | null>;
}

export interface CacheStats {
  entries: number;
  expired: number;
  maxEntries: number;
  oldestCreatedAt: string | null;
  newestCreatedAt: string | null;
}
