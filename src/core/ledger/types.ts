import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const LedgerEventType = z.enum([
  'run_started',
  'state_changed',
  'security_rejected',
  'locks_acquired',
  'lock_conflict',
  'lock_reclaimed',
  'group_started',
  'group_completed',
  'step_started',
  'step_completed',
  'cache_hit',
  'cache_stored',
  'locks_released',
  'release_failed',
  'run_completed'
]);

export type LedgerEventType = z.infer<typeof LedgerEventType>;

export const LedgerEnvelope = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: LedgerEventType,
  data: z.record(z.unknown())
});

export const StateChangedEvent = LedgerEnvelope.extend({
  type: z.literal('state_changed'),
  data: z.object({
    from: z.string(),
    to: z.string()
  })
});

export const StepCompletedEvent = LedgerEnvelope.extend({
  type: z.literal('step_completed'),
  data: z.object({
    step_index: z.number().int().nonnegative(),
    succeeded: z.boolean(),
    duration_ms: z.number().int().nonnegative(),
    error_kind: z.string().nullable(),
    from_cache: z.boolean()
  })
});

export const LedgerEntrySchema = z.union([StateChangedEvent, StepCompletedEvent, LedgerEnvelope]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export interface LedgerEntryInput {
  type: LedgerEventType;
  data: Record<string, unknown>;
}
