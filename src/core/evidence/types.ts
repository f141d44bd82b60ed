import { z } from 'zod';

import { ERROR_KINDS } from '../errors.js';
import { TimestampIso } from '../ledger/types.js';
import { STEP_KINDS } from '../contract/types.js';

export const EXECUTOR_STATES = ['Parsed', 'Locking', 'Executing', 'Finalizing', 'Completed', 'Failed'] as const;
export type ExecutorState = (typeof EXECUTOR_STATES)[number];

export const OVERALL_STATUSES = ['success', 'partial_failure', 'fatal_failure'] as const;
export type OverallStatus = (typeof OVERALL_STATUSES)[number];

const ErrorKindSchema = z.enum(ERROR_KINDS);

export const ExecutionResultSchema = z.object({
  step_index: z.number().int().nonnegative(),
  name: z.string(),
  kind: z.enum(STEP_KINDS),
  parallel_group: z.number().int().nonnegative().nullable(),
  succeeded: z.boolean(),
  duration_ms: z.number().int().nonnegative(),
  output_summary: z.string(),
  error_kind: ErrorKindSchema.nullable(),
  from_cache: z.boolean(),
  exit_code: z.number().int().nullable(),
  started_at: TimestampIso,
  finished_at: TimestampIso
});

export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

export const PlannedStageSchema = z.object({
  parallel_group: z.number().int().nonnegative().nullable(),
  steps: z.array(
    z.object({
      step_index: z.number().int().nonnegative(),
      name: z.string(),
      kind: z.enum(STEP_KINDS),
      cacheable: z.boolean()
    })
  )
});

export type PlannedStage = z.infer<typeof PlannedStageSchema>;

export const ExecutionRecordSchema = z.object({
  run_id: z.string(),
  task_id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  mode: z.enum(['execute', 'plan']),
  agent_id: z.string(),
  gates: z.array(z.string()),
  plan_hash: z.string(),
  state: z.enum(EXECUTOR_STATES),
  state_history: z.array(z.object({ state: z.enum(EXECUTOR_STATES), at: TimestampIso })),
  overall_status: z.enum(OVERALL_STATUSES),
  error_kind: ErrorKindSchema.nullable(),
  error_message: z.string().nullable(),
  blocking: z
    .object({
      agent_id: z.string(),
      resource: z.string(),
      task_id: z.string()
    })
    .nullable(),
  warnings: z.array(z.string()),
  locks_acquired: z.array(z.string()),
  locks_released_cleanly: z.boolean(),
  results: z.array(ExecutionResultSchema),
  steps_skipped: z.array(z.number().int().nonnegative()),
  stages: z.array(PlannedStageSchema),
  resource_hashes: z.record(z.string().nullable()),
  /** Files matched by the contract's evidence patterns at the end of the run. */
  evidence_hashes: z.record(z.string().nullable()).default({}),
  started_at: TimestampIso,
  finished_at: TimestampIso.nullable()
});

export type ExecutionRecord = z.infer<typeof ExecutionRecordSchema>;

export const CommandEvidenceMeta = z.object({
  step_index: z.number().int().nonnegative(),
  step_name: z.string(),
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  argv: z.array(z.string()),
  exit_code: z.number().int().nullable(),
  duration_ms: z.number().int().nonnegative(),
  timed_out: z.boolean(),
  stdout_file: z.string(),
  stderr_file: z.string()
});

export type CommandEvidenceMeta = z.infer<typeof CommandEvidenceMeta>;
