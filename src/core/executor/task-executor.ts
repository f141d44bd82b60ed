import fg from 'fast-glob';
import { join } from 'node:path';
import { z } from 'zod';

import { errorMessage } from '../../utils/fs.js';
import { sha256File } from '../../utils/hash.js';
import { newRunId } from '../../utils/id.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { DATA_DIR_NAME, initRun, resolveWorkspace, runPaths, type RecordFormat } from '../../workspace/layout.js';
import type { VerificationCache } from '../cache/verification-cache.js';
import { planHash } from '../contract/reader.js';
import type { Step, TaskContract } from '../contract/types.js';
import { errorKindOf, exitCodeForKind, EXIT_CODES, LockConflict, type ErrorKind, type ExitCode } from '../errors.js';
import { EvidenceCollector } from '../evidence/collector.js';
import type { ExecutionRecord, ExecutionResult, ExecutorState, PlannedStage } from '../evidence/types.js';
import { LedgerWriter } from '../ledger/writer.js';
import type { LedgerEntryInput } from '../ledger/types.js';
import type { Heartbeat, LockCoordinator } from '../lock/coordinator.js';
import type { AcquireResult, ReclaimedLock } from '../lock/types.js';
import { startUnit, type UnitOutcome, type WorkerPool, type WorkUnit } from '../pool/worker-pool.js';
import type { SecurityGate, ValidationOutcome } from '../security/gate.js';
import { runStep, type StepOutcome } from './steps.js';

export interface TaskExecutorOptions {
  root: string;
  agentId: string;
  gate: SecurityGate;
  locks: LockCoordinator;
  cache: VerificationCache;
  pool: WorkerPool;
  /** Default per-step limit when a step sets no `timeout_seconds`. */
  stepTimeoutMs: number;
  lockWaitMs: number;
  heartbeatMs: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Progress hook for renderers. */
  onEvent?: (event: ExecutorEvent) => void;
}

export type ExecutorEvent =
  | { type: 'state'; state: ExecutorState }
  | { type: 'stage_started'; stage: number; parallelGroup: number | null; steps: number }
  | { type: 'step_finished'; result: ExecutionResult };

export interface RunOptions {
  /** Format of the written record; matches the contract file. */
  format?: RecordFormat;
}

export interface ExecutionOutcome {
  record: ExecutionRecord;
  /** `null` in plan mode or when the record could not be written. */
  recordPath: string | null;
  exitCode: ExitCode;
}

interface StepRun {
  outcome: StepOutcome;
  fromCache: boolean;
  startedAt: string;
}

const CachedStepResult = z.object({
  summary: z.string(),
  exit_code: z.number().int().nullable()
});

/**
 * Runs one contract: `Parsed → Locking → Executing → Finalizing → Completed | Failed`.
 *
 * Security and lock conflicts are decided before anything mutates. Once locks are held,
 * finalization always runs and always attempts release.
 */
export class TaskExecutor {
  private readonly log: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly opts: TaskExecutorOptions) {
    this.log = (opts.logger ?? silentLogger()).child('executor');
    this.env = opts.env ?? process.env;
  }

  /** Validate and simulate lock acquisition. Nothing is written. */
  async plan(contract: TaskContract): Promise<ExecutionOutcome> {
    const run = new RunState(contract, this.opts.agentId, 'plan', this.log, this.opts.onEvent);
    run.record.stages = planStages(contract);

    const verdict = await this.preflight(contract);
    if (!verdict.ok) {
      run.fail('SecurityViolation', verdict.violation.message);
      run.transition('Failed');
      return run.finish(null);
    }

    run.transition('Locking');
    let preview: AcquireResult;
    try {
      preview = await this.opts.locks.simulate(contract.resources, this.opts.agentId, contract.id);
    } catch (err) {
      run.fail('InternalError', `lock store unavailable: ${errorMessage(err)}`);
      run.transition('Failed');
      return run.finish(null);
    }
    if (!preview.success) {
      run.blockedBy(new LockConflict(preview.blocker));
      run.transition('Failed');
      return run.finish(null);
    }
    run.record.warnings.push(...preview.reclaimed.map((r) => `would reclaim ${describeReclaim(r)}`));
    run.record.locks_acquired = preview.acquired;
    run.transition('Completed');
    return run.finish(null);
  }

  async execute(contract: TaskContract, runOpts: RunOptions = {}): Promise<ExecutionOutcome> {
    const format = runOpts.format ?? 'yaml';
    const run = new RunState(contract, this.opts.agentId, 'execute', this.log, this.opts.onEvent);
    run.record.stages = planStages(contract);

    const paths = runPaths(resolveWorkspace(this.opts.root), contract.id, run.record.run_id, format);
    let evidence: EvidenceCollector;
    try {
      await initRun(paths);
      evidence = new EvidenceCollector(paths, format);
      run.ledger = await LedgerWriter.open(paths.ledgerPath);
    } catch (err) {
      run.fail('InternalError', `cannot prepare evidence directory: ${errorMessage(err)}`);
      run.transition('Failed');
      return run.finish(null);
    }

    await run.note({ type: 'run_started', data: { task_id: contract.id, run_id: run.record.run_id, agent_id: this.opts.agentId } });

    // Parsed: every step, required secret and port is checked before a single lock is taken.
    const verdict = await this.preflight(contract);
    if (!verdict.ok) {
      const v = verdict.violation;
      run.fail('SecurityViolation', v.message);
      await run.note({
        type: 'security_rejected',
        data: { reason: v.reason, pattern: v.pattern ?? null, step_index: v.stepIndex ?? null }
      });
      return await this.conclude(run, evidence);
    }

    await run.enter('Locking');
    let acquired: AcquireResult;
    try {
      acquired = await this.opts.locks.acquire(contract.resources, this.opts.agentId, contract.id, this.opts.lockWaitMs);
    } catch (err) {
      run.fail('InternalError', `lock store unavailable: ${errorMessage(err)}`);
      return await this.conclude(run, evidence);
    }
    if (!acquired.success) {
      const blocking = run.blockedBy(new LockConflict(acquired.blocker));
      await run.note({ type: 'lock_conflict', data: { ...blocking, attempts: acquired.attempts } });
      return await this.conclude(run, evidence);
    }

    run.record.locks_acquired = acquired.acquired;
    for (const r of acquired.reclaimed) {
      run.record.warnings.push(`reclaimed ${describeReclaim(r)}`);
      await run.note({
        type: 'lock_reclaimed',
        data: { resource: r.resource, previous_agent_id: r.previousAgentId, heartbeat_at: r.heartbeatAt }
      });
    }
    await run.note({ type: 'locks_acquired', data: { resources: acquired.acquired } });

    const heartbeat =
      acquired.acquired.length > 0
        ? this.opts.locks.startHeartbeat(acquired.acquired, this.opts.agentId, this.opts.heartbeatMs)
        : null;

    try {
      await run.enter('Executing');
      await this.runStages(contract, run, evidence);
    } catch (err) {
      this.log.error(`unexpected failure while executing ${contract.id}`, { error: errorMessage(err) });
      run.fail(errorKindOf(err), errorMessage(err));
    }
    return await this.finalize(run, evidence, acquired.acquired, heartbeat);
  }

  private async runStages(contract: TaskContract, run: RunState, evidence: EvidenceCollector): Promise<void> {
    const env = this.opts.gate.filterEnv(this.env, contract.secretsRequired);
    const stages = groupSteps(contract);
    let blocked = false;

    for (const [stageIndex, stage] of stages.entries()) {
      if (blocked) {
        run.record.steps_skipped.push(...stage.map((s) => s.index));
        continue;
      }

      const parallelGroup = stage[0].parallelGroup;
      this.opts.onEvent?.({ type: 'stage_started', stage: stageIndex, parallelGroup, steps: stage.length });
      await run.note({ type: 'group_started', data: { stage: stageIndex, parallel_group: parallelGroup, steps: stage.map((s) => s.index) } });

      const results = await this.runStage(stage, env, run, evidence);
      for (const result of results) {
        run.record.results.push(result);
        this.opts.onEvent?.({ type: 'step_finished', result });
      }

      const failed = results.filter((r, i) => !r.succeeded && !stage[i].bestEffort);
      await run.note({
        type: 'group_completed',
        data: { stage: stageIndex, parallel_group: parallelGroup, failed: results.filter((r) => !r.succeeded).map((r) => r.step_index) }
      });
      // Later groups never start after a blocking failure.
      if (failed.length > 0) blocked = true;
    }
  }

  private async runStage(stage: readonly Step[], env: Record<string, string>, run: RunState, evidence: EvidenceCollector): Promise<ExecutionResult[]> {
    const admitted: Array<{ step: Step; unit: WorkUnit<StepRun> }> = [];
    const results = new Map<number, ExecutionResult>();

    for (const step of stage) {
      // Mandatory per-step check; nothing reaches the pool without it.
      const verdict = this.opts.gate.validate(step);
      if (!verdict.ok) {
        const at = new Date().toISOString();
        const rejected: StepOutcome = { succeeded: false, summary: verdict.violation.message, errorKind: null, exitCode: null };
        results.set(step.index, stepResult(step, at, at, 0, rejected, false, 'SecurityViolation'));
        continue;
      }
      admitted.push({ step, unit: this.unitFor(step, env, run, evidence) });
    }

    const outcomes: UnitOutcome<StepRun>[] =
      admitted.length === 1
        ? [await startUnit(admitted[0].unit, this.log).outcome]
        : await this.opts.pool.runGroup(admitted.map((a) => a.unit));

    for (const [i, outcome] of outcomes.entries()) {
      const step = admitted[i].step;
      const result = toResult(step, outcome);
      results.set(step.index, result);
      await run.note({
        type: 'step_completed',
        data: {
          step_index: result.step_index,
          succeeded: result.succeeded,
          duration_ms: result.duration_ms,
          error_kind: result.error_kind,
          from_cache: result.from_cache
        }
      });
    }

    return stage.flatMap((s) => {
      const r = results.get(s.index);
      return r ? [r] : [];
    });
  }

  private unitFor(step: Step, env: Record<string, string>, run: RunState, evidence: EvidenceCollector): WorkUnit<StepRun> {
    return {
      id: `${step.index}:${step.name}`,
      timeoutMs: step.timeoutMs ?? this.opts.stepTimeoutMs,
      run: async (signal) => {
        const startedAt = new Date().toISOString();
        await run.note({ type: 'step_started', data: { step_index: step.index, name: step.name, kind: step.kind } });

        // The key is hashed before the step runs, so the cached result describes these bytes.
        const key = step.cacheable && step.target !== null ? await this.cacheKey(step.target, step.checkKind) : null;
        if (key) {
          const hit = await this.lookup(key.hash, key.kind);
          if (hit) {
            await run.note({ type: 'cache_hit', data: { step_index: step.index, check_kind: key.kind } });
            return { outcome: hit, fromCache: true, startedAt };
          }
        }

        const outcome = await runStep(step, { root: this.opts.root, env, signal, evidence });
        if (key && outcome.succeeded) {
          await this.store(key.hash, key.kind, outcome);
          await run.note({ type: 'cache_stored', data: { step_index: step.index, check_kind: key.kind } });
        }
        return { outcome, fromCache: false, startedAt };
      }
    };
  }

  private async preflight(contract: TaskContract): Promise<ValidationOutcome> {
    const verdict = this.opts.gate.validateContract(contract, this.env);
    if (!verdict.ok) return verdict;
    return await this.opts.gate.checkPorts(contract.portsShouldBeFree);
  }

  private async cacheKey(target: string, kind: string): Promise<{ hash: string; kind: string } | null> {
    try {
      const hash = await sha256File(join(this.opts.root, target));
      return hash === null ? null : { hash, kind };
    } catch (err) {
      // An unhashable target (a directory, say) just runs uncached.
      this.log.warn('cannot hash cache target', { target, error: errorMessage(err) });
      return null;
    }
  }

  private async lookup(hash: string, kind: string): Promise<StepOutcome | null> {
    try {
      const entry = await this.opts.cache.get(hash, kind);
      if (!entry) return null;
      const parsed = CachedStepResult.safeParse(entry.result);
      if (!parsed.success) return null;
      return { succeeded: true, summary: parsed.data.summary, errorKind: null, exitCode: parsed.data.exit_code };
    } catch (err) {
      // The cache is an accelerator; an unreadable cache means running the check.
      this.log.warn('verification cache lookup failed', { error: errorMessage(err) });
      return null;
    }
  }

  private async store(hash: string, kind: string, outcome: StepOutcome): Promise<void> {
    try {
      await this.opts.cache.put(hash, kind, { summary: outcome.summary, exit_code: outcome.exitCode });
    } catch (err) {
      this.log.warn('verification cache write failed', { error: errorMessage(err) });
    }
  }

  private async finalize(run: RunState, evidence: EvidenceCollector, held: readonly string[], heartbeat: Heartbeat | null = null): Promise<ExecutionOutcome> {
    await run.enter('Finalizing');
    await heartbeat?.stop();

    if (held.length > 0) {
      try {
        const released = await this.opts.locks.release(held, this.opts.agentId);
        if (released.notOwned.length > 0) {
          run.record.locks_released_cleanly = false;
          run.record.warnings.push(`locks taken over by another agent before release: ${released.notOwned.join(', ')}`);
        }
        await run.note({ type: 'locks_released', data: { resources: released.released, not_owned: released.notOwned } });
      } catch (err) {
        // Staleness reclaims whatever we could not release.
        run.record.locks_released_cleanly = false;
        run.record.warnings.push(`lock release failed: ${errorMessage(err)}`);
        this.log.warn('lock release failed', { task: run.record.task_id, error: errorMessage(err) });
        await run.note({ type: 'release_failed', data: { error: errorMessage(err) } });
      }
    }

    for (const resource of run.contract.resources) {
      run.record.resource_hashes[resource] = await this.hashForRecord(run, resource);
    }
    for (const file of await this.evidenceFiles(run)) {
      run.record.evidence_hashes[file] = await this.hashForRecord(run, file);
    }

    const stepFailed = run.record.results.some((r) => !r.succeeded);
    if (run.record.error_kind === null) {
      run.record.overall_status = stepFailed ? 'partial_failure' : 'success';
      run.transition(stepFailed ? 'Failed' : 'Completed');
    } else {
      run.transition('Failed');
    }
    return await this.writeOut(run, evidence);
  }

  /** Files matching the contract's evidence patterns, run data excluded. */
  private async evidenceFiles(run: RunState): Promise<string[]> {
    if (run.contract.evidence.length === 0) return [];
    try {
      const files = await fg([...run.contract.evidence], {
        cwd: this.opts.root,
        onlyFiles: true,
        dot: true,
        ignore: [`${DATA_DIR_NAME}/**`]
      });
      return files.sort((a, b) => a.localeCompare(b));
    } catch (err) {
      run.record.warnings.push(`cannot collect evidence files: ${errorMessage(err)}`);
      this.log.warn('cannot collect evidence files', { error: errorMessage(err) });
      return [];
    }
  }

  private async hashForRecord(run: RunState, path: string): Promise<string | null> {
    try {
      return await sha256File(join(this.opts.root, path));
    } catch (err) {
      run.record.warnings.push(`cannot hash ${path}: ${errorMessage(err)}`);
      this.log.warn('cannot hash path for the record', { path, error: errorMessage(err) });
      return null;
    }
  }

  /** Ends a run rejected before any lock was held. */
  private async conclude(run: RunState, evidence: EvidenceCollector): Promise<ExecutionOutcome> {
    await run.enter('Failed');
    return await this.writeOut(run, evidence);
  }

  private async writeOut(run: RunState, evidence: EvidenceCollector): Promise<ExecutionOutcome> {
    await run.note({
      type: 'run_completed',
      data: { state: run.record.state, overall_status: run.record.overall_status, error_kind: run.record.error_kind }
    });
    await run.flush();

    try {
      return run.finish(await evidence.writeRecord(finished(run.record)));
    } catch (err) {
      this.log.error('cannot write execution record', { path: evidence.recordPath, error: errorMessage(err) });
      run.fail('InternalError', `cannot write execution record: ${errorMessage(err)}`);
      run.transition('Failed');
      return run.finish(null);
    }
  }
}

/** Mutable bookkeeping for one run; `record` becomes the written ExecutionRecord. */
class RunState {
  readonly record: ExecutionRecord;
  ledger: LedgerWriter | null = null;

  constructor(
    readonly contract: TaskContract,
    agentId: string,
    mode: ExecutionRecord['mode'],
    private readonly log: Logger,
    private readonly onEvent?: (event: ExecutorEvent) => void
  ) {
    const now = new Date();
    this.record = {
      run_id: newRunId(now),
      task_id: contract.id,
      title: contract.title,
      description: contract.description,
      mode,
      agent_id: agentId,
      gates: [...contract.gates],
      plan_hash: planHash(contract),
      state: 'Parsed',
      state_history: [{ state: 'Parsed', at: now.toISOString() }],
      overall_status: 'success',
      error_kind: null,
      error_message: null,
      blocking: null,
      warnings: [],
      locks_acquired: [],
      locks_released_cleanly: true,
      results: [],
      steps_skipped: [],
      stages: [],
      resource_hashes: {},
      evidence_hashes: {},
      started_at: now.toISOString(),
      finished_at: null
    };
  }

  transition(state: ExecutorState): void {
    if (this.record.state === state) return;
    this.record.state = state;
    this.record.state_history.push({ state, at: new Date().toISOString() });
    this.onEvent?.({ type: 'state', state });
  }

  async enter(state: ExecutorState): Promise<void> {
    const from = this.record.state;
    this.transition(state);
    await this.note({ type: 'state_changed', data: { from, to: state } });
  }

  /** Contract-level failure; only the first one is kept. */
  blockedBy(conflict: LockConflict): NonNullable<ExecutionRecord['blocking']> {
    const { agentId, resource, taskId } = conflict.blocker;
    const blocking = { agent_id: agentId, resource, task_id: taskId };
    this.record.blocking = blocking;
    this.fail(conflict.kind, conflict.message);
    return blocking;
  }

  fail(kind: ErrorKind, message: string): void {
    this.record.overall_status = 'fatal_failure';
    if (this.record.error_kind !== null) return;
    this.record.error_kind = kind;
    this.record.error_message = message;
    if (this.record.state === 'Parsed' || this.record.state === 'Locking') {
      this.record.steps_skipped = this.contract.steps.map((s) => s.index);
    }
  }

  /** Ledger trouble is reported once and recorded as a warning; the run itself carries on. */
  async note(event: LedgerEntryInput): Promise<void> {
    const ledger = this.ledger;
    if (!ledger) return;
    try {
      await ledger.append(event);
    } catch (err) {
      this.ledger = null;
      this.record.warnings.push(`run ledger disabled after write failure: ${errorMessage(err)}`);
      this.log.warn('run ledger write failed', { path: ledger.ledgerPath, error: errorMessage(err) });
    }
  }

  async flush(): Promise<void> {
    await this.ledger?.flush();
  }

  finish(recordPath: string | null): ExecutionOutcome {
    const record = finished(this.record);
    const failedStep = record.results.some((r) => !r.succeeded);
    const exitCode = record.error_kind !== null ? exitCodeForKind(record.error_kind) : failedStep ? EXIT_CODES.stepFailure : EXIT_CODES.success;
    return { record, recordPath, exitCode };
  }
}

function finished(record: ExecutionRecord): ExecutionRecord {
  if (record.finished_at === null) record.finished_at = new Date().toISOString();
  return record;
}

/** Stages in execution order: ascending `parallel_group`, or one stage per step without groups. */
export function groupSteps(contract: TaskContract): Step[][] {
  const steps = contract.steps;
  if (steps.every((s) => s.parallelGroup === null)) return steps.map((s) => [s]);

  const byGroup = new Map<number, Step[]>();
  for (const s of steps) {
    const g = s.parallelGroup ?? 0;
    byGroup.set(g, [...(byGroup.get(g) ?? []), s]);
  }
  return [...byGroup.entries()].sort(([a], [b]) => a - b).map(([, group]) => group);
}

function planStages(contract: TaskContract): PlannedStage[] {
  return groupSteps(contract).map((stage) => ({
    parallel_group: stage[0].parallelGroup,
    steps: stage.map((s) => ({ step_index: s.index, name: s.name, kind: s.kind, cacheable: s.cacheable }))
  }));
}

function toResult(step: Step, outcome: UnitOutcome<StepRun>): ExecutionResult {
  const finishedAt = new Date().toISOString();
  switch (outcome.status) {
    case 'fulfilled': {
      const { outcome: o, fromCache, startedAt } = outcome.value;
      return stepResult(step, startedAt, finishedAt, outcome.durationMs, o, fromCache, o.errorKind);
    }
    case 'timeout': {
      const startedAt = new Date(Date.now() - outcome.durationMs).toISOString();
      const o: StepOutcome = { succeeded: false, summary: `timed out after ${outcome.timeoutMs}ms`, errorKind: 'Timeout', exitCode: null };
      return stepResult(step, startedAt, finishedAt, outcome.durationMs, o, false, 'Timeout');
    }
    case 'rejected': {
      const startedAt = new Date(Date.now() - outcome.durationMs).toISOString();
      const o: StepOutcome = { succeeded: false, summary: errorMessage(outcome.error), errorKind: 'ExecutionFailure', exitCode: null };
      return stepResult(step, startedAt, finishedAt, outcome.durationMs, o, false, 'ExecutionFailure');
    }
  }
}

function stepResult(
  step: Step,
  startedAt: string,
  finishedAt: string,
  durationMs: number,
  outcome: StepOutcome,
  fromCache: boolean,
  errorKind: ErrorKind | null
): ExecutionResult {
  return {
    step_index: step.index,
    name: step.name,
    kind: step.kind,
    parallel_group: step.parallelGroup,
    succeeded: outcome.succeeded,
    duration_ms: durationMs,
    output_summary: outcome.summary,
    error_kind: outcome.succeeded ? null : errorKind,
    from_cache: fromCache,
    exit_code: outcome.exitCode,
    started_at: startedAt,
    finished_at: finishedAt
  };
}

function describeReclaim(r: ReclaimedLock): string {
  return `stale lock on ${r.resource} from agent '${r.previousAgentId}' (task ${r.previousTaskId}, last heartbeat ${r.heartbeatAt})`;
}
