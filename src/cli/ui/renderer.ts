import type { CacheStats } from '../../core/cache/types.js';
import { serializeRecord } from '../../core/evidence/collector.js';
import type { ExecutionRecord, ExecutionResult, ExecutorState } from '../../core/evidence/types.js';
import type { ExecutionOutcome } from '../../core/executor/task-executor.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import type { RecordFormat } from '../../workspace/layout.js';
import { theme, INDENT, RULE_WIDTH } from './theme.js';
import { drawBox, firstLine, formatAge, formatMs, keyValue, padRight, sectionBanner, stepLine } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

export interface ContractInfo {
  id: string;
  title: string;
  path: string;
  planHash: string;
  resources: readonly string[];
  gates: readonly string[];
  steps: number;
  stages: number;
}

export interface LockRow {
  resource: string;
  agentId: string;
  taskId: string;
  acquiredAt: string;
  heartbeatAt: string;
  stale: boolean;
}

export interface HistoryRow {
  taskId: string;
  runId: string;
  state: ExecutorState;
  status: ExecutionRecord['overall_status'];
  durationMs: number | null;
  title: string;
}

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it, enabling:
 * - InteractiveRenderer for rich TTY output (colors, spinners, box-drawing)
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 *
 * Progress goes to stderr; documents meant for other programs go to stdout.
 */
export interface Renderer {
  // ── Execution ──
  sectionBanner(name: string): void;
  contractSummary(info: ContractInfo): void;
  stateChange(state: ExecutorState): void;
  stageStarted(info: { stage: number; parallelGroup: number | null; steps: number }): void;
  stepResult(result: ExecutionResult): void;
  executionSummary(outcome: ExecutionOutcome): void;
  /** Print a record as a document (stdout). */
  record(record: ExecutionRecord, format: RecordFormat): void;

  // ── Operator views ──
  lockTable(rows: LockRow[]): void;
  cacheStats(stats: CacheStats): void;
  historyTable(rows: HistoryRow[]): void;
  ledgerTimeline(taskId: string, runId: string, entries: LedgerEntry[]): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Spinners ──
  spinner(message: string): SpinnerHandle;

  // ── Generic ──
  blank(): void;
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  sectionBanner(name: string): void {
    this.writeln();
    this.writeln(INDENT + sectionBanner(name));
    this.writeln();
  }

  contractSummary(info: ContractInfo): void {
    const lines = [
      `${theme.box.label('Task')}       ${info.id}`,
      `${theme.box.label('Title')}      ${info.title}`,
      `${theme.box.label('Steps')}      ${info.steps} in ${info.stages} stage${info.stages === 1 ? '' : 's'}`,
      `${theme.box.label('Resources')}  ${info.resources.length > 0 ? info.resources.join(', ') : theme.dim('(none)')}`,
      `${theme.box.label('Plan hash')}  ${info.planHash}`
    ];
    if (info.gates.length > 0) lines.push(`${theme.box.label('Gates')}      ${info.gates.join(', ')}`);
    this.writeln(drawBox('Contract', lines, Math.max(RULE_WIDTH, info.resources.join(', ').length + 18)));
    this.writeln(`${INDENT}${theme.dim('From:')} ${info.path}`);
    this.writeln();
  }

  stateChange(state: ExecutorState): void {
    this.writeln(`${INDENT}${theme.arrow} ${theme.state(state)(state)}`);
  }

  stageStarted(info: { stage: number; parallelGroup: number | null; steps: number }): void {
    const label = info.parallelGroup === null ? `Stage ${info.stage + 1}` : `Group ${info.parallelGroup}`;
    const parallel = info.steps > 1 ? theme.dim(` (${info.steps} steps in parallel)`) : '';
    this.writeln(`${INDENT}${theme.bold(label)}${parallel}`);
  }

  stepResult(result: ExecutionResult): void {
    const timing = result.from_cache ? `cached, ${formatMs(result.duration_ms)}` : formatMs(result.duration_ms);
    const detail = result.succeeded ? timing : `${result.error_kind ?? 'failed'}: ${firstLine(result.output_summary)}`;
    this.writeln(stepLine({ name: result.name, passed: result.succeeded, cached: result.from_cache, detail }));
  }

  executionSummary(outcome: ExecutionOutcome): void {
    const rec = outcome.record;
    const passed = rec.results.filter((r) => r.succeeded).length;
    const failed = rec.results.length - passed;

    this.writeln();
    this.writeln(keyValue('Task', theme.bold(rec.task_id)));
    this.writeln(keyValue('Status', theme.status(rec.overall_status)(rec.overall_status)));
    this.writeln(
      keyValue(
        'Steps',
        `${rec.results.length} run, ${theme.success(`${passed} passed`)}, ${failed > 0 ? theme.error(`${failed} failed`) : '0 failed'}` +
          (rec.steps_skipped.length > 0 ? `, ${theme.warning(`${rec.steps_skipped.length} skipped`)}` : '')
      )
    );
    if (rec.error_kind) {
      this.writeln(keyValue('Error', `${theme.error(rec.error_kind)} ${rec.error_message ?? ''}`));
    }
    if (rec.blocking) {
      this.writeln(keyValue('Blocked by', `${rec.blocking.agent_id} on ${rec.blocking.resource} (task ${rec.blocking.task_id})`));
    }
    for (const w of rec.warnings) this.warn(w);
    if (!rec.locks_released_cleanly) this.warn('Locks were not released cleanly; they will be reclaimed once stale.');
    if (outcome.recordPath) this.writeln(keyValue('Record', theme.dim(outcome.recordPath)));
    this.writeln();
  }

  record(record: ExecutionRecord, format: RecordFormat): void {
    process.stdout.write(serializeRecord(record, format));
  }

  lockTable(rows: LockRow[]): void {
    if (rows.length === 0) {
      this.dim('No locks held.');
      return;
    }
    const width = Math.max(...rows.map((r) => r.resource.length), 8) + 2;
    const agentWidth = Math.max(...rows.map((r) => r.agentId.length), 5) + 2;
    this.writeln(`${INDENT}${theme.dim(padRight('RESOURCE', width) + padRight('AGENT', agentWidth) + padRight('TASK', 20) + 'HEARTBEAT')}`);
    for (const r of rows) {
      const beat = formatAge(r.heartbeatAt);
      const flag = r.stale ? ` ${theme.warning('stale')}` : '';
      this.writeln(`${INDENT}${padRight(r.resource, width)}${padRight(r.agentId, agentWidth)}${padRight(r.taskId, 20)}${theme.dim(beat)}${flag}`);
    }
  }

  cacheStats(stats: CacheStats): void {
    this.writeln(keyValue('Entries', `${stats.entries} / ${stats.maxEntries}`));
    this.writeln(keyValue('Expired', String(stats.expired)));
    this.writeln(keyValue('Oldest', stats.oldestCreatedAt ?? theme.dim('-')));
    this.writeln(keyValue('Newest', stats.newestCreatedAt ?? theme.dim('-')));
  }

  historyTable(rows: HistoryRow[]): void {
    this.writeln(`${INDENT}${theme.bold('Runs')}`);
    this.writeln();
    if (rows.length === 0) {
      this.dim('No runs recorded.');
      return;
    }
    const idWidth = Math.max(...rows.map((r) => r.taskId.length), 6) + 2;
    for (const r of rows) {
      const duration = r.durationMs !== null ? formatMs(r.durationMs) : theme.dim('unknown');
      const status = theme.status(r.status)(padRight(r.status, 17));
      this.writeln(`${INDENT}  ${padRight(r.taskId, idWidth)}${theme.dim(padRight(r.runId, 24))}${status}${theme.dim('duration=')}${duration}  ${theme.dim(`"${r.title}"`)}`);
    }
  }

  ledgerTimeline(taskId: string, runId: string, entries: LedgerEntry[]): void {
    this.writeln(`${INDENT}${theme.bold(`History: ${taskId}`)} ${theme.dim(runId)}`);
    this.writeln();
    if (entries.length === 0) {
      this.dim('No ledger entries found.');
      return;
    }
    for (const e of entries) {
      const ts = e.timestamp.slice(11, 23);
      const detail = formatEventSummary(e.data);
      this.writeln(`${INDENT}  ${theme.dim(ts)}  ${e.type.padEnd(18)}${detail ? `  ${theme.dim(detail)}` : ''}`);
    }
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.cross} ${theme.error(theme.bold(title))}`);
    for (const line of details.split('\n')) this.writeln(`${INDENT}  ${line}`);
    if (tip) this.writeln(`${INDENT}  ${theme.dim(tip)}`);
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${theme.warning(message)}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  blank(): void {
    this.writeln();
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${theme.success(message)}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  sectionBanner(name: string): void {
    this.emit('section', { name });
  }

  contractSummary(info: ContractInfo): void {
    this.emit('contract', { ...info });
  }

  stateChange(state: ExecutorState): void {
    this.emit('state', { state });
  }

  stageStarted(info: { stage: number; parallelGroup: number | null; steps: number }): void {
    this.emit('stage_started', { stage: info.stage, parallel_group: info.parallelGroup, steps: info.steps });
  }

  stepResult(result: ExecutionResult): void {
    this.emit('step_result', { ...result });
  }

  executionSummary(outcome: ExecutionOutcome): void {
    const rec = outcome.record;
    this.emit('summary', {
      task_id: rec.task_id,
      run_id: rec.run_id,
      overall_status: rec.overall_status,
      error_kind: rec.error_kind,
      blocking: rec.blocking,
      steps: rec.results.length,
      failed: rec.results.filter((r) => !r.succeeded).length,
      skipped: rec.steps_skipped.length,
      record_path: outcome.recordPath,
      exit_code: outcome.exitCode
    });
  }

  record(record: ExecutionRecord): void {
    process.stdout.write(JSON.stringify(record) + '\n');
  }

  lockTable(rows: LockRow[]): void {
    this.emit('locks', { locks: rows });
  }

  cacheStats(stats: CacheStats): void {
    this.emit('cache_stats', { ...stats });
  }

  historyTable(rows: HistoryRow[]): void {
    this.emit('history', { runs: rows });
  }

  ledgerTimeline(taskId: string, runId: string, entries: LedgerEntry[]): void {
    this.emit('ledger', { task_id: taskId, run_id: runId, entries });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return {
      update: () => {},
      succeed: () => {},
      fail: () => {},
      warn: () => {},
      stop: () => {}
    };
  }

  blank(): void {
    /* no-op */
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }
}

function formatEventSummary(data: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const key of ['to', 'step_index', 'name', 'succeeded', 'error_kind', 'resource', 'resources', 'overall_status']) {
    const v = data[key];
    if (v === undefined || v === null) continue;
    parts.push(`${key}=${Array.isArray(v) ? v.join(',') : String(v)}`);
  }
  return parts.join('  ');
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) _instance = new InteractiveRenderer();
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
