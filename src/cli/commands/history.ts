import { resolve } from 'node:path';

import { EXIT_CODES } from '../../core/errors.js';
import { readRecord } from '../../core/evidence/collector.js';
import { LedgerReader } from '../../core/ledger/reader.js';
import { errorMessage } from '../../utils/fs.js';
import { listRunRecords, listTaskIds, resolveWorkspace, runPaths } from '../../workspace/layout.js';
import { getRenderer, type HistoryRow } from '../ui/renderer.js';
import type { CommandResult } from './result.js';

export interface HistoryCommandOptions {
  root?: string;
  detailTaskId?: string;
}

/**
 * `taskgate history` — one row per recorded run under `.taskgate/evidence/<task_id>/`.
 * Use `--detail TASK_ID` to print the ledger of that task's latest run as a timeline.
 */
export async function runHistoryCommand(opts: HistoryCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = resolveWorkspace(resolve(opts.root ?? process.cwd()));

  // ── Detail view for a specific task ─────────────────────────────────────
  if (opts.detailTaskId) {
    const taskId = opts.detailTaskId;
    const runs = await listRunRecords(ws, taskId);
    const latest = runs.at(-1);
    if (!latest) {
      r.error('No runs recorded', `task '${taskId}' has no execution records`);
      return { ok: false, exitCode: EXIT_CODES.parse, details: 'not found' };
    }

    const ledger = new LedgerReader(runPaths(ws, taskId, latest.runId, 'yaml').ledgerPath);
    const { entries, warnings } = await ledger.readAllSafe();
    const integrity = await ledger.verifyIntegrity();

    if (!integrity.ok) r.warn(`Ledger integrity: ${integrity.message ?? 'failed'}`);
    for (const w of warnings) r.warn(w);

    r.ledgerTimeline(taskId, latest.runId, entries);
    r.blank();
    return { ok: true, exitCode: EXIT_CODES.success, details: entries };
  }

  // ── Summary view of all runs ────────────────────────────────────────────
  const rows: HistoryRow[] = [];
  for (const taskId of await listTaskIds(ws)) {
    for (const run of await listRunRecords(ws, taskId)) {
      try {
        const rec = await readRecord(run.path);
        const started = Date.parse(rec.started_at);
        const ended = rec.finished_at ? Date.parse(rec.finished_at) : Number.NaN;
        rows.push({
          taskId: rec.task_id,
          runId: rec.run_id,
          state: rec.state,
          status: rec.overall_status,
          durationMs: Number.isFinite(started) && Number.isFinite(ended) ? Math.max(0, ended - started) : null,
          title: rec.title
        });
      } catch (err) {
        r.warn(`Skipping unreadable record ${run.path}: ${errorMessage(err)}`);
      }
    }
  }

  r.historyTable(rows);
  r.blank();
  if (rows.length > 0) r.dim('Run `taskgate history --detail <task-id>` for the latest run timeline.');
  return { ok: true, exitCode: EXIT_CODES.success, details: rows };
}
