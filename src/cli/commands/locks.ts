import { resolve } from 'node:path';

import { loadConfig } from '../../core/config.js';
import { createEngine } from '../../core/engine.js';
import { errorKindOf, exitCodeForKind, EXIT_CODES } from '../../core/errors.js';
import type { LockRecord } from '../../core/lock/types.js';
import { errorMessage } from '../../utils/fs.js';
import { normalizeProjectPath } from '../../workspace/protected-paths.js';
import { getRenderer, type LockRow } from '../ui/renderer.js';
import type { CommandResult } from './result.js';

export interface LocksCommandOptions {
  root?: string;
  /** Only show the lock on this project path. */
  resource?: string;
  env?: NodeJS.ProcessEnv;
}

/** `taskgate locks list [--resource <path>]` */
export async function runLocksListCommand(opts: LocksCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const root = resolve(opts.root ?? process.cwd());

  let resource: string | undefined;
  if (opts.resource !== undefined) {
    const normalized = normalizeProjectPath(root, opts.resource);
    if (!normalized.ok) {
      r.error('Invalid resource', normalized.reason);
      return { ok: false, exitCode: EXIT_CODES.parse, details: normalized.reason };
    }
    resource = normalized.path;
  }

  try {
    const engine = createEngine(await loadConfig({ root, env: opts.env }));
    const now = Date.now();
    const rows = (await engine.locks.list(resource)).map((rec) => toRow(rec, engine.locks.isStale(rec, now)));
    r.lockTable(rows);
    return { ok: true, exitCode: EXIT_CODES.success, details: rows };
  } catch (err) {
    r.error('Cannot read lock table', errorMessage(err));
    return { ok: false, exitCode: exitCodeForKind(errorKindOf(err)), details: errorMessage(err) };
  }
}

/** `taskgate locks prune` — drop every lock whose heartbeat is past the stale window. */
export async function runLocksPruneCommand(opts: Omit<LocksCommandOptions, 'resource'>): Promise<CommandResult> {
  const r = getRenderer();
  const root = resolve(opts.root ?? process.cwd());
  try {
    const engine = createEngine(await loadConfig({ root, env: opts.env }));
    const removed = await engine.locks.prune();
    if (removed.length === 0) r.dim('No stale locks.');
    for (const rec of removed) r.success(`Pruned ${rec.resource_path} (agent ${rec.owner_agent_id})`);
    return { ok: true, exitCode: EXIT_CODES.success, details: removed.map((rec) => toRow(rec, true)) };
  } catch (err) {
    r.error('Cannot prune locks', errorMessage(err));
    return { ok: false, exitCode: exitCodeForKind(errorKindOf(err)), details: errorMessage(err) };
  }
}

function toRow(rec: LockRecord, stale: boolean): LockRow {
  return {
    resource: rec.resource_path,
    agentId: rec.owner_agent_id,
    taskId: rec.task_id,
    acquiredAt: rec.acquired_at,
    heartbeatAt: rec.heartbeat_at,
    stale
  };
}
