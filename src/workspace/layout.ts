import { mkdir, readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

export const DATA_DIR_NAME = '.taskgate';

export interface WorkspacePaths {
  root: string;
  dataDir: string;
  stateDir: string;
  configPath: string;
  locksPath: string;
  cachePath: string;
  evidenceDir: string;
}

export type RecordFormat = 'yaml' | 'json';

export interface RunPaths {
  taskId: string;
  runId: string;
  taskEvidenceDir: string;
  runDir: string;
  recordPath: string;
  ledgerPath: string;
  commandsDir: string;
}

export function resolveWorkspace(root: string): WorkspacePaths {
  const absRoot = resolve(root);
  const dataDir = join(absRoot, DATA_DIR_NAME);
  const stateDir = join(dataDir, 'state');
  return {
    root: absRoot,
    dataDir,
    stateDir,
    configPath: join(dataDir, 'config.yaml'),
    locksPath: join(stateDir, 'locks.json'),
    cachePath: join(stateDir, 'verification-cache.json'),
    evidenceDir: join(dataDir, 'evidence')
  };
}

/**
 * Evidence layout for one run:
 *
 *   .taskgate/evidence/<task_id>/<run_id>.yaml      execution record
 *   .taskgate/evidence/<task_id>/<run_id>/ledger.jsonl
 *   .taskgate/evidence/<task_id>/<run_id>/commands/
 */
export function runPaths(ws: WorkspacePaths, taskId: string, runId: string, format: RecordFormat): RunPaths {
  const taskEvidenceDir = join(ws.evidenceDir, taskId);
  const runDir = join(taskEvidenceDir, runId);
  return {
    taskId,
    runId,
    taskEvidenceDir,
    runDir,
    recordPath: join(taskEvidenceDir, `${runId}.${format}`),
    ledgerPath: join(runDir, 'ledger.jsonl'),
    commandsDir: join(runDir, 'commands')
  };
}

export async function initRun(paths: RunPaths): Promise<RunPaths> {
  await mkdir(paths.commandsDir, { recursive: true });
  return paths;
}

export async function listTaskIds(ws: WorkspacePaths): Promise<string[]> {
  return (await safeReaddir(ws.evidenceDir, true)).sort((a, b) => a.localeCompare(b));
}

/** Record files for a task, oldest first (run ids sort by start time). */
export async function listRunRecords(ws: WorkspacePaths, taskId: string): Promise<Array<{ runId: string; path: string }>> {
  const dir = join(ws.evidenceDir, taskId);
  const files = await safeReaddir(dir, false);
  return files
    .map((f) => /^(r-.+)\.(yaml|json)$/.exec(f))
    .filter((m): m is RegExpExecArray => m !== null)
    .map((m) => ({ runId: m[1], path: join(dir, m[0]) }))
    .sort((a, b) => a.runId.localeCompare(b.runId));
}

async function safeReaddir(dir: string, directories: boolean): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => (directories ? e.isDirectory() : e.isFile())).map((e) => e.name);
  } catch {
    return [];
  }
}
