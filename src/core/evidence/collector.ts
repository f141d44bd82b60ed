import { writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import YAML from 'yaml';

import { ensureDir, readText, writeJson, writeTextAtomic } from '../../utils/fs.js';
import type { RecordFormat, RunPaths } from '../../workspace/layout.js';
import { CommandEvidenceMeta, ExecutionRecordSchema, type ExecutionRecord } from './types.js';

export interface CommandResult {
  argv: readonly string[];
  stdout: string;
  stderr: string;
  exitCode: number | null;
  durationMs: number;
  timedOut: boolean;
}

export interface StepRef {
  index: number;
  name: string;
}

/** Writes one run's evidence: command output files and the final execution record. */
export class EvidenceCollector {
  private seqByStep = new Map<number, number>();

  constructor(
    private paths: RunPaths,
    readonly format: RecordFormat
  ) {}

  get recordPath(): string {
    return this.paths.recordPath;
  }

  nextSeq(stepIndex: number): number {
    const next = (this.seqByStep.get(stepIndex) ?? 0) + 1;
    this.seqByStep.set(stepIndex, next);
    return next;
  }

  async recordCommand(step: StepRef, result: CommandResult): Promise<{ stdoutPath: string; stderrPath: string; metaPath: string }> {
    const seq = this.nextSeq(step.index);
    const base = join(this.paths.commandsDir, `${step.index}-${sanitize(step.name)}-${seq}`);
    const stdoutPath = `${base}.stdout`;
    const stderrPath = `${base}.stderr`;
    const metaPath = `${base}.meta.json`;

    await ensureDir(this.paths.commandsDir);
    await writeFile(stdoutPath, result.stdout, 'utf8');
    await writeFile(stderrPath, result.stderr, 'utf8');
    const meta: CommandEvidenceMeta = {
      step_index: step.index,
      step_name: step.name,
      seq,
      timestamp: new Date().toISOString(),
      argv: [...result.argv],
      exit_code: result.exitCode,
      duration_ms: result.durationMs,
      timed_out: result.timedOut,
      stdout_file: basename(stdoutPath),
      stderr_file: basename(stderrPath)
    };
    await writeJson(metaPath, meta);

    return { stdoutPath, stderrPath, metaPath };
  }

  /** The record is written atomically in the same format as the contract it came from. */
  async writeRecord(record: ExecutionRecord): Promise<string> {
    await writeTextAtomic(this.paths.recordPath, serializeRecord(record, this.format));
    return this.paths.recordPath;
  }
}

export function serializeRecord(record: ExecutionRecord, format: RecordFormat): string {
  return format === 'json' ? `${JSON.stringify(record, null, 2)}\n` : YAML.stringify(record);
}

/** Read a record written by {@link EvidenceCollector.writeRecord}; YAML also covers JSON. */
export async function readRecord(path: string): Promise<ExecutionRecord> {
  return ExecutionRecordSchema.parse(YAML.parse(await readText(path)));
}

function sanitize(s: string): string {
  return s.replaceAll(/[^a-zA-Z0-9._-]/g, '_');
}
