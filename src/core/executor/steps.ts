import { setTimeout as delay } from 'node:timers/promises';
import { join } from 'node:path';
import { execa } from 'execa';

import { fileExists, isMissingFile, readText, writeTextAtomic } from '../../utils/fs.js';
import { sha256File } from '../../utils/hash.js';
import type { EvidenceCollector } from '../evidence/collector.js';
import type { ExecStep, InternalStep, ReplaceStep, Step, WriteFileStep } from '../contract/types.js';
import type { ErrorKind } from '../errors.js';

export interface StepContext {
  root: string;
  /** Already filtered by the security gate. */
  env: Record<string, string>;
  signal: AbortSignal;
  evidence?: EvidenceCollector;
  /** Grace period between SIGTERM and SIGKILL for aborted commands. */
  killGraceMs?: number;
}

export interface StepOutcome {
  succeeded: boolean;
  summary: string;
  errorKind: Extract<ErrorKind, 'ExecutionFailure' | 'Timeout'> | null;
  exitCode: number | null;
}

const SUMMARY_LIMIT = 500;

export async function runStep(step: Step, ctx: StepContext): Promise<StepOutcome> {
  switch (step.kind) {
    case 'exec':
      return await runExec(step, ctx);
    case 'write_file':
      return await runWriteFile(step, ctx);
    case 'replace':
      return await runReplace(step, ctx);
    case 'internal':
      return await runInternal(step, ctx);
  }
}

async function runExec(step: ExecStep, ctx: StepContext): Promise<StepOutcome> {
  const [file, ...args] = step.payload.argv;
  const started = Date.now();

  // Argument vector straight to the OS; no shell is ever involved.
  const res = await execa(file, args, {
    cwd: ctx.root,
    env: ctx.env,
    extendEnv: false,
    stdin: 'ignore',
    stdout: 'pipe',
    stderr: 'pipe',
    cancelSignal: ctx.signal,
    killSignal: 'SIGTERM',
    forceKillAfterDelay: ctx.killGraceMs ?? 2_000,
    reject: false
  });

  const exitCode = typeof res.exitCode === 'number' ? res.exitCode : null;
  const stdout = typeof res.stdout === 'string' ? res.stdout : '';
  const stderr = typeof res.stderr === 'string' ? res.stderr : '';
  const timedOut = res.isCanceled || ctx.signal.aborted;

  await ctx.evidence?.recordCommand(
    { index: step.index, name: step.name },
    { argv: step.payload.argv, stdout, stderr, exitCode, durationMs: Date.now() - started, timedOut }
  );

  if (timedOut) {
    return { succeeded: false, summary: `terminated: ${file} exceeded its time limit`, errorKind: 'Timeout', exitCode };
  }
  if (res.failed) {
    const detail = summarize(stderr) || summarize(stdout);
    const prefix = exitCode === null ? `${file} failed to start` : `${file} exited with code ${exitCode}`;
    return { succeeded: false, summary: detail ? `${prefix}: ${detail}` : prefix, errorKind: 'ExecutionFailure', exitCode };
  }
  return { succeeded: true, summary: summarize(stdout), errorKind: null, exitCode };
}

async function runWriteFile(step: WriteFileStep, ctx: StepContext): Promise<StepOutcome> {
  const { path, content } = step.payload;
  await writeTextAtomic(join(ctx.root, path), content);
  return ok(`wrote ${Buffer.byteLength(content, 'utf8')} bytes to ${path}`);
}

async function runReplace(step: ReplaceStep, ctx: StepContext): Promise<StepOutcome> {
  const { path, search, replace, all } = step.payload;
  const abs = join(ctx.root, path);

  let text: string;
  try {
    text = await readText(abs);
  } catch (err) {
    if (isMissingFile(err)) return fail(`${path} does not exist`);
    throw err;
  }

  const occurrences = text.split(search).length - 1;
  if (occurrences === 0) return fail(`'${search}' not found in ${path}`);

  let next: string;
  if (all) {
    next = text.split(search).join(replace);
  } else {
    const at = text.indexOf(search);
    next = text.slice(0, at) + replace + text.slice(at + search.length);
  }
  await writeTextAtomic(abs, next);
  const replaced = all ? occurrences : 1;
  return ok(`replaced ${replaced} occurrence${replaced === 1 ? '' : 's'} in ${path}`);
}

async function runInternal(step: InternalStep, ctx: StepContext): Promise<StepOutcome> {
  const op = step.payload;
  switch (op.op) {
    case 'noop':
      return ok('noop');
    case 'sleep':
      await delay(op.ms, undefined, { signal: ctx.signal });
      return ok(`slept ${op.ms}ms`);
    case 'checksum': {
      const digest = await sha256File(join(ctx.root, op.path));
      return digest === null ? fail(`${op.path} does not exist`) : ok(`sha256:${digest}`);
    }
    case 'assert_exists':
      return (await fileExists(join(ctx.root, op.path))) ? ok(`${op.path} exists`) : fail(`${op.path} does not exist`);
    case 'assert_contains': {
      let text: string;
      try {
        text = await readText(join(ctx.root, op.path));
      } catch (err) {
        if (isMissingFile(err)) return fail(`${op.path} does not exist`);
        throw err;
      }
      return text.includes(op.text) ? ok(`${op.path} contains '${op.text}'`) : fail(`${op.path} does not contain '${op.text}'`);
    }
  }
}

function ok(summary: string): StepOutcome {
  return { succeeded: true, summary, errorKind: null, exitCode: null };
}

function fail(summary: string): StepOutcome {
  return { succeeded: false, summary, errorKind: 'ExecutionFailure', exitCode: null };
}

/** Last `SUMMARY_LIMIT` characters of trimmed output. */
export function summarize(text: string): string {
  const trimmed = text.trim();
  return trimmed.length <= SUMMARY_LIMIT ? trimmed : `…${trimmed.slice(trimmed.length - SUMMARY_LIMIT)}`;
}
