import { describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FileCacheStore } from '../src/core/cache/store.js';
import { VerificationCache } from '../src/core/cache/verification-cache.js';
import { parseContractDocument } from '../src/core/contract/reader.js';
import type { TaskContract } from '../src/core/contract/types.js';
import { readRecord } from '../src/core/evidence/collector.js';
import { groupSteps, TaskExecutor, type ExecutorEvent } from '../src/core/executor/task-executor.js';
import { LedgerReader } from '../src/core/ledger/reader.js';
import { LockCoordinator } from '../src/core/lock/coordinator.js';
import { FileLockStore } from '../src/core/lock/store.js';
import { WorkerPool } from '../src/core/pool/worker-pool.js';
import { SecurityGate } from '../src/core/security/gate.js';
import { DEFAULT_POLICY } from '../src/core/security/policy.js';
import { fileExists } from '../src/utils/fs.js';
import { sha256 } from '../src/utils/hash.js';
import { resolveWorkspace, runPaths } from '../src/workspace/layout.js';

async function harness() {
  const root = await mkdtemp(join(tmpdir(), 'taskgate-exec-'));
  const ws = resolveWorkspace(root);
  const locks = new LockCoordinator({ store: new FileLockStore(ws.locksPath), staleAfterMs: 60_000, pollMs: 10 });
  const cache = new VerificationCache({ store: new FileCacheStore(ws.cachePath), ttlSeconds: 300, maxEntries: 100 });
  const events: ExecutorEvent[] = [];

  const executor = (env: NodeJS.ProcessEnv = { PATH: process.env.PATH ?? '' }, gate: SecurityGate = new SecurityGate()) =>
    new TaskExecutor({
      root: ws.root,
      agentId: 'agent-1',
      gate,
      locks,
      cache,
      pool: new WorkerPool({ size: 4 }),
      stepTimeoutMs: 10_000,
      lockWaitMs: 0,
      heartbeatMs: 1_000,
      env,
      onEvent: (e) => events.push(e)
    });

  const contract = (doc: Record<string, unknown>): TaskContract => {
    const res = parseContractDocument(doc, { root: ws.root });
    if (!res.ok) throw new Error(res.error.reason);
    return res.contract;
  };

  return { root: ws.root, ws, locks, cache, events, executor, contract };
}

describe('task executor', () => {
  it('runs every step, records evidence and releases its locks', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'happy',
      title: 'Happy path',
      resources: ['a.txt'],
      steps: [
        { kind: 'write_file', payload: { path: 'a.txt', content: 'hello\n' } },
        { kind: 'internal', payload: { op: 'assert_contains', path: 'a.txt', text: 'hello' } },
        { kind: 'exec', payload: ['echo', 'done'] }
      ]
    });

    const outcome = await h.executor().execute(c);
    const rec = outcome.record;

    expect(outcome.exitCode).toBe(0);
    expect(rec.overall_status).toBe('success');
    expect(rec.state_history.map((s) => s.state)).toEqual(['Parsed', 'Locking', 'Executing', 'Finalizing', 'Completed']);
    expect(rec.results.map((r) => r.output_summary)).toEqual(['wrote 6 bytes to a.txt', "a.txt contains 'hello'", 'done']);
    expect(rec.results[2].exit_code).toBe(0);
    expect(rec.locks_acquired).toEqual(['a.txt']);
    expect(rec.locks_released_cleanly).toBe(true);
    expect(rec.resource_hashes).toEqual({ 'a.txt': sha256('hello\n') });
    expect(await h.locks.list()).toEqual([]);

    expect(outcome.recordPath).toBe(join(h.ws.evidenceDir, 'happy', `${rec.run_id}.yaml`));
    expect(await readRecord(outcome.recordPath ?? '')).toEqual(rec);

    const paths = runPaths(h.ws, 'happy', rec.run_id, 'yaml');
    expect(await readFile(join(paths.commandsDir, '2-exec-2-1.stdout'), 'utf8')).toBe('done');

    const ledger = new LedgerReader(paths.ledgerPath);
    expect(await ledger.verifyIntegrity()).toEqual({ ok: true });
    const entries = await ledger.readAll();
    expect(entries[0].type).toBe('run_started');
    expect(entries[entries.length - 1].type).toBe('run_completed');

    expect(h.events.filter((e) => e.type === 'step_finished')).toHaveLength(3);
  });

  it('writes the record as JSON when asked', async () => {
    const h = await harness();
    const c = h.contract({ id: 'as-json', title: 'JSON', steps: [{ kind: 'internal', payload: { op: 'noop' } }] });
    const outcome = await h.executor().execute(c, { format: 'json' });
    expect(outcome.recordPath).toBe(join(h.ws.evidenceDir, 'as-json', `${outcome.record.run_id}.json`));
    const parsed: unknown = JSON.parse(await readFile(outcome.recordPath ?? '', 'utf8'));
    expect(parsed).toMatchObject({ task_id: 'as-json', overall_status: 'success' });
  });

  it('rejects a contract with a denied command before taking any lock', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'denied',
      title: 'Denied',
      resources: ['a.txt'],
      steps: [
        { kind: 'write_file', payload: { path: 'a.txt', content: 'x' } },
        { kind: 'exec', payload: ['node', '-e', '1'] }
      ]
    });

    const outcome = await h.executor().execute(c);
    const rec = outcome.record;

    expect(outcome.exitCode).toBe(2);
    expect(rec.error_kind).toBe('SecurityViolation');
    expect(rec.error_message).toBe(String.raw`matched deny pattern: \bnode\s+(-e|--eval|-p|--print)\b`);
    expect(rec.overall_status).toBe('fatal_failure');
    expect(rec.state_history.map((s) => s.state)).toEqual(['Parsed', 'Failed']);
    expect(rec.results).toEqual([]);
    expect(rec.steps_skipped).toEqual([0, 1]);
    expect(rec.locks_acquired).toEqual([]);
    expect(outcome.recordPath).not.toBeNull();
    expect(await fileExists(join(h.root, 'a.txt'))).toBe(false);
  });

  it('refuses to start while a port that must be free is taken', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'ports',
      title: 'Ports',
      resources: ['a.txt'],
      ports_should_be_free: [4321, 4000],
      steps: [{ kind: 'write_file', payload: { path: 'a.txt', content: 'x' } }]
    });
    const gate = new SecurityGate(DEFAULT_POLICY, async (port) => port === 4321);

    const outcome = await h.executor(undefined, gate).execute(c);
    const rec = outcome.record;

    expect(outcome.exitCode).toBe(2);
    expect(rec.error_kind).toBe('SecurityViolation');
    expect(rec.error_message).toBe('port already in use: 4321');
    expect(rec.state_history.map((s) => s.state)).toEqual(['Parsed', 'Failed']);
    expect(rec.locks_acquired).toEqual([]);
    expect(await h.locks.list()).toEqual([]);
    expect(await fileExists(join(h.root, 'a.txt'))).toBe(false);
  });

  it('hashes the files matched by the evidence patterns', async () => {
    const h = await harness();
    await mkdir(join(h.root, 'reports'), { recursive: true });
    await writeFile(join(h.root, 'reports', 'unit.log'), 'all green', 'utf8');
    await writeFile(join(h.root, 'reports', 'notes.md'), 'not evidence', 'utf8');
    const c = h.contract({
      id: 'evidence',
      title: 'Evidence',
      resources: ['out.txt'],
      evidence: ['reports/*.log', './out.txt', 'missing/*.txt'],
      steps: [{ kind: 'write_file', payload: { path: 'out.txt', content: 'done\n' } }]
    });

    const outcome = await h.executor().execute(c);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.record.evidence_hashes).toEqual({ 'out.txt': sha256('done\n'), 'reports/unit.log': sha256('all green') });
    const written = await readRecord(outcome.recordPath ?? '');
    expect(written.evidence_hashes).toEqual(outcome.record.evidence_hashes);
  });

  it('rejects a contract whose required secret is missing', async () => {
    const h = await harness();
    const c = h.contract({ id: 'secret', title: 'Secret', secrets_required: ['API_TOKEN'], steps: [{ kind: 'internal', payload: { op: 'noop' } }] });

    const missing = await h.executor({ PATH: process.env.PATH ?? '' }).execute(c);
    expect(missing.exitCode).toBe(2);
    expect(missing.record.error_message).toBe('missing required secret: API_TOKEN');

    const present = await h.executor({ PATH: process.env.PATH ?? '', API_TOKEN: 'test-token' }).execute(c);
    expect(present.exitCode).toBe(0);
  });

  it('fails on a held resource and names the blocker', async () => {
    const h = await harness();
    await h.locks.acquire(['a.txt'], 'agent-2', 'other-task');
    const c = h.contract({
      id: 'blocked',
      title: 'Blocked',
      resources: ['a.txt'],
      steps: [{ kind: 'write_file', payload: { path: 'a.txt', content: 'x' } }]
    });

    const outcome = await h.executor().execute(c);
    const rec = outcome.record;

    expect(outcome.exitCode).toBe(3);
    expect(rec.error_kind).toBe('LockConflict');
    expect(rec.error_message).toBe("Resource 'a.txt' is held by agent 'agent-2' (task other-task)");
    expect(rec.blocking).toEqual({ agent_id: 'agent-2', resource: 'a.txt', task_id: 'other-task' });
    expect(rec.state_history.map((s) => s.state)).toEqual(['Parsed', 'Locking', 'Failed']);
    expect(rec.steps_skipped).toEqual([0]);
    expect((await h.locks.list('a.txt'))[0].owner_agent_id).toBe('agent-2');
    expect(await fileExists(join(h.root, 'a.txt'))).toBe(false);
  });

  it('reclaims a stale lock and notes it', async () => {
    const h = await harness();
    const past = new LockCoordinator({ store: new FileLockStore(h.ws.locksPath), staleAfterMs: 60_000, now: () => Date.now() - 120_000 });
    await past.acquire(['a.txt'], 'agent-old', 'old-task');

    const c = h.contract({ id: 'reclaim', title: 'Reclaim', resources: ['a.txt'], steps: [{ kind: 'internal', payload: { op: 'noop' } }] });
    const outcome = await h.executor().execute(c);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.record.warnings).toHaveLength(1);
    expect(outcome.record.warnings[0]).toMatch(/^reclaimed stale lock on a\.txt from agent 'agent-old' \(task old-task, last heartbeat /);
  });

  it('serves a cacheable check from the cache until its target changes', async () => {
    const h = await harness();
    await writeFile(join(h.root, 'a.txt'), 'v1', 'utf8');
    const c = h.contract({
      id: 'cached',
      title: 'Cached check',
      resources: ['a.txt'],
      steps: [{ kind: 'exec', payload: ['echo', 'checked'], cacheable: true, target: 'a.txt' }]
    });

    const first = await h.executor().execute(c);
    expect(first.record.results[0]).toMatchObject({ succeeded: true, from_cache: false, output_summary: 'checked' });

    const second = await h.executor().execute(c);
    expect(second.exitCode).toBe(0);
    expect(second.record.results[0]).toMatchObject({ succeeded: true, from_cache: true, output_summary: 'checked', exit_code: 0 });
    // No child process and no cache write on a hit.
    expect(second.record.results[0].duration_ms).toBeLessThan(first.record.results[0].duration_ms);

    await writeFile(join(h.root, 'a.txt'), 'v2', 'utf8');
    const third = await h.executor().execute(c);
    expect(third.record.results[0].from_cache).toBe(false);
  });

  it('starts a parallel group only after every step of the previous one has finished', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'grouped',
      title: 'Grouped',
      steps: [
        { kind: 'internal', name: 'slow', payload: { op: 'sleep', ms: 40 }, parallel_group: 1 },
        { kind: 'internal', name: 'quick', payload: { op: 'sleep', ms: 10 }, parallel_group: 1 },
        { kind: 'internal', name: 'after', payload: { op: 'noop' }, parallel_group: 2 }
      ]
    });

    const outcome = await h.executor().execute(c);
    expect(outcome.exitCode).toBe(0);

    const results = outcome.record.results;
    const earlier = results.filter((r) => r.parallel_group === 1);
    const later = results.filter((r) => r.parallel_group === 2);
    expect(earlier.map((r) => r.name)).toEqual(['slow', 'quick']);
    expect(later.map((r) => r.name)).toEqual(['after']);
    for (const next of later) {
      for (const prev of earlier) {
        expect(Date.parse(next.started_at)).toBeGreaterThanOrEqual(Date.parse(prev.finished_at));
      }
    }
  });

  it('records a directory resource without a hash instead of failing the run', async () => {
    const h = await harness();
    await mkdir(join(h.root, 'src'), { recursive: true });
    await writeFile(join(h.root, 'src', 'a.txt'), 'x', 'utf8');
    const c = h.contract({
      id: 'dir-resource',
      title: 'Directory resource',
      resources: ['src'],
      steps: [{ kind: 'exec', payload: ['echo', 'hi'], cacheable: true, target: 'src' }]
    });

    const outcome = await h.executor().execute(c);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.recordPath).not.toBeNull();
    expect(outcome.record.results[0]).toMatchObject({ succeeded: true, from_cache: false, output_summary: 'hi' });
    expect(outcome.record.resource_hashes).toEqual({ src: null });
    expect(outcome.record.warnings).toHaveLength(1);
    expect(outcome.record.warnings[0]).toMatch(/^cannot hash src: EISDIR/);
    expect(await h.locks.list()).toEqual([]);
  });

  it('skips later groups after a failure and reports a partial failure', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'partial',
      title: 'Partial',
      steps: [
        { kind: 'internal', name: 'after', payload: { op: 'noop' }, parallel_group: 1 },
        { kind: 'exec', name: 'fails', payload: ['false'], parallel_group: 0 },
        { kind: 'internal', name: 'sibling', payload: { op: 'noop' }, parallel_group: 0 }
      ]
    });

    const outcome = await h.executor().execute(c);
    const rec = outcome.record;

    expect(outcome.exitCode).toBe(4);
    expect(rec.overall_status).toBe('partial_failure');
    expect(rec.error_kind).toBeNull();
    expect(rec.state).toBe('Failed');
    expect(rec.results.map((r) => [r.name, r.succeeded])).toEqual([
      ['fails', false],
      ['sibling', true]
    ]);
    expect(rec.results[0]).toMatchObject({ error_kind: 'ExecutionFailure', exit_code: 1, output_summary: 'false exited with code 1' });
    expect(rec.steps_skipped).toEqual([0]);
  });

  it('keeps going past a best-effort failure', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'best-effort',
      title: 'Best effort',
      steps: [
        { kind: 'exec', payload: ['false'], parallel_group: 0, best_effort: true },
        { kind: 'internal', payload: { op: 'noop' }, parallel_group: 1 }
      ]
    });

    const outcome = await h.executor().execute(c);
    expect(outcome.record.results.map((r) => r.succeeded)).toEqual([false, true]);
    expect(outcome.record.steps_skipped).toEqual([]);
    expect(outcome.record.overall_status).toBe('partial_failure');
    expect(outcome.exitCode).toBe(4);
  });

  it('times out a slow step and still releases locks', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'slow',
      title: 'Slow',
      resources: ['a.txt'],
      steps: [
        { kind: 'internal', payload: { op: 'sleep', ms: 5_000 }, timeout_seconds: 0.05 },
        { kind: 'internal', payload: { op: 'noop' } }
      ]
    });

    const outcome = await h.executor().execute(c);
    const [slow] = outcome.record.results;

    expect(outcome.exitCode).toBe(4);
    expect(slow).toMatchObject({ succeeded: false, error_kind: 'Timeout', output_summary: 'timed out after 50ms' });
    expect(outcome.record.steps_skipped).toEqual([1]);
    expect(await h.locks.list()).toEqual([]);
  });

  it('plans without executing or writing anything', async () => {
    const h = await harness();
    const c = h.contract({
      id: 'planned',
      title: 'Planned',
      resources: ['a.txt'],
      steps: [{ kind: 'write_file', payload: { path: 'a.txt', content: 'x' } }]
    });

    const outcome = await h.executor().plan(c);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.recordPath).toBeNull();
    expect(outcome.record.mode).toBe('plan');
    expect(outcome.record.locks_acquired).toEqual(['a.txt']);
    expect(outcome.record.stages).toEqual([
      { parallel_group: null, steps: [{ step_index: 0, name: 'write_file-0', kind: 'write_file', cacheable: false }] }
    ]);
    expect(await fileExists(h.ws.dataDir)).toBe(false);
    expect(await fileExists(join(h.root, 'a.txt'))).toBe(false);

    await h.locks.acquire(['a.txt'], 'agent-2', 'other-task');
    const blocked = await h.executor().plan(c);
    expect(blocked.exitCode).toBe(3);
    expect(blocked.record.blocking).toEqual({ agent_id: 'agent-2', resource: 'a.txt', task_id: 'other-task' });
  });

  it('orders stages by parallel group', () => {
    const res = parseContractDocument(
      {
        id: 'g',
        title: 'G',
        steps: [
          { kind: 'internal', payload: { op: 'noop' }, parallel_group: 2 },
          { kind: 'internal', payload: { op: 'noop' }, parallel_group: 0 },
          { kind: 'internal', payload: { op: 'noop' }, parallel_group: 2 }
        ]
      },
      { root: '/project' }
    );
    if (!res.ok) throw new Error(res.error.reason);
    expect(groupSteps(res.contract).map((stage) => stage.map((s) => s.index))).toEqual([[1], [0, 2]]);
  });
});
