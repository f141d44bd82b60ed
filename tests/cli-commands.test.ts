import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCacheClearCommand, runCacheStatsCommand } from '../src/cli/commands/cache.js';
import { runExecuteCommand } from '../src/cli/commands/execute.js';
import { runHistoryCommand } from '../src/cli/commands/history.js';
import { runLocksListCommand, runLocksPruneCommand } from '../src/cli/commands/locks.js';
import { runValidateCommand } from '../src/cli/commands/validate.js';
import { QuietRenderer, setRenderer } from '../src/cli/ui/renderer.js';
import { FileCacheStore } from '../src/core/cache/store.js';
import { VerificationCache } from '../src/core/cache/verification-cache.js';
import { LockCoordinator } from '../src/core/lock/coordinator.js';
import { FileLockStore } from '../src/core/lock/store.js';
import { fileExists } from '../src/utils/fs.js';
import { resolveWorkspace } from '../src/workspace/layout.js';

const env = { PATH: process.env.PATH ?? '' };

async function project(contracts: Record<string, string> = {}): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'taskgate-cli-'));
  for (const [name, text] of Object.entries(contracts)) {
    await writeFile(join(root, name), text, 'utf8');
  }
  return root;
}

const HAPPY = `id: greet
title: Greet
resources: [hello.txt]
steps:
  - kind: write_file
    payload: { path: hello.txt, content: "hi\\n" }
  - kind: exec
    payload: [cat, hello.txt]
`;

describe('cli commands', () => {
  let stdout: MockInstance;

  beforeEach(() => {
    setRenderer(new QuietRenderer());
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('executes a contract and lists it in history', async () => {
    const root = await project({ 'greet.yaml': HAPPY });
    const res = await runExecuteCommand({ contractPath: join(root, 'greet.yaml'), root, agentId: 'agent-1', env });

    expect(res.exitCode).toBe(0);
    expect(res.ok).toBe(true);
    expect(await fileExists(join(root, 'hello.txt'))).toBe(true);

    const history = await runHistoryCommand({ root });
    expect(history.details).toEqual([
      expect.objectContaining({ taskId: 'greet', state: 'Completed', status: 'success', title: 'Greet' })
    ]);

    const detail = await runHistoryCommand({ root, detailTaskId: 'greet' });
    expect(detail.exitCode).toBe(0);
    expect(Array.isArray(detail.details) && detail.details.length > 0).toBe(true);

    const unknown = await runHistoryCommand({ root, detailTaskId: 'nope' });
    expect(unknown.exitCode).toBe(1);
  });

  it('exits 1 on an invalid contract', async () => {
    const root = await project({ 'bad.yaml': 'id: bad\ntitle: Bad\nsteps: []\n' });
    const res = await runExecuteCommand({ contractPath: join(root, 'bad.yaml'), root, env });
    expect(res.exitCode).toBe(1);
    expect(res.details).toBe('steps: Array must contain at least 1 element(s)');
  });

  it('prints the plan to stdout and writes nothing', async () => {
    const root = await project({ 'greet.json': JSON.stringify({ id: 'greet', title: 'Greet', resources: ['hello.txt'], steps: [{ kind: 'exec', payload: ['echo', 'hi'] }] }) });
    const res = await runExecuteCommand({ contractPath: join(root, 'greet.json'), root, plan: true, env });

    expect(res.exitCode).toBe(0);
    const line = stdout.mock.calls.map((call) => String(call[0])).find((text) => text.includes('"mode":"plan"'));
    const printed: unknown = JSON.parse(line ?? 'null');
    expect(printed).toMatchObject({ task_id: 'greet', mode: 'plan', locks_acquired: ['hello.txt'] });
    expect(await fileExists(resolveWorkspace(root).dataDir)).toBe(false);
  });

  it('applies --timeout as the default step limit', async () => {
    const root = await project({
      'slow.yaml': 'id: slow\ntitle: Slow\nsteps:\n  - kind: internal\n    payload: { op: sleep, ms: 5000 }\n'
    });
    const res = await runExecuteCommand({ contractPath: join(root, 'slow.yaml'), root, timeoutSeconds: 0.05, env });
    expect(res.exitCode).toBe(4);
  });

  it('validates a batch of contracts', async () => {
    const root = await project({
      'a.yaml': HAPPY,
      'b.yaml': HAPPY,
      'evil.yaml': 'id: evil\ntitle: Evil\nsteps:\n  - kind: exec\n    payload: [python3, -c, "print(1)"]\n'
    });

    expect((await runValidateCommand({ contractPaths: [join(root, 'a.yaml')], root, env })).exitCode).toBe(0);
    const dup = await runValidateCommand({ contractPaths: [join(root, 'a.yaml'), join(root, 'b.yaml')], root, env });
    expect(dup.exitCode).toBe(1);
    expect(dup.details).toBe(`duplicate contract id 'greet' (also declared in ${join(root, 'a.yaml')})`);
    expect((await runValidateCommand({ contractPaths: [join(root, 'evil.yaml')], root, env })).exitCode).toBe(2);
  });

  it('lists and prunes locks', async () => {
    const root = await project();
    const store = new FileLockStore(resolveWorkspace(root).locksPath);
    await new LockCoordinator({ store, staleAfterMs: 300_000 }).acquire(['src/a.ts'], 'agent-live', 'live');
    await new LockCoordinator({ store, staleAfterMs: 300_000, now: () => Date.now() - 600_000 }).acquire(['src/b.ts'], 'agent-gone', 'gone');

    const all = await runLocksListCommand({ root, env: {} });
    expect(all.details).toEqual([
      expect.objectContaining({ resource: 'src/a.ts', agentId: 'agent-live', stale: false }),
      expect.objectContaining({ resource: 'src/b.ts', agentId: 'agent-gone', stale: true })
    ]);

    const one = await runLocksListCommand({ root, resource: './src/a.ts', env: {} });
    expect(one.details).toEqual([expect.objectContaining({ resource: 'src/a.ts' })]);

    expect((await runLocksListCommand({ root, resource: '../x', env: {} })).exitCode).toBe(1);

    const pruned = await runLocksPruneCommand({ root, env: {} });
    expect(pruned.details).toEqual([expect.objectContaining({ resource: 'src/b.ts' })]);
    expect((await runLocksListCommand({ root, env: {} })).details).toEqual([expect.objectContaining({ resource: 'src/a.ts' })]);
  });

  it('clears the verification cache', async () => {
    const root = await project();
    const cache = new VerificationCache({ store: new FileCacheStore(resolveWorkspace(root).cachePath), ttlSeconds: 300, maxEntries: 10 });
    await cache.put('h1', 'lint', 'ok');
    await cache.put('h2', 'lint', 'ok');

    const stats = await runCacheStatsCommand({ root, env: {} });
    expect(stats.details).toMatchObject({ entries: 2, expired: 0 });

    const res = await runCacheClearCommand({ root, env: {} });
    expect(res).toEqual({ ok: true, exitCode: 0, details: { removed: 2 } });
  });
});
