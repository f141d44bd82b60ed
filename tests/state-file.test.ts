import { describe, expect, it } from 'vitest';
import { mkdtemp, readdir, readFile, utimes, writeFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';

import { TaskgateError } from '../src/core/errors.js';
import { JsonStateFile } from '../src/core/state-file.js';
import { FileMutexTimeout, withFileMutex } from '../src/utils/file-mutex.js';
import { fileExists } from '../src/utils/fs.js';

const Counter = z.object({ n: z.number().int() });
type Counter = z.infer<typeof Counter>;

async function counterFile() {
  const dir = await mkdtemp(join(tmpdir(), 'taskgate-state-'));
  const path = join(dir, 'counter.json');
  return { path, file: new JsonStateFile<Counter>(path, Counter, () => ({ n: 0 }), { mutexStaleMs: 1_000 }) };
}

describe('shared state file', () => {
  it('serializes concurrent read-modify-write cycles', async () => {
    const { path, file } = await counterFile();
    await Promise.all(
      Array.from({ length: 10 }, () =>
        file.update((s) => {
          s.n += 1;
        })
      )
    );
    expect(await file.read()).toEqual({ n: 10 });
    expect(await fileExists(`${path}.lock`)).toBe(false);
  });

  it('does not write when nothing changed', async () => {
    const { path, file } = await counterFile();
    expect(await file.update((s) => s.n)).toBe(0);
    expect(await fileExists(path)).toBe(false);
  });

  it('refuses a malformed document', async () => {
    const { path, file } = await counterFile();
    await writeFile(path, '{"n": "one"}', 'utf8');
    await expect(file.read()).rejects.toBeInstanceOf(TaskgateError);
    await writeFile(path, '{', 'utf8');
    await expect(file.read()).rejects.toThrow(`${path} is not valid JSON`);
  });

  it('reclaims a mutex abandoned by a crashed process', async () => {
    const { path, file } = await counterFile();
    const mutex = `${path}.lock`;
    await writeFile(mutex, '{"pid": 1}\n', 'utf8');
    const old = new Date(Date.now() - 60_000);
    await utimes(mutex, old, old);

    await file.update((s) => {
      s.n = 5;
    });
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({ n: 5 });
  });

  it('lets only one of several waiters take over the same abandoned mutex', async () => {
    const { path } = await counterFile();
    const mutex = `${path}.lock`;
    await writeFile(mutex, '{"pid": 1}\n', 'utf8');
    const old = new Date(Date.now() - 60_000);
    await utimes(mutex, old, old);

    let active = 0;
    let peak = 0;
    await Promise.all(
      Array.from({ length: 6 }, () =>
        withFileMutex(mutex, { staleMs: 1_000 }, async () => {
          active += 1;
          peak = Math.max(peak, active);
          await delay(5);
          active -= 1;
        })
      )
    );

    expect(peak).toBe(1);
    const left = await readdir(dirname(mutex));
    expect(left.filter((name) => name.endsWith('.reclaim'))).toEqual([]);
    expect(await fileExists(mutex)).toBe(false);
  });

  it('replaces a document that no longer parses', async () => {
    const { path, file } = await counterFile();
    await writeFile(path, '{"n": "one"}', 'utf8');

    expect(await file.replace({ n: 3 })).toBeNull();
    expect(await file.read()).toEqual({ n: 3 });
    expect(await file.replace({ n: 4 })).toEqual({ n: 3 });
    expect(await fileExists(`${path}.lock`)).toBe(false);
  });

  it('times out on a live mutex', async () => {
    const { path } = await counterFile();
    const mutex = `${path}.lock`;
    await writeFile(mutex, '{"pid": 1}\n', 'utf8');
    await expect(withFileMutex(mutex, { staleMs: 60_000, timeoutMs: 30 }, async () => 1)).rejects.toBeInstanceOf(FileMutexTimeout);
  });
});
