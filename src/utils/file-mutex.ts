import { open, rm, stat, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ensureDir, errorCode, isMissingFile } from './fs.js';

export interface FileMutexOptions {
  /** A mutex file older than this is assumed abandoned by a crashed process. */
  staleMs: number;
  /** Give up after this long; defaults to three stale periods. */
  timeoutMs?: number;
  retryMs?: number;
}

export class FileMutexTimeout extends Error {
  constructor(readonly mutexPath: string) {
    super(`Timed out waiting for ${mutexPath}`);
    this.name = 'FileMutexTimeout';
  }
}

/**
 * Run `fn` while holding an exclusive `<path>` created with O_EXCL. Every process that
 * touches the guarded state goes through this, so read-modify-write cycles never interleave.
 */
export async function withFileMutex<T>(mutexPath: string, opts: FileMutexOptions, fn: () => Promise<T>): Promise<T> {
  const handle = await acquire(mutexPath, opts);
  try {
    return await fn();
  } finally {
    await handle.close();
    await rm(mutexPath, { force: true });
  }
}

async function acquire(mutexPath: string, opts: FileMutexOptions): Promise<FileHandle> {
  await ensureDir(dirname(mutexPath));
  const retryMs = opts.retryMs ?? 10;
  const deadline = Date.now() + (opts.timeoutMs ?? opts.staleMs * 3);

  for (;;) {
    try {
      const handle = await open(mutexPath, 'wx');
      try {
        await handle.writeFile(`${JSON.stringify({ pid: process.pid, acquired_at: new Date().toISOString() })}\n`, 'utf8');
      } catch (err) {
        await handle.close();
        await rm(mutexPath, { force: true });
        throw err;
      }
      return handle;
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err;
    }

    if (await reclaimIfStale(mutexPath, opts.staleMs)) continue;
    if (Date.now() >= deadline) throw new FileMutexTimeout(mutexPath);
    await sleep(retryMs + Math.floor(Math.random() * retryMs));
  }
}

/**
 * Remove an abandoned mutex. Waiters that found the same stale file race for a `.reclaim`
 * guard; only its holder removes, after checking the age again, so a mutex created by
 * another waiter in the meantime is left alone.
 */
async function reclaimIfStale(mutexPath: string, staleMs: number): Promise<boolean> {
  const age = await ageOf(mutexPath, staleMs);
  // Released between our open and stat; retry straight away.
  if (age !== 'stale') return age === 'missing';

  const guardPath = `${mutexPath}.reclaim`;
  let guard: FileHandle;
  try {
    guard = await open(guardPath, 'wx');
  } catch (err) {
    if (errorCode(err) !== 'EEXIST') throw err;
    // A reclaimer that crashed mid-way leaves its guard behind.
    if ((await ageOf(guardPath, staleMs)) === 'stale') await rm(guardPath, { force: true });
    return false;
  }

  try {
    if ((await ageOf(mutexPath, staleMs)) === 'stale') await rm(mutexPath, { force: true });
  } finally {
    await guard.close();
    await rm(guardPath, { force: true });
  }
  return true;
}

async function ageOf(path: string, staleMs: number): Promise<'missing' | 'live' | 'stale'> {
  try {
    const info = await stat(path);
    return Date.now() - info.mtimeMs > staleMs ? 'stale' : 'live';
  } catch (err) {
    if (isMissingFile(err)) return 'missing';
    throw err;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
