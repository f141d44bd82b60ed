import { describe, expect, it, vi } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';

import { startUnit, WorkerPool, type WorkUnit } from '../src/core/pool/worker-pool.js';

function sleepUnit(id: string, ms: number, log: string[] = []): WorkUnit<string> {
  return {
    id,
    timeoutMs: 0,
    run: async () => {
      log.push(`start:${id}`);
      await delay(ms);
      log.push(`end:${id}`);
      return id;
    }
  };
}

describe('worker pool', () => {
  it('never runs more units than its size', async () => {
    const pool = new WorkerPool({ size: 2 });
    let active = 0;
    let peak = 0;
    const units: WorkUnit<number>[] = [0, 1, 2, 3, 4].map((i) => ({
      id: `u${i}`,
      timeoutMs: 0,
      run: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(15);
        active -= 1;
        return i;
      }
    }));

    const outcomes = await pool.runGroup(units);
    expect(peak).toBe(2);
    expect(outcomes.map((o) => (o.status === 'fulfilled' ? o.value : -1))).toEqual([0, 1, 2, 3, 4]);
    expect(pool.running).toBe(0);
    expect(pool.queued).toBe(0);
  });

  it('starts queued units in submission order', async () => {
    const pool = new WorkerPool({ size: 1 });
    const log: string[] = [];
    await pool.runGroup([sleepUnit('a', 5, log), sleepUnit('b', 1, log), sleepUnit('c', 1, log)]);
    expect(log).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  });

  it('times a unit out without affecting its siblings', async () => {
    const pool = new WorkerPool({ size: 2 });
    let aborted = false;
    const slow: WorkUnit<string> = {
      id: 'slow',
      timeoutMs: 20,
      run: async (signal) => {
        await delay(5_000, undefined, { signal }).catch((err: unknown) => {
          aborted = true;
          throw err;
        });
        return 'slow';
      }
    };

    const [a, b] = await pool.runGroup([slow, sleepUnit('fast', 5)]);
    expect(a.status).toBe('timeout');
    if (a.status === 'timeout') expect(a.timeoutMs).toBe(20);
    expect(b).toMatchObject({ id: 'fast', status: 'fulfilled', value: 'fast' });
    expect(aborted).toBe(true);
  });

  it('reports a thrown error as rejected', async () => {
    const pool = new WorkerPool({ size: 2 });
    const failing: WorkUnit<string> = {
      id: 'boom',
      timeoutMs: 0,
      run: async () => {
        throw new Error('boom');
      }
    };
    const [a, b] = await pool.runGroup([failing, sleepUnit('ok', 1)]);
    expect(a.status).toBe('rejected');
    if (a.status === 'rejected') expect(a.error).toBeInstanceOf(Error);
    expect(b.status).toBe('fulfilled');
  });

  it('holds a timed-out unit\'s slot until its work settles', async () => {
    const pool = new WorkerPool({ size: 1 });
    const log: string[] = [];
    const stubborn: WorkUnit<string> = {
      id: 'stubborn',
      timeoutMs: 10,
      // Ignores its signal.
      run: async () => {
        await delay(60);
        log.push('end:stubborn');
        return 'stubborn';
      }
    };

    const first = pool.submit(stubborn);
    const second = pool.submit(sleepUnit('next', 1, log));

    expect((await first).status).toBe('timeout');
    expect(log).toEqual([]);
    await second;
    expect(log).toEqual(['end:stubborn', 'start:next', 'end:next']);
  });

  it('runs a single unit directly with the same deadline', async () => {
    const running = startUnit({
      id: 'solo',
      timeoutMs: 10,
      run: async (signal) => {
        await delay(1_000, undefined, { signal });
        return 1;
      }
    });
    expect((await running.outcome).status).toBe('timeout');
    await running.done;
  });

  it('clears the deadline of a unit that throws before its first await', async () => {
    vi.useFakeTimers();
    try {
      const running = startUnit<number>({
        id: 'eager',
        timeoutMs: 60_000,
        run: () => {
          throw new Error('bad input');
        }
      });
      const outcome = await running.outcome;
      expect(outcome.status).toBe('rejected');
      if (outcome.status === 'rejected') expect(outcome.error).toEqual(new Error('bad input'));
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('rejects a non-positive size', () => {
    expect(() => new WorkerPool({ size: 0 })).toThrow(RangeError);
  });
});
