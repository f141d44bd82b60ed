import { performance } from 'node:perf_hooks';

import { silentLogger, type Logger } from '../../utils/logger.js';

export interface WorkUnit<T> {
  id: string;
  /** Hard limit; the unit's signal is aborted when it passes. `0` disables the limit. */
  timeoutMs: number;
  run(signal: AbortSignal): Promise<T>;
}

export type UnitOutcome<T> =
  | { id: string; status: 'fulfilled'; value: T; durationMs: number }
  | { id: string; status: 'timeout'; timeoutMs: number; durationMs: number }
  | { id: string; status: 'rejected'; error: unknown; durationMs: number };

export class UnitTimeoutError extends Error {
  constructor(
    readonly unitId: string,
    readonly timeoutMs: number
  ) {
    super(`Unit ${unitId} exceeded ${timeoutMs}ms`);
    this.name = 'UnitTimeoutError';
  }
}

export interface WorkerPoolOptions {
  size: number;
  logger?: Logger;
}

// setTimeout overflows past this and fires immediately.
const MAX_TIMER_MS = 2_147_483_647;

export interface RunningUnit<T> {
  /** Settles at completion or at the deadline, whichever comes first. */
  outcome: Promise<UnitOutcome<T>>;
  /** Settles once the unit's own promise has settled, even after a timeout. */
  done: Promise<void>;
}

/** Start `unit` with its hard timeout. Neither promise ever rejects. */
export function startUnit<T>(unit: WorkUnit<T>, log: Logger = silentLogger()): RunningUnit<T> {
  const started = performance.now();
  const elapsed = () => Math.round(performance.now() - started);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  // Armed before the work starts, so a unit that throws synchronously still clears it.
  const deadline =
    unit.timeoutMs > 0 && unit.timeoutMs <= MAX_TIMER_MS
      ? new Promise<UnitOutcome<T>>((resolve) => {
          timer = setTimeout(() => {
            log.debug(`unit ${unit.id} timed out`, { timeoutMs: unit.timeoutMs });
            controller.abort(new UnitTimeoutError(unit.id, unit.timeoutMs));
            resolve({ id: unit.id, status: 'timeout', timeoutMs: unit.timeoutMs, durationMs: elapsed() });
          }, unit.timeoutMs);
        })
      : null;

  const work = (async (): Promise<UnitOutcome<T>> => {
    try {
      const value = await unit.run(controller.signal);
      return { id: unit.id, status: 'fulfilled', value, durationMs: elapsed() };
    } catch (error) {
      return { id: unit.id, status: 'rejected', error, durationMs: elapsed() };
    } finally {
      clearTimeout(timer);
    }
  })();

  return { outcome: deadline ? Promise.race([work, deadline]) : work, done: work.then(() => undefined) };
}

/**
 * Fixed number of concurrent units; the rest wait in FIFO order. Outcomes never reject, so
 * one unit failing or timing out has no effect on its siblings.
 *
 * A timed-out unit reports `timeout` at its deadline but keeps its slot until its promise
 * settles, so aborted work that is still shutting down counts against the bound.
 */
export class WorkerPool {
  readonly size: number;
  private active = 0;
  private readonly queue: Array<() => void> = [];
  private readonly log: Logger;

  constructor(opts: WorkerPoolOptions) {
    if (!Number.isInteger(opts.size) || opts.size < 1) {
      throw new RangeError(`worker pool size must be a positive integer, got ${opts.size}`);
    }
    this.size = opts.size;
    this.log = (opts.logger ?? silentLogger()).child('pool');
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.queue.length;
  }

  submit<T>(unit: WorkUnit<T>): Promise<UnitOutcome<T>> {
    return new Promise((resolve) => {
      this.queue.push(() => {
        const running = startUnit(unit, this.log);
        resolve(running.outcome);
        void running.done.then(() => {
          this.active -= 1;
          this.pump();
        });
      });
      this.pump();
    });
  }

  /** Submit every unit and wait for all of them; outcomes are in input order. */
  async runGroup<T>(units: readonly WorkUnit<T>[]): Promise<UnitOutcome<T>[]> {
    return await Promise.all(units.map((u) => this.submit(u)));
  }

  private pump(): void {
    while (this.active < this.size) {
      const next = this.queue.shift();
      if (!next) return;
      this.active += 1;
      next();
    }
  }
}
