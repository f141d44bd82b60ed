import type { z } from 'zod';

import { isMissingFile, readText, writeJsonAtomic } from '../utils/fs.js';
import { withFileMutex } from '../utils/file-mutex.js';
import { TaskgateError } from './errors.js';

export interface StateFileOptions {
  /** Age after which `<path>.lock` is treated as abandoned by a crashed process. */
  mutexStaleMs: number;
}

/**
 * A JSON document shared between processes. Updates hold `<path>.lock` (O_EXCL) for the
 * whole read-modify-write and replace the document by rename, so readers never see a
 * torn file and concurrent writers never lose each other's changes.
 */
export class JsonStateFile<T> {
  readonly mutexPath: string;

  constructor(
    readonly path: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly empty: () => T,
    private readonly opts: StateFileOptions = { mutexStaleMs: 10_000 }
  ) {
    this.mutexPath = `${path}.lock`;
  }

  async read(): Promise<T> {
    let raw: string;
    try {
      raw = await readText(this.path);
    } catch (err) {
      if (isMissingFile(err)) return this.empty();
      throw err;
    }
    if (raw.trim() === '') return this.empty();

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (err) {
      throw new TaskgateError('InternalError', `${this.path} is not valid JSON`, err);
    }
    const parsed = this.schema.safeParse(doc);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown issue';
      throw new TaskgateError('InternalError', `${this.path} is malformed (${where})`);
    }
    return parsed.data;
  }

  /** `mutate` may change the state in place; it is written back only if it changed. */
  async update<R>(mutate: (state: T) => R): Promise<R> {
    return await withFileMutex(this.mutexPath, { staleMs: this.opts.mutexStaleMs }, async () => {
      const state = await this.read();
      const before = JSON.stringify(state);
      const result = mutate(state);
      if (JSON.stringify(state) !== before) {
        await writeJsonAtomic(this.path, state);
      }
      return result;
    });
  }

  /**
   * Overwrite the document with `next` whether or not the current one parses.
   * Returns the previous state, or `null` when it was unreadable.
   */
  async replace(next: T): Promise<T | null> {
    return await withFileMutex(this.mutexPath, { staleMs: this.opts.mutexStaleMs }, async () => {
      let previous: T | null;
      try {
        previous = await this.read();
      } catch (err) {
        if (!(err instanceof TaskgateError)) throw err;
        previous = null;
      }
      await writeJsonAtomic(this.path, next);
      return previous;
    });
  }
}
