import { resolve } from 'node:path';

import { loadConfig } from '../../core/config.js';
import { createEngine } from '../../core/engine.js';
import { errorKindOf, exitCodeForKind, EXIT_CODES } from '../../core/errors.js';
import { errorMessage } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';
import type { CommandResult } from './result.js';

export interface CacheCommandOptions {
  root?: string;
  env?: NodeJS.ProcessEnv;
}

/** `taskgate cache clear` */
export async function runCacheClearCommand(opts: CacheCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const engine = createEngine(await loadConfig({ root: resolve(opts.root ?? process.cwd()), env: opts.env }));
    const removed = await engine.cache.clear();
    r.success(`Cleared ${removed} cache entr${removed === 1 ? 'y' : 'ies'}`);
    return { ok: true, exitCode: EXIT_CODES.success, details: { removed } };
  } catch (err) {
    r.error('Cannot clear verification cache', errorMessage(err));
    return { ok: false, exitCode: exitCodeForKind(errorKindOf(err)), details: errorMessage(err) };
  }
}

/** `taskgate cache stats` */
export async function runCacheStatsCommand(opts: CacheCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const engine = createEngine(await loadConfig({ root: resolve(opts.root ?? process.cwd()), env: opts.env }));
    const stats = await engine.cache.stats();
    r.cacheStats(stats);
    return { ok: true, exitCode: EXIT_CODES.success, details: stats };
  } catch (err) {
    r.error('Cannot read verification cache', errorMessage(err));
    return { ok: false, exitCode: exitCodeForKind(errorKindOf(err)), details: errorMessage(err) };
  }
}
