import { hostname } from 'node:os';

import type { Logger } from '../utils/logger.js';
import { resolveWorkspace } from '../workspace/layout.js';
import { FileCacheStore } from './cache/store.js';
import { VerificationCache } from './cache/verification-cache.js';
import type { EngineConfig } from './config.js';
import { TaskExecutor, type ExecutorEvent } from './executor/task-executor.js';
import { LockCoordinator } from './lock/coordinator.js';
import { FileLockStore } from './lock/store.js';
import { WorkerPool } from './pool/worker-pool.js';
import { SecurityGate } from './security/gate.js';

export interface Engine {
  config: EngineConfig;
  gate: SecurityGate;
  locks: LockCoordinator;
  cache: VerificationCache;
  pool: WorkerPool;
  executor: TaskExecutor;
}

export interface EngineOptions {
  agentId?: string;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  onEvent?: (event: ExecutorEvent) => void;
}

export function defaultAgentId(): string {
  return `${hostname()}-${process.pid}`;
}

/** Wire the file-backed stores under `<root>/.taskgate/state` into a ready executor. */
export function createEngine(config: EngineConfig, opts: EngineOptions = {}): Engine {
  const ws = resolveWorkspace(config.root);
  const stateOpts = { mutexStaleMs: config.mutexStaleMs };

  const gate = new SecurityGate(config.security);
  const locks = new LockCoordinator({
    store: new FileLockStore(ws.locksPath, stateOpts),
    staleAfterMs: config.lockStaleMs,
    pollMs: config.lockPollMs,
    logger: opts.logger
  });
  const cache = new VerificationCache({
    store: new FileCacheStore(ws.cachePath, stateOpts),
    ttlSeconds: config.cacheTtlSeconds,
    maxEntries: config.cacheMaxEntries
  });
  const pool = new WorkerPool({ size: config.workers, logger: opts.logger });

  const executor = new TaskExecutor({
    root: ws.root,
    agentId: opts.agentId ?? defaultAgentId(),
    gate,
    locks,
    cache,
    pool,
    stepTimeoutMs: config.stepTimeoutMs,
    lockWaitMs: config.lockWaitMs,
    heartbeatMs: config.heartbeatMs,
    env: opts.env,
    logger: opts.logger,
    onEvent: opts.onEvent
  });

  return { config, gate, locks, cache, pool, executor };
}
