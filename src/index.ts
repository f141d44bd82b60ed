export { parseContract, parseContractDocument, parseBatch, readContractFile, planHash } from './core/contract/reader.js';
export type { ParseResult, BatchResult, ContractSource, LoadedContract } from './core/contract/reader.js';
export type { TaskContract, Step, StepKind, ExecStep, WriteFileStep, ReplaceStep, InternalStep } from './core/contract/types.js';

export { SecurityGate, type ValidationOutcome } from './core/security/gate.js';
export { buildPolicy, DEFAULT_POLICY, type SecurityPolicy, type SecurityPolicyConfig } from './core/security/policy.js';

export { LockCoordinator, type LockCoordinatorOptions, type Heartbeat } from './core/lock/coordinator.js';
export { FileLockStore, MemoryLockStore } from './core/lock/store.js';
export type { AcquireResult, ReleaseResult, LockRecord, LockStore } from './core/lock/types.js';

export { VerificationCache, hashFile, type VerificationCacheOptions } from './core/cache/verification-cache.js';
export { FileCacheStore } from './core/cache/store.js';
export type { CacheEntry, CacheStats, CacheStore } from './core/cache/types.js';

export { WorkerPool, startUnit, UnitTimeoutError, type WorkUnit, type UnitOutcome } from './core/pool/worker-pool.js';

export { TaskExecutor, groupSteps } from './core/executor/task-executor.js';
export type { TaskExecutorOptions, ExecutorEvent, ExecutionOutcome, RunOptions } from './core/executor/task-executor.js';
export type { ExecutionRecord, ExecutionResult, ExecutorState, OverallStatus } from './core/evidence/types.js';

export { createEngine, defaultAgentId, type Engine, type EngineOptions } from './core/engine.js';
export { loadConfig, DEFAULT_CONFIG, type EngineConfig, type ConfigOverrides } from './core/config.js';
export {
  TaskgateError,
  ParseError,
  SecurityViolation,
  LockConflict,
  ConfigError,
  EXIT_CODES,
  exitCodeForKind,
  type ErrorKind,
  type ExitCode
} from './core/errors.js';
export { Logger, createLogger, silentLogger } from './utils/logger.js';
