import YAML from 'yaml';
import { z } from 'zod';

import { isMissingFile, readText } from '../utils/fs.js';
import { resolveWorkspace } from '../workspace/layout.js';
import { ConfigError } from './errors.js';
import { buildPolicy, type SecurityPolicy } from './security/policy.js';

const RegexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'not a valid regular expression' }
);

const PositiveSeconds = z.number().finite().positive();
const WaitSeconds = z.number().finite().nonnegative();
const PositiveCount = z.number().int().positive();

export const ConfigFileSchema = z
  .object({
    locks: z
      .object({
        stale_seconds: PositiveSeconds.optional(),
        wait_seconds: WaitSeconds.optional(),
        poll_ms: PositiveCount.optional(),
        heartbeat_seconds: PositiveSeconds.optional(),
        mutex_stale_seconds: PositiveSeconds.optional()
      })
      .strict()
      .optional(),
    cache: z
      .object({
        ttl_seconds: PositiveSeconds.optional(),
        max_entries: PositiveCount.optional()
      })
      .strict()
      .optional(),
    execution: z
      .object({
        workers: PositiveCount.optional(),
        step_timeout_seconds: PositiveSeconds.optional()
      })
      .strict()
      .optional(),
    security: z
      .object({
        allow_commands: z.array(z.string().min(1)).optional(),
        deny_patterns: z.array(RegexSource).optional(),
        env_allow: z.array(z.string().min(1)).optional(),
        replace_defaults: z.boolean().optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface EngineConfig {
  root: string;
  lockStaleMs: number;
  lockWaitMs: number;
  lockPollMs: number;
  heartbeatMs: number;
  mutexStaleMs: number;
  cacheTtlSeconds: number;
  cacheMaxEntries: number;
  workers: number;
  stepTimeoutMs: number;
  security: SecurityPolicy;
}

/** Flag-level overrides, applied last. */
export type ConfigOverrides = Partial<Omit<EngineConfig, 'root' | 'security'>>;

export const DEFAULT_CONFIG: Omit<EngineConfig, 'root' | 'security' | 'heartbeatMs'> = {
  lockStaleMs: 300_000,
  lockWaitMs: 0,
  lockPollMs: 250,
  mutexStaleMs: 10_000,
  cacheTtlSeconds: 300,
  cacheMaxEntries: 1000,
  workers: 4,
  stepTimeoutMs: 300_000
};

const TUNABLE_KEYS = [
  'lockStaleMs',
  'lockWaitMs',
  'lockPollMs',
  'heartbeatMs',
  'mutexStaleMs',
  'cacheTtlSeconds',
  'cacheMaxEntries',
  'workers',
  'stepTimeoutMs'
] as const satisfies ReadonlyArray<keyof ConfigOverrides>;

interface EnvSetting {
  key: keyof ConfigOverrides;
  schema: z.ZodNumber;
  expects: string;
}

// Same bounds as the file schema.
const ENV_KEYS = {
  TASKGATE_LOCK_STALE_SECONDS: { key: 'lockStaleMs', schema: PositiveSeconds, expects: 'positive number' },
  TASKGATE_LOCK_WAIT_SECONDS: { key: 'lockWaitMs', schema: WaitSeconds, expects: 'non-negative number' },
  TASKGATE_LOCK_MUTEX_STALE_SECONDS: { key: 'mutexStaleMs', schema: PositiveSeconds, expects: 'positive number' },
  TASKGATE_STEP_TIMEOUT_SECONDS: { key: 'stepTimeoutMs', schema: PositiveSeconds, expects: 'positive number' },
  TASKGATE_CACHE_TTL_SECONDS: { key: 'cacheTtlSeconds', schema: PositiveSeconds, expects: 'positive number' },
  TASKGATE_CACHE_MAX_ENTRIES: { key: 'cacheMaxEntries', schema: PositiveCount, expects: 'positive integer' },
  TASKGATE_WORKERS: { key: 'workers', schema: PositiveCount, expects: 'positive integer' }
} as const satisfies Record<string, EnvSetting>;

export interface LoadConfigOptions {
  root: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/** defaults ← `.taskgate/config.yaml` ← TASKGATE_* environment ← overrides. */
export async function loadConfig(opts: LoadConfigOptions): Promise<EngineConfig> {
  const ws = resolveWorkspace(opts.root);
  const file = await readConfigFile(ws.configPath);

  const fromFile: ConfigOverrides = {
    lockStaleMs: seconds(file.locks?.stale_seconds),
    lockWaitMs: seconds(file.locks?.wait_seconds),
    lockPollMs: file.locks?.poll_ms,
    heartbeatMs: seconds(file.locks?.heartbeat_seconds),
    mutexStaleMs: seconds(file.locks?.mutex_stale_seconds),
    cacheTtlSeconds: file.cache?.ttl_seconds,
    cacheMaxEntries: file.cache?.max_entries,
    workers: file.execution?.workers,
    stepTimeoutMs: seconds(file.execution?.step_timeout_seconds)
  };

  const layered: ConfigOverrides = {};
  for (const layer of [fromFile, readEnv(opts.env ?? process.env), opts.overrides ?? {}]) {
    for (const key of TUNABLE_KEYS) {
      const value = layer[key];
      if (value !== undefined) layered[key] = value;
    }
  }

  const lockStaleMs = layered.lockStaleMs ?? DEFAULT_CONFIG.lockStaleMs;
  return {
    root: ws.root,
    lockStaleMs,
    lockWaitMs: layered.lockWaitMs ?? DEFAULT_CONFIG.lockWaitMs,
    lockPollMs: layered.lockPollMs ?? DEFAULT_CONFIG.lockPollMs,
    // Heartbeats must land well inside the stale window.
    heartbeatMs: layered.heartbeatMs ?? Math.max(50, Math.floor(lockStaleMs / 3)),
    mutexStaleMs: layered.mutexStaleMs ?? DEFAULT_CONFIG.mutexStaleMs,
    cacheTtlSeconds: layered.cacheTtlSeconds ?? DEFAULT_CONFIG.cacheTtlSeconds,
    cacheMaxEntries: layered.cacheMaxEntries ?? DEFAULT_CONFIG.cacheMaxEntries,
    workers: layered.workers ?? DEFAULT_CONFIG.workers,
    stepTimeoutMs: layered.stepTimeoutMs ?? DEFAULT_CONFIG.stepTimeoutMs,
    security: buildPolicy({
      allowCommands: file.security?.allow_commands,
      denyPatterns: file.security?.deny_patterns,
      envAllow: file.security?.env_allow,
      replaceDefaults: file.security?.replace_defaults
    })
  };
}

async function readConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readText(path);
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw new ConfigError(`cannot read config ${path}`, err);
  }

  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${path}`, err);
  }
  if (doc == null) return {};

  const parsed = ConfigFileSchema.safeParse(doc);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid config ${path}: ${details}`);
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (const [name, setting] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const parsed = setting.schema.safeParse(Number(raw));
    if (!parsed.success) {
      throw new ConfigError(`${name} must be a ${setting.expects}, got '${raw}'`);
    }
    out[setting.key] = setting.key.endsWith('Ms') ? toMs(parsed.data) : parsed.data;
  }
  return out;
}

function seconds(value: number | undefined): number | undefined {
  return value === undefined ? undefined : toMs(value);
}

// A positive number of seconds never rounds down to 0 ms.
function toMs(value: number): number {
  return value > 0 ? Math.max(1, Math.round(value * 1000)) : 0;
}
