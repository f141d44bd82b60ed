export interface SecurityPolicy {
  /** Globs matched against `argv[0]`. */
  allowCommands: readonly string[];
  /** Regex sources matched against the space-joined argument vector. */
  denyPatterns: readonly string[];
  /** Globs matched against environment variable names. */
  envAllow: readonly string[];
}

/** Policy additions read from config; `replaceDefaults` drops the built-in lists. */
export interface SecurityPolicyConfig {
  allowCommands?: readonly string[];
  denyPatterns?: readonly string[];
  envAllow?: readonly string[];
  replaceDefaults?: boolean;
}

export const DEFAULT_ALLOW_COMMANDS: readonly string[] = [
  // shell-free basics
  'echo',
  'true',
  'false',
  'cat',
  'ls',
  // toolchains
  'node',
  'npm',
  'npx',
  'tsc',
  'vitest',
  'jest',
  'eslint',
  'prettier',
  'python',
  'python3',
  'pytest',
  'ruff',
  'mypy',
  'black',
  'isort',
  'git',
  'make'
];

export const DEFAULT_DENY_PATTERNS: readonly string[] = [
  // destructive filesystem operations
  String.raw`\brm\s+-[a-zA-Z]*r[a-zA-Z]*\s+/`,
  String.raw`&&\s*rm\b`,
  String.raw`;\s*rm\b`,
  String.raw`>\s*/dev/(?!null)`,
  String.raw`\bdd\s+if=/dev/(zero|random|urandom)`,
  String.raw`\bmkfs(\.\w+)?\b`,
  String.raw`\bchmod\s+(-R\s+)?777\b`,
  // dynamic code evaluation
  String.raw`\beval\b`,
  String.raw`\bexec\b`,
  String.raw`__import__`,
  String.raw`\$\(`,
  '`',
  String.raw`\bnode\s+(-e|--eval|-p|--print)\b`,
  String.raw`\bpython3?\s+-c\b`,
  // remote content piped into an interpreter
  String.raw`\b(curl|wget)\b.*\|\s*(ba|z)?sh\b`,
  String.raw`\bmktemp\b.*\|\s*(ba|z)?sh\b`,
  // privilege escalation
  String.raw`\bsudo\b`,
  String.raw`\bsu\s+-`,
  String.raw`\bdoas\b`,
  // raw network listeners
  String.raw`\b(nc|ncat|netcat)\s+.*-[a-zA-Z]*[el]`,
  String.raw`\bsocat\b`
];

export const DEFAULT_ENV_ALLOW: readonly string[] = [
  'PATH',
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_*',
  'TERM',
  'TZ',
  'TMPDIR',
  'CI',
  'NODE_ENV',
  'PYTHONPATH'
];

export const DEFAULT_POLICY: SecurityPolicy = {
  allowCommands: DEFAULT_ALLOW_COMMANDS,
  denyPatterns: DEFAULT_DENY_PATTERNS,
  envAllow: DEFAULT_ENV_ALLOW
};

export function buildPolicy(config: SecurityPolicyConfig = {}): SecurityPolicy {
  const base: SecurityPolicy = config.replaceDefaults
    ? { allowCommands: [], denyPatterns: [], envAllow: [] }
    : DEFAULT_POLICY;
  return {
    allowCommands: dedupe([...base.allowCommands, ...(config.allowCommands ?? [])]),
    denyPatterns: dedupe([...base.denyPatterns, ...(config.denyPatterns ?? [])]),
    envAllow: dedupe([...base.envAllow, ...(config.envAllow ?? [])])
  };
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
