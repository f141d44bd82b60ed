import picomatch from 'picomatch';

import type { Step, TaskContract } from '../contract/types.js';
import { SecurityViolation } from '../errors.js';
import { DEFAULT_POLICY, type SecurityPolicy } from './policy.js';
import { isLocalPortInUse, type PortCheck } from './ports.js';

export type ValidationOutcome = { ok: true } | { ok: false; violation: SecurityViolation };

interface DenyRule {
  source: string;
  re: RegExp;
}

/**
 * Command policy applied before anything is spawned. Deny patterns are checked first and
 * always win, so an allow-listed verb carrying a dangerous flag is still rejected.
 */
export class SecurityGate {
  private readonly isAllowedCommand: (verb: string) => boolean;
  private readonly denyRules: DenyRule[];
  private readonly envAllow: readonly string[];

  constructor(
    readonly policy: SecurityPolicy = DEFAULT_POLICY,
    private readonly portInUse: PortCheck = isLocalPortInUse
  ) {
    this.isAllowedCommand = matcher(policy.allowCommands);
    this.denyRules = policy.denyPatterns.map((source) => ({ source, re: new RegExp(source) }));
    this.envAllow = policy.envAllow;
  }

  validate(step: Step): ValidationOutcome {
    // File and internal steps never spawn; their paths were checked at parse time.
    if (step.kind !== 'exec') return { ok: true };

    const argv = step.payload.argv;
    // Joined for inspection only; execution always receives the vector.
    const joined = argv.join(' ');
    for (const rule of this.denyRules) {
      if (rule.re.test(joined)) {
        return { ok: false, violation: new SecurityViolation('matched deny pattern', rule.source, step.index) };
      }
    }

    const verb = argv[0];
    if (!this.isAllowedCommand(verb)) {
      return { ok: false, violation: new SecurityViolation('not allowlisted', verb, step.index) };
    }
    return { ok: true };
  }

  /** Required secrets first, then every step in order; the first violation is returned. */
  validateContract(contract: TaskContract, env: NodeJS.ProcessEnv = process.env): ValidationOutcome {
    for (const name of contract.secretsRequired) {
      const value = env[name];
      if (value === undefined || value === '') {
        return { ok: false, violation: new SecurityViolation('missing required secret', name) };
      }
    }
    for (const step of contract.steps) {
      const outcome = this.validate(step);
      if (!outcome.ok) return outcome;
    }
    return { ok: true };
  }

  /** The first port something is already listening on is a violation. */
  async checkPorts(ports: readonly number[]): Promise<ValidationOutcome> {
    for (const port of ports) {
      if (await this.portInUse(port)) {
        return { ok: false, violation: new SecurityViolation('port already in use', String(port)) };
      }
    }
    return { ok: true };
  }

  /**
   * Environment for child processes: only names matching the allow-list (plus `extraNames`,
   * e.g. a contract's required secrets) survive.
   */
  filterEnv(env: NodeJS.ProcessEnv, extraNames: readonly string[] = []): Record<string, string> {
    const allowed = matcher(this.envAllow);
    const extra = new Set(extraNames);
    const out: Record<string, string> = {};
    for (const [name, value] of Object.entries(env)) {
      if (value === undefined) continue;
      if (allowed(name) || extra.has(name)) out[name] = value;
    }
    return out;
  }
}

function matcher(patterns: readonly string[]): (value: string) => boolean {
  if (patterns.length === 0) return () => false;
  return picomatch([...patterns], { dot: true });
}
