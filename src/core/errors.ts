export const ERROR_KINDS = [
  'ParseError',
  'SecurityViolation',
  'LockConflict',
  'Timeout',
  'ExecutionFailure',
  'InternalError'
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export class TaskgateError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TaskgateError';
  }
}

export class ParseError extends TaskgateError {
  constructor(
    public readonly reason: string,
    cause?: unknown
  ) {
    super('ParseError', reason, cause);
    this.name = 'ParseError';
  }
}

export class SecurityViolation extends TaskgateError {
  constructor(
    public readonly reason: string,
    public readonly pattern?: string,
    public readonly stepIndex?: number
  ) {
    super('SecurityViolation', pattern ? `${reason}: ${pattern}` : reason);
    this.name = 'SecurityViolation';
  }
}

export interface LockBlocker {
  agentId: string;
  resource: string;
  taskId: string;
}

export class LockConflict extends TaskgateError {
  constructor(public readonly blocker: LockBlocker) {
    super('LockConflict', `Resource '${blocker.resource}' is held by agent '${blocker.agentId}' (task ${blocker.taskId})`);
    this.name = 'LockConflict';
  }
}

export class ConfigError extends TaskgateError {
  constructor(message: string, cause?: unknown) {
    super('InternalError', message, cause);
    this.name = 'ConfigError';
  }
}

// ── CLI exit codes ──────────────────────────────────────────────────────────

export const EXIT_CODES = {
  success: 0,
  parse: 1,
  security: 2,
  lockConflict: 3,
  stepFailure: 4,
  internal: 5
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a contract-level error kind to the CLI exit code. Per-step kinds
 * (`Timeout`, `ExecutionFailure`) surface as step failures.
 */
export function exitCodeForKind(kind: ErrorKind | null): ExitCode {
  switch (kind) {
    case null:
      return EXIT_CODES.success;
    case 'ParseError':
      return EXIT_CODES.parse;
    case 'SecurityViolation':
      return EXIT_CODES.security;
    case 'LockConflict':
      return EXIT_CODES.lockConflict;
    case 'Timeout':
    case 'ExecutionFailure':
      return EXIT_CODES.stepFailure;
    case 'InternalError':
      return EXIT_CODES.internal;
  }
}

export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof TaskgateError ? err.kind : 'InternalError';
}
