import type { ExitCode } from '../../core/errors.js';

/** What every `run*Command` resolves to; the CLI entry maps `exitCode` onto the process. */
export interface CommandResult {
  ok: boolean;
  exitCode: ExitCode;
  details?: unknown;
}
