import { resolve } from 'node:path';

import { createEngine } from '../../core/engine.js';
import { loadConfig, type ConfigOverrides, type EngineConfig } from '../../core/config.js';
import { planHash, readContractFile } from '../../core/contract/reader.js';
import { errorKindOf, exitCodeForKind, EXIT_CODES, ParseError } from '../../core/errors.js';
import type { ExecutorEvent } from '../../core/executor/task-executor.js';
import { groupSteps } from '../../core/executor/task-executor.js';
import { errorMessage } from '../../utils/fs.js';
import { createLogger } from '../../utils/logger.js';
import { getRenderer, type Renderer } from '../ui/renderer.js';
import type { SpinnerHandle } from '../ui/spinner.js';
import type { CommandResult } from './result.js';

export interface ExecuteCommandOptions {
  contractPath: string;
  root?: string;
  plan?: boolean;
  agentId?: string;
  /** Default per-step timeout in seconds. */
  timeoutSeconds?: number;
  lockWaitSeconds?: number;
  workers?: number;
  verbose?: boolean;
  quiet?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * `taskgate execute <contract>` — validate, lock, run and record one task contract.
 * With `--plan` the record skeleton is printed to stdout and nothing is written.
 */
export async function runExecuteCommand(opts: ExecuteCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const root = resolve(opts.root ?? process.cwd());
  const logger = createLogger({ verbose: opts.verbose, quiet: opts.quiet });

  let config: EngineConfig;
  try {
    config = await loadConfig({ root, env: opts.env, overrides: overridesFrom(opts) });
  } catch (err) {
    r.error('Configuration error', errorMessage(err), 'Check .taskgate/config.yaml and TASKGATE_* variables.');
    return { ok: false, exitCode: exitCodeForKind(errorKindOf(err)), details: errorMessage(err) };
  }

  const contractPath = resolve(opts.contractPath);
  const loaded = await readContractFile(contractPath, { root });
  if (loaded instanceof ParseError) {
    r.error('Invalid contract', loaded.reason, `Contract: ${contractPath}`);
    return { ok: false, exitCode: EXIT_CODES.parse, details: loaded.reason };
  }

  const { contract, format } = loaded;
  r.contractSummary({
    id: contract.id,
    title: contract.title,
    path: contractPath,
    planHash: planHash(contract),
    resources: contract.resources,
    gates: contract.gates,
    steps: contract.steps.length,
    stages: groupSteps(contract).length
  });

  const progress = new ProgressView(r);
  const engine = createEngine(config, {
    agentId: opts.agentId,
    logger,
    env: opts.env,
    onEvent: (event) => progress.onEvent(event)
  });

  try {
    if (opts.plan) {
      const outcome = await engine.executor.plan(contract);
      progress.close(outcome.exitCode === EXIT_CODES.success);
      r.record(outcome.record, format);
      if (outcome.record.error_message) r.error(outcome.record.error_kind ?? 'Plan failed', outcome.record.error_message);
      return { ok: outcome.exitCode === EXIT_CODES.success, exitCode: outcome.exitCode, details: outcome.record };
    }

    const outcome = await engine.executor.execute(contract, { format });
    progress.close(outcome.exitCode === EXIT_CODES.success);
    r.executionSummary(outcome);
    return { ok: outcome.exitCode === EXIT_CODES.success, exitCode: outcome.exitCode, details: outcome };
  } catch (err) {
    progress.close(false);
    r.error('Execution failed', errorMessage(err), 'Try running with --verbose for more details.');
    return { ok: false, exitCode: EXIT_CODES.internal, details: errorMessage(err) };
  }
}

function overridesFrom(opts: ExecuteCommandOptions): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (opts.timeoutSeconds !== undefined) out.stepTimeoutMs = Math.max(1, Math.round(opts.timeoutSeconds * 1000));
  if (opts.lockWaitSeconds !== undefined) out.lockWaitMs = Math.round(opts.lockWaitSeconds * 1000);
  if (opts.workers !== undefined) out.workers = opts.workers;
  return out;
}

/** Spinner while waiting on locks, then one line per stage and step. */
class ProgressView {
  private spinner: SpinnerHandle | null = null;

  constructor(private readonly r: Renderer) {}

  onEvent(event: ExecutorEvent): void {
    switch (event.type) {
      case 'state':
        if (event.state === 'Locking') {
          this.spinner = this.r.spinner('Acquiring resource locks...');
          return;
        }
        if (event.state === 'Executing') {
          this.spinner?.succeed('Locks acquired');
          this.spinner = null;
          this.r.sectionBanner('Executing');
          return;
        }
        if (event.state === 'Failed') this.close(false);
        this.r.stateChange(event.state);
        return;
      case 'stage_started':
        this.r.stageStarted({ stage: event.stage, parallelGroup: event.parallelGroup, steps: event.steps });
        return;
      case 'step_finished':
        this.r.stepResult(event.result);
        return;
    }
  }

  close(ok: boolean): void {
    if (!this.spinner) return;
    if (ok) this.spinner.succeed();
    else this.spinner.fail();
    this.spinner = null;
  }
}
