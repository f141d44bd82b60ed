import { resolve } from 'node:path';

import { loadConfig } from '../../core/config.js';
import { parseBatch, type ContractSource } from '../../core/contract/reader.js';
import { errorKindOf, exitCodeForKind, EXIT_CODES } from '../../core/errors.js';
import { SecurityGate } from '../../core/security/gate.js';
import { errorMessage, readText } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';
import type { CommandResult } from './result.js';

export interface ValidateCommandOptions {
  contractPaths: string[];
  root?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * `taskgate validate <contract...>` — parse every contract as one batch (ids must be unique)
 * and run the security gate over each. Nothing is locked or executed.
 */
export async function runValidateCommand(opts: ValidateCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const root = resolve(opts.root ?? process.cwd());

  let gate: SecurityGate;
  try {
    gate = new SecurityGate((await loadConfig({ root, env: opts.env })).security);
  } catch (err) {
    r.error('Configuration error', errorMessage(err));
    return { ok: false, exitCode: exitCodeForKind(errorKindOf(err)), details: errorMessage(err) };
  }

  const sources: ContractSource[] = [];
  for (const p of opts.contractPaths) {
    const path = resolve(p);
    try {
      sources.push({ name: path, text: await readText(path) });
    } catch (err) {
      const reason = `cannot read contract '${path}': ${errorMessage(err)}`;
      r.error('Invalid contract', reason);
      return { ok: false, exitCode: EXIT_CODES.parse, details: reason };
    }
  }

  const batch = parseBatch(sources, { root });
  if (!batch.ok) {
    r.error('Invalid contract', batch.error.reason, `Contract: ${batch.name}`);
    return { ok: false, exitCode: EXIT_CODES.parse, details: batch.error.reason };
  }

  for (const contract of batch.contracts) {
    const verdict = gate.validateContract(contract, opts.env ?? process.env);
    if (!verdict.ok) {
      r.error(`Rejected: ${contract.id}`, verdict.violation.message);
      return { ok: false, exitCode: EXIT_CODES.security, details: verdict.violation.message };
    }
    r.success(`${contract.id}: ${contract.steps.length} step${contract.steps.length === 1 ? '' : 's'} valid`);
  }
  return { ok: true, exitCode: EXIT_CODES.success, details: batch.contracts.map((c) => c.id) };
}
