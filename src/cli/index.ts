#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { EXIT_CODES } from '../core/errors.js';
import { errorMessage } from '../utils/fs.js';
import { runCacheClearCommand, runCacheStatsCommand } from './commands/cache.js';
import { runExecuteCommand } from './commands/execute.js';
import { runHistoryCommand } from './commands/history.js';
import { runLocksListCommand, runLocksPruneCommand } from './commands/locks.js';
import type { CommandResult } from './commands/result.js';
import { runValidateCommand } from './commands/validate.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function buildCli(): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('taskgate')
    .description('Run task contracts under a command policy, with cross-process resource locks and a verification cache')
    .version(version, '-v, --version');

  program
    .option('--root <dir>', 'Project root (defaults to the current directory)')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)');

  program.hook('preAction', () => {
    createRenderer({ quiet: !!program.opts<GlobalFlags>().quiet });
  });

  const globals = (): GlobalFlags => program.opts<GlobalFlags>();

  // ── Execution ────────────────────────────────────────────────────────────

  program
    .command('execute')
    .description('Validate, lock, run and record one task contract')
    .argument('<contract-path>', 'YAML or JSON task contract')
    .option('--plan', 'Validate and print the record skeleton without executing or writing anything')
    .option('--agent-id <id>', 'Lock owner identity (defaults to <hostname>-<pid>)')
    .option('--timeout <seconds>', 'Default per-step timeout', parsePositiveNumber)
    .option('--lock-wait <seconds>', 'How long to wait for busy resources', parseNonNegativeNumber)
    .option('--workers <n>', 'Worker pool size for parallel groups', parsePositiveInt)
    .action(async (contractPath: string, opts: { plan?: boolean; agentId?: string; timeout?: number; lockWait?: number; workers?: number }) => {
      const g = globals();
      finish(
        await runExecuteCommand({
          contractPath,
          root: g.root,
          plan: !!opts.plan,
          agentId: opts.agentId,
          timeoutSeconds: opts.timeout,
          lockWaitSeconds: opts.lockWait,
          workers: opts.workers,
          verbose: !!g.verbose,
          quiet: !!g.quiet
        })
      );
    });

  program
    .command('validate')
    .description('Parse contracts and check them against the command policy')
    .argument('<contract-paths...>', 'One or more YAML or JSON task contracts')
    .action(async (contractPaths: string[]) => {
      finish(await runValidateCommand({ contractPaths, root: globals().root }));
    });

  // ── Operator Commands ────────────────────────────────────────────────────

  const locks = program.command('locks').description('Inspect the shared lock table');
  locks
    .command('list')
    .description('Show held locks')
    .option('--resource <path>', 'Only the lock on this project path')
    .action(async (opts: { resource?: string }) => {
      finish(await runLocksListCommand({ root: globals().root, resource: opts.resource }));
    });
  locks
    .command('prune')
    .description('Remove locks whose heartbeat is past the stale window')
    .action(async () => {
      finish(await runLocksPruneCommand({ root: globals().root }));
    });

  const cache = program.command('cache').description('Manage the verification cache');
  cache
    .command('clear')
    .description('Remove every cached verification result')
    .action(async () => {
      finish(await runCacheClearCommand({ root: globals().root }));
    });
  cache
    .command('stats')
    .description('Show cache size and age')
    .action(async () => {
      finish(await runCacheStatsCommand({ root: globals().root }));
    });

  program
    .command('history')
    .description('List recorded runs')
    .option('--detail <task-id>', 'Print the ledger of the task\'s latest run')
    .action(async (opts: { detail?: string }) => {
      finish(await runHistoryCommand({ root: globals().root, detailTaskId: opts.detail }));
    });

  return program;
}

function finish(res: CommandResult): void {
  process.exitCode = res.exitCode;
}

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Expected a positive number.');
  return n;
}

function parseNonNegativeNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative number.');
  return n;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getRenderer().error('Unexpected error', errorMessage(err), 'Try running with --verbose for more details.');
    process.exitCode = EXIT_CODES.internal;
  });
