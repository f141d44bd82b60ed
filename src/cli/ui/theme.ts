import chalk, { type ChalkInstance } from 'chalk';

import type { ExecutorState, OverallStatus } from '../../core/evidence/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  cached: chalk.cyan('↺'),
  arrow: chalk.dim('→'),

  state: (state: ExecutorState): ChalkInstance => {
    switch (state) {
      case 'Completed':
        return chalk.green;
      case 'Failed':
        return chalk.red;
      case 'Executing':
        return chalk.cyan;
      default:
        return chalk.blue;
    }
  },

  status: (status: OverallStatus): ChalkInstance => {
    const map: Record<OverallStatus, ChalkInstance> = {
      success: chalk.green,
      partial_failure: chalk.yellow,
      fatal_failure: chalk.red
    };
    return map[status];
  },

  // Box chrome
  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan,
    label: chalk.bold
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 56;

/** Column width for step names in result lines. */
export const STEP_LABEL_WIDTH = 24;
