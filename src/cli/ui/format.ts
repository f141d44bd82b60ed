import { theme, INDENT, RULE_WIDTH, STEP_LABEL_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

/** Age of an ISO timestamp relative to `now`, e.g. "42s ago". */
export function formatAge(iso: string, now: number = Date.now()): string {
  const t = Date.parse(iso);
  if (Number.isNaN(t)) return iso;
  return `${formatMs(Math.max(0, now - t))} ago`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

// ── Section Banner ──────────────────────────────────────────────────────────

/**
 * A section banner:  ── Executing ────────────────────────
 */
export function sectionBanner(name: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const suffixLen = Math.max(4, width - prefix.length - name.length - 1);
  return theme.dim(prefix) + theme.bold(name) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Box Drawing ─────────────────────────────────────────────────────────────

/**
 * Draw a box with rounded corners around content lines.
 *
 * ```
 * ╭─── Title ─────────────────────────╮
 * │                                    │
 * │  content line 1                    │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const style = theme.box.border;

  const titleText = ` ${title} `;
  const topFillLen = Math.max(0, width - 2 - 3 - titleText.length);
  const topLine = style('╭───') + theme.box.title(titleText) + style('─'.repeat(topFillLen) + '╮');
  const bottomLine = style('╰' + '─'.repeat(width - 2) + '╯');
  const emptyLine = style('│') + ' '.repeat(width - 2) + style('│');

  const contentLines = lines.map((line) => {
    const padLen = Math.max(0, width - 4 - stripAnsi(line).length);
    return style('│') + '  ' + line + ' '.repeat(padLen) + style(' │');
  });

  return [topLine, emptyLine, ...contentLines, emptyLine, bottomLine].join('\n');
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Task          build-docs"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Step Result Formatting ──────────────────────────────────────────────────

export interface StepLine {
  name: string;
  passed: boolean;
  cached?: boolean;
  detail?: string;
}

/**
 * Format a step result line:
 *   ✔ lint                    312ms
 *   ✖ unit-tests              exited with code 1
 */
export function stepLine(item: StepLine, nameWidth: number = STEP_LABEL_WIDTH): string {
  const icon = item.passed ? (item.cached ? theme.cached : theme.check) : theme.cross;
  const name = padRight(item.name, nameWidth);
  const detail = item.detail ? theme.dim(item.detail) : '';
  return `${INDENT}${icon} ${name}${detail}`;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Strip ANSI escape codes from a string (for width calculations). */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function firstLine(text: string, max = 80): string {
  const line = text.split('\n')[0].trim();
  return line.length > max ? `${line.slice(0, max - 1)}…` : line;
}
