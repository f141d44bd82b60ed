import { randomBytes } from 'node:crypto';

export interface RunIdParts {
  yyyyMMdd: string; // YYYYMMDD
  hhmmss: string; // HHMMSS (UTC)
  suffix: string; // 4 hex chars
}

export function formatRunId(parts: RunIdParts): string {
  return `r-${parts.yyyyMMdd}-${parts.hhmmss}-${parts.suffix}`;
}

export function parseRunId(runId: string): RunIdParts | null {
  const m = /^r-(\d{8})-(\d{6})-([0-9a-f]{4})$/.exec(runId);
  if (!m) return null;
  return { yyyyMMdd: m[1], hhmmss: m[2], suffix: m[3] };
}

/**
 * Run ids sort by start time. The random suffix keeps two processes that start the
 * same contract within one second from sharing an evidence path.
 */
export function newRunId(now: Date = new Date(), suffix: string = randomBytes(2).toString('hex')): string {
  return formatRunId({ yyyyMMdd: formatDate(now), hhmmss: formatTime(now), suffix });
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}

function formatTime(d: Date): string {
  const hh = String(d.getUTCHours()).padStart(2, '0');
  const mi = String(d.getUTCMinutes()).padStart(2, '0');
  const ss = String(d.getUTCSeconds()).padStart(2, '0');
  return `${hh}${mi}${ss}`;
}
