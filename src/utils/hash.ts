import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import { isMissingFile } from './fs.js';

export function sha256(text: string | Uint8Array): string {
  return createHash('sha256').update(text).digest('hex');
}

/** sha256 of a file's bytes, or `null` when the file does not exist. */
export async function sha256File(path: string): Promise<string | null> {
  const h = createHash('sha256');
  try {
    for await (const chunk of createReadStream(path)) {
      h.update(chunk);
    }
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  return h.digest('hex');
}

/** JSON with object keys sorted at every level, so equal values hash equally. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(stableClone(value));
}

function stableClone(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(stableClone);
  if (typeof value !== 'object') return value;
  const out: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
  for (const [k, v] of entries) out[k] = stableClone(v);
  return out;
}
