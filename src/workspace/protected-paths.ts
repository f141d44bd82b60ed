import { isAbsolute, posix, relative, resolve, sep } from 'node:path';
import picomatch from 'picomatch';

import { DATA_DIR_NAME } from './layout.js';

export const PROTECTED_PATH_PATTERNS = [`${DATA_DIR_NAME}`, `${DATA_DIR_NAME}/**`] as const;

const isProtected = picomatch([...PROTECTED_PATH_PATTERNS], { dot: true });

export function isProtectedPath(path: string): boolean {
  // Project-relative POSIX paths only.
  return isProtected(path);
}

export type ProjectPathResult = { ok: true; path: string } | { ok: false; reason: string };

/**
 * Normalize a contract path to POSIX project-relative form.
 * Rejects absolute paths, paths that escape `root`, the root itself and engine-owned paths.
 */
export function normalizeProjectPath(root: string, raw: string): ProjectPathResult {
  const trimmed = raw.trim();
  if (!trimmed) return { ok: false, reason: 'empty path' };
  if (isAbsolute(trimmed) || /^[a-zA-Z]:[\\/]/.test(trimmed)) {
    return { ok: false, reason: `absolute path '${raw}' is not allowed` };
  }

  const absRoot = resolve(root);
  const rel = relative(absRoot, resolve(absRoot, trimmed));
  if (rel === '') return { ok: false, reason: `path '${raw}' resolves to the project root` };
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return { ok: false, reason: `path '${raw}' escapes the project root` };
  }

  const normalized = rel.split(sep).join(posix.sep);
  if (isProtectedPath(normalized)) {
    return { ok: false, reason: `path '${raw}' is inside the protected ${DATA_DIR_NAME}/ directory` };
  }
  return { ok: true, path: normalized };
}
