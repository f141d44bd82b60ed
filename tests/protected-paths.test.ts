import { describe, expect, it } from 'vitest';

import { isProtectedPath, normalizeProjectPath } from '../src/workspace/protected-paths.js';

const root = '/project';

describe('project paths', () => {
  it('normalizes to POSIX project-relative form', () => {
    expect(normalizeProjectPath(root, './src//a.ts')).toEqual({ ok: true, path: 'src/a.ts' });
    expect(normalizeProjectPath(root, 'src/lib/../a.ts')).toEqual({ ok: true, path: 'src/a.ts' });
  });

  it('rejects absolute and escaping paths', () => {
    expect(normalizeProjectPath(root, '/etc/passwd')).toEqual({ ok: false, reason: "absolute path '/etc/passwd' is not allowed" });
    expect(normalizeProjectPath(root, 'src/../../x')).toEqual({ ok: false, reason: "path 'src/../../x' escapes the project root" });
    expect(normalizeProjectPath(root, '.')).toEqual({ ok: false, reason: "path '.' resolves to the project root" });
    expect(normalizeProjectPath(root, '  ')).toEqual({ ok: false, reason: 'empty path' });
  });

  it('keeps engine state out of reach', () => {
    expect(isProtectedPath('.taskgate')).toBe(true);
    expect(isProtectedPath('.taskgate/state/locks.json')).toBe(true);
    expect(isProtectedPath('src/.taskgate.ts')).toBe(false);
    expect(normalizeProjectPath(root, '.taskgate/state/locks.json')).toEqual({
      ok: false,
      reason: "path '.taskgate/state/locks.json' is inside the protected .taskgate/ directory"
    });
  });
});
