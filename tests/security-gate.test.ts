import { describe, expect, it } from 'vitest';
import { createServer } from 'node:net';

import { parseContractDocument } from '../src/core/contract/reader.js';
import type { TaskContract } from '../src/core/contract/types.js';
import { SecurityGate } from '../src/core/security/gate.js';
import { buildPolicy, DEFAULT_POLICY } from '../src/core/security/policy.js';
import { isLocalPortInUse } from '../src/core/security/ports.js';

function contract(argvs: string[][], extra: Record<string, unknown> = {}): TaskContract {
  const res = parseContractDocument(
    { id: 'sec', title: 'Security', ...extra, steps: argvs.map((payload) => ({ kind: 'exec', payload })) },
    { root: '/project' }
  );
  if (!res.ok) throw new Error(res.error.reason);
  return res.contract;
}

describe('security gate', () => {
  const gate = new SecurityGate();

  it('allows listed commands', () => {
    expect(gate.validateContract(contract([['echo', 'hello'], ['git', 'status']]), {})).toEqual({ ok: true });
  });

  it('rejects commands that are not allowlisted', () => {
    const res = gate.validate(contract([['curl', 'https://example.invalid']]).steps[0]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.violation.kind).toBe('SecurityViolation');
    expect(res.violation.reason).toBe('not allowlisted');
    expect(res.violation.pattern).toBe('curl');
    expect(res.violation.message).toBe('not allowlisted: curl');
  });

  it('lets deny patterns win over the allow-list', () => {
    const res = gate.validate(contract([['node', '-e', 'process.exit(0)']]).steps[0]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.violation.reason).toBe('matched deny pattern');
    expect(res.violation.pattern).toBe(String.raw`\bnode\s+(-e|--eval|-p|--print)\b`);
    expect(res.violation.stepIndex).toBe(0);
  });

  it('inspects the joined argument vector', () => {
    const res = gate.validate(contract([['ls', '&&', 'rm', 'notes.txt']]).steps[0]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.violation.pattern).toBe(String.raw`&&\s*rm\b`);
  });

  it('reports the first offending step of a contract', () => {
    const res = gate.validateContract(contract([['echo', 'ok'], ['sudo', 'ls'], ['curl', 'x']]), {});
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.violation.stepIndex).toBe(1);
    expect(res.violation.pattern).toBe(String.raw`\bsudo\b`);
  });

  it('checks required secrets before any step', () => {
    const c = contract([['sudo', 'ls']], { secrets_required: ['API_TOKEN'] });
    const missing = gate.validateContract(c, {});
    expect(missing.ok).toBe(false);
    if (missing.ok) return;
    expect(missing.violation.message).toBe('missing required secret: API_TOKEN');

    const empty = gate.validateContract(c, { API_TOKEN: '' });
    expect(empty.ok).toBe(false);
  });

  it('never rejects file and internal steps', () => {
    const res = parseContractDocument(
      { id: 'f', title: 'F', resources: ['a.txt'], steps: [{ kind: 'write_file', payload: { path: 'a.txt', content: 'eval' } }] },
      { root: '/project' }
    );
    if (!res.ok) throw new Error(res.error.reason);
    expect(gate.validate(res.contract.steps[0])).toEqual({ ok: true });
  });

  it('matches the allow-list as globs', () => {
    const custom = new SecurityGate(buildPolicy({ allowCommands: ['py*'], replaceDefaults: true }));
    expect(custom.validate(contract([['pytest', '-q']]).steps[0]).ok).toBe(true);
    expect(custom.validate(contract([['npm', 'test']]).steps[0]).ok).toBe(false);
  });

  it('filters the child environment to allowed names and required secrets', () => {
    const env = gate.filterEnv(
      { PATH: '/usr/bin', LC_ALL: 'C', AWS_SECRET_ACCESS_KEY: 'test-secret', API_TOKEN: 'test-token', EMPTY: undefined },
      ['API_TOKEN']
    );
    expect(env).toEqual({ PATH: '/usr/bin', LC_ALL: 'C', API_TOKEN: 'test-token' });
  });

  it('rejects the first port that is already in use', async () => {
    const busy = new SecurityGate(DEFAULT_POLICY, async (port) => port === 8080);
    expect(await busy.checkPorts([])).toEqual({ ok: true });
    expect(await busy.checkPorts([3000])).toEqual({ ok: true });

    const outcome = await busy.checkPorts([3000, 8080]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.violation.message).toBe('port already in use: 8080');
  });

  it('sees a listener on a local port', async () => {
    const server = createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

    try {
      expect(await isLocalPortInUse(address.port)).toBe(true);
      const outcome = await new SecurityGate().checkPorts([address.port]);
      expect(outcome.ok).toBe(false);
    } finally {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
    expect(await isLocalPortInUse(address.port)).toBe(false);
  });
});
