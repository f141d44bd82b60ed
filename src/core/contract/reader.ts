import { extname, posix } from 'node:path';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';

import { readText } from '../../utils/fs.js';
import { sha256, stableStringify } from '../../utils/hash.js';
import { normalizeProjectPath } from '../../workspace/protected-paths.js';
import type { RecordFormat } from '../../workspace/layout.js';
import { ParseError } from '../errors.js';
import { ContractDocument, type StepDocument, type Step, type TaskContract } from './types.js';

export interface ParseOptions {
  /** Project root that resource paths are resolved against. */
  root: string;
}

export type ParseResult = { ok: true; contract: TaskContract } | { ok: false; error: ParseError };

export interface ContractSource {
  /** Shown in error reasons, usually the file path. */
  name: string;
  text: string;
}

export type BatchResult = { ok: true; contracts: TaskContract[] } | { ok: false; error: ParseError; name: string };

export interface LoadedContract {
  path: string;
  format: RecordFormat;
  contract: TaskContract;
}

/** Parse YAML or JSON contract text. Never throws for bad input. */
export function parseContract(text: string, opts: ParseOptions): ParseResult {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message.split('\n')[0] : String(err);
    return { ok: false, error: new ParseError(`invalid document: ${message}`, err) };
  }
  return parseContractDocument(document, opts);
}

/** Parse an already-decoded document. */
export function parseContractDocument(document: unknown, opts: ParseOptions): ParseResult {
  const parsed = ContractDocument.safeParse(document);
  if (!parsed.success) {
    return { ok: false, error: new ParseError(formatIssues(parsed.error.issues)) };
  }
  try {
    return { ok: true, contract: buildContract(parsed.data, opts.root) };
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err };
    throw err;
  }
}

/** Parse several contracts that will run together; ids must be unique across the batch. */
export function parseBatch(sources: readonly ContractSource[], opts: ParseOptions): BatchResult {
  const contracts: TaskContract[] = [];
  const seen = new Map<string, string>();
  for (const source of sources) {
    const res = parseContract(source.text, opts);
    if (!res.ok) return { ok: false, error: res.error, name: source.name };

    const previous = seen.get(res.contract.id);
    if (previous !== undefined) {
      return {
        ok: false,
        name: source.name,
        error: new ParseError(`duplicate contract id '${res.contract.id}' (also declared in ${previous})`)
      };
    }
    seen.set(res.contract.id, source.name);
    contracts.push(res.contract);
  }
  return { ok: true, contracts };
}

/**
 * Load a contract file. The format is remembered so the execution record can be written
 * back in the same structured format.
 */
export async function readContractFile(path: string, opts: ParseOptions): Promise<LoadedContract | ParseError> {
  let text: string;
  try {
    text = await readText(path);
  } catch (err) {
    return new ParseError(`cannot read contract '${path}': ${err instanceof Error ? err.message : String(err)}`, err);
  }
  const res = parseContract(text, opts);
  if (!res.ok) return res.error;
  return { path, format: formatForPath(path), contract: res.contract };
}

export function formatForPath(path: string): RecordFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/** Short digest of everything that determines what a contract will do. */
export function planHash(contract: TaskContract): string {
  const canonical = stableStringify({
    resources: contract.resources,
    gates: contract.gates,
    secrets: contract.secretsRequired,
    ports: contract.portsShouldBeFree,
    evidence: contract.evidence,
    steps: contract.steps.map((s) => ({
      kind: s.kind,
      payload: s.payload,
      parallel_group: s.parallelGroup,
      cacheable: s.cacheable,
      best_effort: s.bestEffort,
      timeout_ms: s.timeoutMs,
      target: s.target
    }))
  });
  return sha256(canonical).slice(0, 16);
}

// ── Internals ───────────────────────────────────────────────────────────────

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => {
      const where = issue.path.length === 0 ? '<root>' : issue.path.join('.');
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

function buildContract(doc: ContractDocument, root: string): TaskContract {
  const resources = [...new Set(doc.resources.map((r, i) => projectPath(root, r, `resources.${i}`)))].sort((a, b) =>
    a.localeCompare(b)
  );
  const declared = new Set(resources);

  const grouped = doc.steps.filter((s) => s.parallel_group !== undefined).length;
  if (grouped !== 0 && grouped !== doc.steps.length) {
    throw new ParseError('steps: parallel_group must be set on every step or on none');
  }

  const steps = doc.steps.map((s, index) => buildStep(s, index, root, declared));
  const evidence = doc.evidence.map((pattern, i) => evidencePattern(pattern, `evidence.${i}`));

  return Object.freeze({
    id: doc.id,
    title: doc.title,
    description: doc.description ?? null,
    resources: Object.freeze(resources),
    gates: Object.freeze([...doc.gates]),
    secretsRequired: Object.freeze([...new Set(doc.secrets_required)]),
    portsShouldBeFree: Object.freeze([...new Set(doc.ports_should_be_free)].sort((a, b) => a - b)),
    evidence: Object.freeze([...new Set(evidence)]),
    steps: Object.freeze(steps)
  });
}

function evidencePattern(pattern: string, at: string): string {
  const normalized = pattern.replace(/^\.\//, '');
  if (posix.isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized) || normalized.split('/').includes('..')) {
    throw new ParseError(`${at}: evidence patterns must stay inside the project, got '${pattern}'`);
  }
  return normalized;
}

function buildStep(s: StepDocument, index: number, root: string, declared: ReadonlySet<string>): Step {
  const at = `steps.${index}`;
  const mustBeDeclared = (path: string, field: string): string => {
    const normalized = projectPath(root, path, `${at}.${field}`);
    if (!declared.has(normalized)) {
      throw new ParseError(`${at}.${field}: '${normalized}' is not listed in resources`);
    }
    return normalized;
  };

  if (s.cacheable && (s.kind === 'write_file' || s.kind === 'replace')) {
    throw new ParseError(`${at}.cacheable: ${s.kind} steps mutate files and cannot be cached`);
  }
  if (s.cacheable && s.target === undefined) {
    throw new ParseError(`${at}.target: cacheable steps must name the resource their result depends on`);
  }

  const base = {
    index,
    name: s.name ?? `${s.kind}-${index}`,
    parallelGroup: s.parallel_group ?? null,
    cacheable: s.cacheable,
    bestEffort: s.best_effort,
    timeoutMs: s.timeout_seconds === undefined ? null : Math.round(s.timeout_seconds * 1000),
    target: s.target === undefined ? null : mustBeDeclared(s.target, 'target'),
    checkKind: s.check_kind ?? `${s.kind}:${sha256(stableStringify(s.payload)).slice(0, 16)}`
  };

  switch (s.kind) {
    case 'exec':
      return Object.freeze({ ...base, kind: s.kind, payload: Object.freeze({ argv: Object.freeze([...s.payload]) }) });
    case 'write_file':
      return Object.freeze({
        ...base,
        kind: s.kind,
        payload: Object.freeze({ path: mustBeDeclared(s.payload.path, 'payload.path'), content: s.payload.content })
      });
    case 'replace':
      return Object.freeze({
        ...base,
        kind: s.kind,
        payload: Object.freeze({ ...s.payload, path: mustBeDeclared(s.payload.path, 'payload.path') })
      });
    case 'internal': {
      const op = s.payload;
      const payload = 'path' in op ? { ...op, path: projectPath(root, op.path, `${at}.payload.path`) } : { ...op };
      return Object.freeze({ ...base, kind: s.kind, payload: Object.freeze(payload) });
    }
  }
}

function projectPath(root: string, raw: string, where: string): string {
  const res = normalizeProjectPath(root, raw);
  if (!res.ok) throw new ParseError(`${where}: ${res.reason}`);
  return res.path;
}
