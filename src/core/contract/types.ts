import { z } from 'zod';

export const STEP_KINDS = ['exec', 'write_file', 'replace', 'internal'] as const;
export type StepKind = (typeof STEP_KINDS)[number];

// ── Document schema (what a contract file may contain) ─────────────────────
// Every object is `.strict()`: unknown keys are rejected, never dropped.

export const TaskId = z
  .string()
  .min(1)
  .refine((s) => !/[\\/]/.test(s), { message: 'id must not contain path separators' })
  .refine((s) => s !== '.' && s !== '..', { message: 'id must not be a relative path segment' });

const ProjectPath = z.string().min(1);

/**
 * `exec` payloads are argument vectors. A single string would need a shell to split it,
 * so it is refused here, before the security gate ever sees the step.
 */
export const ExecPayload = z
  .array(z.string().min(1), {
    invalid_type_error: 'exec payload must be a list of strings (argument vector), not a single string'
  })
  .min(1);

export const WriteFilePayload = z
  .object({
    path: ProjectPath,
    content: z.string()
  })
  .strict();

export const ReplacePayload = z
  .object({
    path: ProjectPath,
    search: z.string().min(1),
    replace: z.string(),
    all: z.boolean().default(true)
  })
  .strict();

export const InternalPayload = z.discriminatedUnion('op', [
  z.object({ op: z.literal('noop') }).strict(),
  z.object({ op: z.literal('sleep'), ms: z.number().int().nonnegative() }).strict(),
  z.object({ op: z.literal('checksum'), path: ProjectPath }).strict(),
  z.object({ op: z.literal('assert_exists'), path: ProjectPath }).strict(),
  z.object({ op: z.literal('assert_contains'), path: ProjectPath, text: z.string().min(1) }).strict()
]);

const stepCommon = {
  name: z.string().min(1).optional(),
  parallel_group: z.number().int().nonnegative().optional(),
  cacheable: z.boolean().default(false),
  best_effort: z.boolean().default(false),
  timeout_seconds: z.number().positive().optional(),
  /** Resource whose content hash keys the verification cache. */
  target: ProjectPath.optional(),
  check_kind: z.string().min(1).optional()
};

export const StepDocument = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exec'), payload: ExecPayload, ...stepCommon }).strict(),
  z.object({ kind: z.literal('write_file'), payload: WriteFilePayload, ...stepCommon }).strict(),
  z.object({ kind: z.literal('replace'), payload: ReplacePayload, ...stepCommon }).strict(),
  z.object({ kind: z.literal('internal'), payload: InternalPayload, ...stepCommon }).strict()
]);

export const ContractDocument = z
  .object({
    id: TaskId,
    title: z.string().min(1),
    description: z.string().optional(),
    resources: z.array(ProjectPath).default([]),
    gates: z.array(z.string().min(1)).default([]),
    secrets_required: z
      .array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'secret names must be environment variable names'))
      .default([]),
    /** Local TCP ports nothing may be listening on when the run starts. */
    ports_should_be_free: z.array(z.number().int().min(1).max(65_535)).default([]),
    /** Project-relative glob patterns; matching files are hashed into the record. */
    evidence: z.array(z.string().min(1)).default([]),
    steps: z.array(StepDocument).min(1)
  })
  .strict();

export type ContractDocument = z.infer<typeof ContractDocument>;
export type StepDocument = z.infer<typeof StepDocument>;
export type InternalOp = z.infer<typeof InternalPayload>;

// ── Parsed model ────────────────────────────────────────────────────────────

interface StepBase {
  /** Position in the contract's `steps` list. */
  readonly index: number;
  readonly name: string;
  readonly parallelGroup: number | null;
  readonly cacheable: boolean;
  readonly bestEffort: boolean;
  readonly timeoutMs: number | null;
  /** Normalized project-relative path; set whenever `cacheable` is true. */
  readonly target: string | null;
  readonly checkKind: string;
}

export interface ExecStep extends StepBase {
  readonly kind: 'exec';
  readonly payload: { readonly argv: readonly string[] };
}

export interface WriteFileStep extends StepBase {
  readonly kind: 'write_file';
  readonly payload: { readonly path: string; readonly content: string };
}

export interface ReplaceStep extends StepBase {
  readonly kind: 'replace';
  readonly payload: { readonly path: string; readonly search: string; readonly replace: string; readonly all: boolean };
}

export interface InternalStep extends StepBase {
  readonly kind: 'internal';
  readonly payload: Readonly<InternalOp>;
}

export type Step = ExecStep | WriteFileStep | ReplaceStep | InternalStep;

export interface TaskContract {
  readonly id: string;
  readonly title: string;
  readonly description: string | null;
  /** Sorted, de-duplicated, project-relative POSIX paths. */
  readonly resources: readonly string[];
  readonly gates: readonly string[];
  readonly secretsRequired: readonly string[];
  /** Sorted, de-duplicated. */
  readonly portsShouldBeFree: readonly number[];
  readonly evidence: readonly string[];
  readonly steps: readonly Step[];
}
