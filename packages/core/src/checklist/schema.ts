import { z } from 'zod';
import {
  CASE_STATUSES,
  DIAGNOSIS_CATEGORIES,
  PATCH_KINDS,
  VERDICTS,
  type CaseStatus,
  type DiagnosisCategory,
  type PatchKind,
  type Verdict,
} from '@testmend/shared';

export const CHECKLIST_SCHEMA_VERSION = 1;

const nonEmpty = <T extends string>(values: readonly T[]): [T, ...T[]] => {
  const [first, ...rest] = values;
  if (first === undefined) {
    throw new Error('enum needs at least one value');
  }
  return [first, ...rest];
};

const CaseStatusSchema = z.enum(nonEmpty<CaseStatus>(CASE_STATUSES));
const CategorySchema = z.enum(nonEmpty<DiagnosisCategory>(DIAGNOSIS_CATEGORIES));
const PatchKindSchema = z.enum(nonEmpty<PatchKind>(PATCH_KINDS));
const VerdictSchema = z.enum(nonEmpty<Verdict>(VERDICTS));
const ScopeSchema = z.enum(['Local', 'MultiLine', 'FileWide']);

export const PatchPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('TargetedReplace'), oldText: z.string(), newText: z.string() }),
  z.object({ kind: z.literal('UnifiedDiff'), diff: z.string() }),
  z.object({ kind: z.literal('FullRewrite'), content: z.string() }),
]);

const DiagnosisSchema = z.object({
  category: CategorySchema,
  confidence: z.number().min(0).max(1),
  scope: ScopeSchema,
  recommendedPatchKind: PatchKindSchema,
  signature: z.string(),
  token: z.string().optional(),
  uniqueness: z.number().int().nonnegative().optional(),
  ruleId: z.string().optional(),
  explanation: z.string().optional(),
  expected: z.string().optional(),
  actual: z.string().optional(),
});

const FailureRecordSchema = z.object({
  text: z.string(),
  signature: z.string(),
  category: CategorySchema.optional(),
  scope: ScopeSchema.optional(),
  confidence: z.number().optional(),
  timedOut: z.boolean(),
  at: z.string(),
});

const PatchRecordSchema = z.object({
  id: z.string(),
  kind: PatchKindSchema,
  targetFile: z.string(),
  confidence: z.number(),
  origin: z.enum(['auto', 'manual']),
  appliedAt: z.string(),
  rolledBackAt: z.string().optional(),
});

export const ManualPatchSchema = z.object({
  kind: PatchKindSchema,
  targetFile: z.string().min(1),
  payload: PatchPayloadSchema,
});

export const TestCaseSchema = z.object({
  id: z.string().min(1),
  status: CaseStatusSchema,
  priority: z.number(),
  insertionIndex: z.number().int().nonnegative(),
  retryCount: z.number().int().nonnegative(),
  selector: z.string(),
  testFile: z.string().optional(),
  testCode: z.string().optional(),
  targetFile: z.string().optional(),
  intent: z.string().optional(),
  dependsOn: z.array(z.string()),
  resources: z.array(z.string()),
  lastFailure: FailureRecordSchema.optional(),
  patchesApplied: z.array(z.string()),
  patches: z.array(PatchRecordSchema),
  escalation: z
    .object({
      reason: z.enum(['retries_exhausted', 'low_confidence', 'no_viable_patch', 'collaborator_error']),
      at: z.string(),
      message: z.string().optional(),
      diagnosis: DiagnosisSchema.optional(),
    })
    .optional(),
  pendingManualPatch: ManualPatchSchema.optional(),
  verdict: VerdictSchema.optional(),
  updatedAt: z.string(),
});

export const ExecutionRecordSchema = z.object({
  attempt: z.number().int().positive(),
  at: z.string(),
  passed: z.boolean(),
  durationMs: z.number().nonnegative(),
  timedOut: z.boolean(),
  exitCode: z.number().int().optional(),
  stdoutTail: z.string(),
  stderrTail: z.string(),
  category: CategorySchema.optional(),
});

export const ChecklistEntrySchema = TestCaseSchema.extend({
  history: z.array(ExecutionRecordSchema),
});

export const ChecklistDocumentSchema = z.object({
  schemaVersion: z.literal(CHECKLIST_SCHEMA_VERSION),
  runId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  cases: z.record(ChecklistEntrySchema),
});

export type ChecklistEntry = z.infer<typeof ChecklistEntrySchema>;
export type ChecklistDocument = z.infer<typeof ChecklistDocumentSchema>;
