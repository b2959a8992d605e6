import type { DiagnosisCategory, DiagnosisScope, Diagnosis } from './diagnosis';
import type { PatchPayload, PatchKind } from './patch';

/**
 * Lifecycle status of a test case.
 */
export type CaseStatus =
  | 'Pending'
  | 'Generating'
  | 'Verifying'
  | 'Passed'
  | 'Failed'
  | 'Healing'
  | 'Escalated'
  | 'Skipped'
  | 'FlaggedBug'
  | 'ExpectedFailure';

export const CASE_STATUSES: readonly CaseStatus[] = [
  'Pending',
  'Generating',
  'Verifying',
  'Passed',
  'Failed',
  'Healing',
  'Escalated',
  'Skipped',
  'FlaggedBug',
  'ExpectedFailure',
];

/** Statuses that remove a case from scheduling for good. */
export const FINAL_STATUSES: ReadonlySet<CaseStatus> = new Set<CaseStatus>([
  'Passed',
  'Skipped',
  'FlaggedBug',
  'ExpectedFailure',
]);

/** Statuses at which the execution engine stops working on a case. */
export const ENGINE_TERMINAL_STATUSES: ReadonlySet<CaseStatus> = new Set<CaseStatus>([
  ...FINAL_STATUSES,
  'Escalated',
]);

export type Verdict = 'fix' | 'flag_bug' | 'skip' | 'keep_as_expected_failure';

export const VERDICTS: readonly Verdict[] = ['fix', 'flag_bug', 'skip', 'keep_as_expected_failure'];

export type EscalationReason =
  | 'retries_exhausted'
  | 'low_confidence'
  | 'no_viable_patch'
  | 'collaborator_error';

/**
 * Structured record of the most recent failure of a case.
 */
export interface FailureRecord {
  /** Combined, truncated stderr/stdout of the failing run */
  text: string;
  /** Normalized failure signature (see diagnosis) */
  signature: string;
  category?: DiagnosisCategory;
  scope?: DiagnosisScope;
  confidence?: number;
  timedOut: boolean;
  /** ISO 8601 */
  at: string;
}

/**
 * Patch detail kept on the case for audit. `patchesApplied` holds the ids in order.
 */
export interface PatchRecord {
  id: string;
  kind: PatchKind;
  targetFile: string;
  confidence: number;
  origin: 'auto' | 'manual';
  appliedAt: string;
  rolledBackAt?: string;
}

/**
 * A patch proposed by a human while resolving an escalation, waiting to be applied.
 */
export interface ManualPatch {
  kind: PatchKind;
  targetFile: string;
  payload: PatchPayload;
}

export interface EscalationInfo {
  reason: EscalationReason;
  at: string;
  message?: string;
  diagnosis?: Diagnosis;
}

/**
 * One unit of work in a run.
 */
export interface TestCase {
  id: string;
  status: CaseStatus;
  /** Higher runs first */
  priority: number;
  /** Position in the batch the case was first inserted from; breaks priority ties */
  insertionIndex: number;
  retryCount: number;
  /** Test selector handed to the sandbox runner */
  selector: string;
  /** Test file the case lives in, relative to the source root */
  testFile?: string;
  /** Test code to materialize into `testFile` while generating */
  testCode?: string;
  /** Source file under test, relative to the source root */
  targetFile?: string;
  intent?: string;
  dependsOn: string[];
  /** Declared shared resources; cases sharing one never run concurrently */
  resources: string[];
  lastFailure?: FailureRecord;
  /** Append-only, in apply order */
  patchesApplied: string[];
  patches: PatchRecord[];
  escalation?: EscalationInfo;
  pendingManualPatch?: ManualPatch;
  verdict?: Verdict;
  updatedAt: string;
}

/**
 * One verification attempt, retained for audit.
 */
export interface ExecutionRecord {
  attempt: number;
  at: string;
  passed: boolean;
  durationMs: number;
  timedOut: boolean;
  exitCode?: number;
  stdoutTail: string;
  stderrTail: string;
  category?: DiagnosisCategory;
}

/**
 * A candidate test case as it arrives from upstream generation.
 */
export interface CaseSeed {
  id: string;
  selector: string;
  priority?: number;
  dependsOn?: string[];
  resources?: string[];
  testFile?: string;
  testCode?: string;
  targetFile?: string;
  intent?: string;
}
