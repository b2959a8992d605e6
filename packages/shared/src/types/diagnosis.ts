import type { PatchKind } from './patch';

export type DiagnosisCategory =
  | 'ImportOrNameError'
  | 'EnvironmentError'
  | 'AssertionMismatch'
  | 'MockOrFixtureError'
  | 'AmbiguousOrComplex';

export const DIAGNOSIS_CATEGORIES: readonly DiagnosisCategory[] = [
  'ImportOrNameError',
  'EnvironmentError',
  'AssertionMismatch',
  'MockOrFixtureError',
  'AmbiguousOrComplex',
];

/**
 * How far a fix is expected to reach.
 * - Local: a single unique token or line
 * - MultiLine: contained in one function or block
 * - FileWide: structural, or several locations
 */
export type DiagnosisScope = 'Local' | 'MultiLine' | 'FileWide';

/**
 * Classified root cause of a failure with the remedy it recommends.
 */
export interface Diagnosis {
  category: DiagnosisCategory;
  /** In [0, 1] */
  confidence: number;
  scope: DiagnosisScope;
  recommendedPatchKind: PatchKind;
  signature: string;
  /** Identifier or fragment the failure points at, when one could be extracted */
  token?: string;
  /** Occurrences of `token` in the target file */
  uniqueness?: number;
  /** Rule that matched, absent when the semantic analyzer decided */
  ruleId?: string;
  explanation?: string;
  expected?: string;
  actual?: string;
}

/**
 * Test metadata handed to the classifier together with the failure text.
 */
export interface FailureMetadata {
  caseId: string;
  selector: string;
  testFile?: string;
  targetFile?: string;
  /** Content of the target file at diagnosis time */
  targetContent?: string;
  timedOut?: boolean;
  intent?: string;
}
