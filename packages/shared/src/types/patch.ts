/**
 * Structural kind of a patch, ordered from least to most invasive.
 */
export type PatchKind = 'TargetedReplace' | 'UnifiedDiff' | 'FullRewrite';

export const PATCH_KINDS: readonly PatchKind[] = ['TargetedReplace', 'UnifiedDiff', 'FullRewrite'];

/**
 * Exact old/new text pair. Valid only while `oldText` occurs once in the file.
 */
export interface TargetedReplacePayload {
  kind: 'TargetedReplace';
  oldText: string;
  newText: string;
}

/**
 * Contextual line-level hunks against a single file.
 */
export interface UnifiedDiffPayload {
  kind: 'UnifiedDiff';
  diff: string;
}

/**
 * Complete replacement content for the file.
 */
export interface FullRewritePayload {
  kind: 'FullRewrite';
  content: string;
}

export type PatchPayload = TargetedReplacePayload | UnifiedDiffPayload | FullRewritePayload;

/**
 * A proposed change to one file of the source tree.
 */
export interface Patch {
  id: string;
  kind: PatchKind;
  /** Path relative to the source root */
  targetFile: string;
  payload: PatchPayload;
  confidence: number;
}

/**
 * Classification of patch validation and application errors.
 */
export type PatchErrorKind =
  | 'NOT_FOUND'
  | 'AMBIGUOUS'
  | 'HUNK_FAILED'
  | 'INVALID_PATCH'
  | 'EMPTY_CONTENT'
  | 'FILE_NOT_FOUND'
  | 'UNSAFE_PATH'
  | 'BINARY_FILE'
  | 'LIMIT'
  | 'KIND_MISMATCH'
  | 'POST_APPLY_MISMATCH';

/**
 * Detailed information about a validation problem.
 */
export interface PatchApplyErrorDetail {
  kind: PatchErrorKind;
  message: string;
  /** 1-indexed line in the target file or diff */
  line?: number;
  suggestion?: string;
}

export type ValidationResult =
  | {
      valid: true;
      /** File content after the patch */
      result: string;
    }
  | {
      valid: false;
      kind: PatchErrorKind;
      errors: PatchApplyErrorDetail[];
    };

/**
 * A patch that has been written to disk, with the snapshot needed to undo it.
 */
export interface AppliedPatch {
  patch: Patch;
  /** Absolute path of the written file */
  absolutePath: string;
  /** Exact pre-apply bytes; `null` when the file did not exist */
  snapshot: Buffer | null;
  content: string;
  appliedAt: string;
  rolledBackAt?: string;
}
