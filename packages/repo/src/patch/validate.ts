import {
  countOccurrences,
  normalizePath,
  type Patch,
  type PatchApplyErrorDetail,
  type PatchErrorKind,
  type ValidationResult,
} from '@testmend/shared';
import { applyHunks, parseUnifiedDiff } from './diff';

export interface ValidateOptions {
  /** Lines of drift tolerated when locating a hunk */
  fuzz?: number;
  /** Upper bound on added plus removed lines of a diff */
  maxLinesTouched?: number;
}

function fail(kind: PatchErrorKind, message: string, suggestion?: string): ValidationResult {
  return { valid: false, kind, errors: [{ kind, message, suggestion }] };
}

function failAll(errors: PatchApplyErrorDetail[]): ValidationResult {
  return { valid: false, kind: errors[0]?.kind ?? 'INVALID_PATCH', errors };
}

/**
 * Checks a patch against the current content of its target and computes the
 * resulting content. Pure: never touches the file system.
 *
 * @param content - Current target content, `null` when the file does not exist
 */
export function validatePatch(
  patch: Patch,
  content: string | null,
  options: ValidateOptions = {},
): ValidationResult {
  const { fuzz = 2, maxLinesTouched = 400 } = options;
  const { payload } = patch;

  if (payload.kind !== patch.kind) {
    return fail('KIND_MISMATCH', `Patch kind ${patch.kind} carries a ${payload.kind} payload`);
  }

  switch (payload.kind) {
    case 'TargetedReplace': {
      if (content === null) {
        return fail('FILE_NOT_FOUND', `Target file does not exist: ${patch.targetFile}`);
      }
      if (payload.oldText === '') {
        return fail('INVALID_PATCH', 'Replacement anchor is empty');
      }
      const occurrences = countOccurrences(content, payload.oldText);
      if (occurrences === 0) {
        return fail(
          'NOT_FOUND',
          `Old text not found in ${patch.targetFile}`,
          'Copy the old text exactly from the current file, including whitespace.',
        );
      }
      if (occurrences > 1) {
        return fail(
          'AMBIGUOUS',
          `Old text occurs ${occurrences} times in ${patch.targetFile}`,
          'Widen the old text until it is unique, or send a unified diff.',
        );
      }
      const at = content.indexOf(payload.oldText);
      return ensureChange(
        content,
        content.slice(0, at) + payload.newText + content.slice(at + payload.oldText.length),
      );
    }

    case 'UnifiedDiff': {
      const parsed = parseUnifiedDiff(payload.diff);
      if (!parsed.ok) return failAll(parsed.errors);
      const { diff } = parsed;

      if (diff.newPath && diff.newPath !== '/dev/null') {
        if (normalizePath(diff.newPath) !== normalizePath(patch.targetFile)) {
          return fail(
            'INVALID_PATCH',
            `Diff targets ${diff.newPath} but the patch targets ${patch.targetFile}`,
          );
        }
      }
      if (diff.linesTouched > maxLinesTouched) {
        return fail(
          'LIMIT',
          `Too many lines touched (${diff.linesTouched} > ${maxLinesTouched})`,
          'Split the change or send a full rewrite.',
        );
      }
      if (content === null && !diff.createsFile) {
        return fail('FILE_NOT_FOUND', `Target file does not exist: ${patch.targetFile}`);
      }

      const applied = applyHunks(content ?? '', diff.hunks, fuzz);
      if (!applied.ok) return failAll(applied.errors);
      return ensureChange(content ?? '', applied.result);
    }

    case 'FullRewrite': {
      if (payload.content.trim() === '') {
        return fail('EMPTY_CONTENT', 'Full rewrite content is empty');
      }
      return ensureChange(content ?? '', payload.content);
    }
  }
}

function ensureChange(before: string, after: string): ValidationResult {
  if (before === after) {
    return fail('INVALID_PATCH', 'Patch does not change the file');
  }
  return { valid: true, result: after };
}
