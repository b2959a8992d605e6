import type { DiagnosisCategory, DiagnosisScope, PatchKind } from '@testmend/shared';

/**
 * Least invasive patch kind that can be applied safely:
 * - a Local failure whose token occurs exactly once gets a TargetedReplace
 * - a MultiLine failure gets a UnifiedDiff
 * - anything else, or an ambiguous category, gets a FullRewrite
 */
export function selectPatchKind(
  category: DiagnosisCategory,
  scope: DiagnosisScope,
  uniqueness: number | undefined,
): PatchKind {
  if (category === 'AmbiguousOrComplex') {
    return 'FullRewrite';
  }
  switch (scope) {
    case 'Local':
      return uniqueness === 1 ? 'TargetedReplace' : 'FullRewrite';
    case 'MultiLine':
      return 'UnifiedDiff';
    case 'FileWide':
      return 'FullRewrite';
  }
}

const NEXT_KIND: Record<PatchKind, PatchKind | null> = {
  TargetedReplace: 'UnifiedDiff',
  UnifiedDiff: 'FullRewrite',
  FullRewrite: null,
};

/** The next more invasive kind, or null after FullRewrite. */
export function escalatePatchKind(kind: PatchKind): PatchKind | null {
  return NEXT_KIND[kind];
}
