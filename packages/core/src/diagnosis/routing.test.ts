import { escalatePatchKind, selectPatchKind } from './routing';

describe('selectPatchKind', () => {
  it.each([
    ['ImportOrNameError', 'Local', 1, 'TargetedReplace'],
    ['ImportOrNameError', 'Local', 0, 'FullRewrite'],
    ['ImportOrNameError', 'Local', 2, 'FullRewrite'],
    ['ImportOrNameError', 'Local', undefined, 'FullRewrite'],
    ['AssertionMismatch', 'MultiLine', undefined, 'UnifiedDiff'],
    ['MockOrFixtureError', 'MultiLine', 3, 'UnifiedDiff'],
    ['EnvironmentError', 'FileWide', undefined, 'FullRewrite'],
    ['AmbiguousOrComplex', 'Local', 1, 'FullRewrite'],
  ] as const)('%s/%s/%s -> %s', (category, scope, uniqueness, expected) => {
    expect(selectPatchKind(category, scope, uniqueness)).toBe(expected);
  });
});

describe('escalatePatchKind', () => {
  it('walks from least to most invasive', () => {
    expect(escalatePatchKind('TargetedReplace')).toBe('UnifiedDiff');
    expect(escalatePatchKind('UnifiedDiff')).toBe('FullRewrite');
    expect(escalatePatchKind('FullRewrite')).toBeNull();
  });
});
