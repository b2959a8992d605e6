import type { DiagnosisCategory, DiagnosisScope } from '@testmend/shared';

/**
 * A known failure signature. Rules are tried in order; the first match wins.
 */
export interface DiagnosisRule {
  id: string;
  category: DiagnosisCategory;
  scope: DiagnosisScope;
  confidence: number;
  pattern: RegExp;
  /** Capture group holding the failing identifier or fragment */
  tokenGroup?: number;
}

export interface RuleMatch {
  rule: DiagnosisRule;
  token?: string;
  /** The matched text */
  evidence: string;
}

const importRule = (id: string, pattern: RegExp, confidence = 0.9): DiagnosisRule => ({
  id,
  category: 'ImportOrNameError',
  scope: 'Local',
  confidence,
  pattern,
  tokenGroup: 1,
});

const environmentRule = (id: string, pattern: RegExp, tokenGroup?: number): DiagnosisRule => ({
  id,
  category: 'EnvironmentError',
  scope: 'FileWide',
  confidence: 0.85,
  pattern,
  tokenGroup,
});

const mockRule = (id: string, pattern: RegExp, tokenGroup?: number): DiagnosisRule => ({
  id,
  category: 'MockOrFixtureError',
  scope: 'MultiLine',
  confidence: 0.75,
  pattern,
  tokenGroup,
});

export const DEFAULT_RULES: readonly DiagnosisRule[] = [
  // Missing names and imports
  importRule('py-name-error', /NameError: name '([^']+)' is not defined/),
  importRule('py-import-name', /ImportError: cannot import name '([^']+)'/),
  importRule('py-module-not-found', /ModuleNotFoundError: No module named '([^']+)'/, 0.85),
  importRule('js-reference-error', /ReferenceError: ([\w$]+) is not defined/),
  importRule('js-relative-module', /Cannot find module '(\.{1,2}\/[^']+)'/),
  importRule('ts-cannot-find-name', /error TS2304: Cannot find name '([^']+)'/),
  importRule('ts-no-exported-member', /has no exported member (?:named )?'([^']+)'/),
  importRule('esm-missing-export', /does not provide an export named '([^']+)'/),
  importRule('js-not-a-function', /TypeError: ([\w$.]+) is not a function/, 0.8),

  // Environment and setup
  environmentRule('timeout', /timed out|Timeout of \d+ms exceeded|Test timed out in \d+ms/i),
  environmentRule('econnrefused', /ECONNREFUSED/),
  environmentRule('eaddrinuse', /EADDRINUSE/),
  environmentRule(
    'command-not-found',
    /command not found|is not recognized as an internal or external command|spawn \S+ ENOENT/,
  ),
  environmentRule('eacces', /EACCES|Permission denied/),
  environmentRule('enospc', /ENOSPC|No space left on device/),
  environmentRule('missing-dependency', /Cannot find (?:module|package) '([^.'\/][^']*)'/, 1),

  // Mocks and fixtures
  mockRule('pytest-fixture', /fixture '([^']+)' not found/, 1),
  mockRule('mock-attribute', /AttributeError: .*Mock.* has no attribute '([^']+)'/, 1),
  mockRule(
    'mock-not-called',
    /expected "(?:spy|vi\.fn\(\)|mock\w*)" to (?:be|have been) called|expect\(jest\.fn\(\)\)\.toHaveBeen\w+/i,
  ),
  mockRule('hook-failed', /"(?:before|after) (?:each|all)" hook|Hook (?:beforeEach|beforeAll) failed/),

  // Assertion mismatches are only recognised here; the semantic analyzer refines them
  {
    id: 'assertion',
    category: 'AssertionMismatch',
    scope: 'MultiLine',
    confidence: 0.65,
    pattern: /AssertionError|AssertionFailedError|expected .+ to (?:be|equal|deeply equal|strictly equal)|Expected:|assert .+ ==/,
  },
];

export function matchRules(
  text: string,
  rules: readonly DiagnosisRule[] = DEFAULT_RULES,
): RuleMatch | undefined {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (!match) continue;
    const token = rule.tokenGroup !== undefined ? match[rule.tokenGroup] : undefined;
    return { rule, token, evidence: match[0] };
  }
  return undefined;
}

const EXPECTATION_PATTERNS: readonly RegExp[] = [
  /expected (.+?) to (?:be|equal|deeply equal|strictly equal) (.+?)(?:\s+\/\/.*)?$/m,
  /Expected:\s*(.+?)\s*[\r\n]+\s*Received:\s*(.+)$/m,
  /Expected:\s*(.+?)\s*[\r\n]+\s*(?:Got|Actual):\s*(.+)$/im,
  /assert\s+(.+?)\s*==\s*(.+)$/m,
];

/**
 * Pulls the expected and actual values out of an assertion message.
 * `expected X to be Y` names the actual value first.
 */
export function extractExpectation(text: string): { expected?: string; actual?: string } {
  for (const [index, pattern] of EXPECTATION_PATTERNS.entries()) {
    const match = pattern.exec(text);
    if (!match) continue;
    const first = match[1].trim();
    const second = match[2].trim();
    return index === 0 ? { expected: second, actual: first } : { expected: first, actual: second };
  }
  return {};
}
