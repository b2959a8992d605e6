import type { ChatMessage, PatchKind } from '@testmend/shared';
import type { SemanticAnalysisInput } from '../diagnosis/classifier';
import type { DraftPatchInput, ProposeTestInput } from './types';

const MAX_FILE_CHARS = 12_000;
const MAX_FAILURE_CHARS = 6_000;

function clip(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max)}\n... [${text.length - max} more characters]`;
}

function fenced(label: string, content: string | null | undefined, max = MAX_FILE_CHARS): string {
  if (content === null || content === undefined) return `${label}: (file does not exist)`;
  return `${label}:\n\`\`\`\n${clip(content, max)}\n\`\`\``;
}

export function buildProposeTestMessages(input: ProposeTestInput): ChatMessage[] {
  const { testCase } = input;
  const system = `You write a single automated test file for an existing codebase.

Rules:
1. Return only the test file content; do not change the code under test.
2. The test must be runnable with the selector "${testCase.selector}".
3. Output JSON of the form {"testCode": "<full file content>"}. Use {"testCode": ""} when you cannot write the test.`;

  const parts = [
    `Test file: ${testCase.testFile ?? '(unspecified)'}`,
    testCase.intent ? `Intent: ${testCase.intent}` : undefined,
    testCase.targetFile ? fenced(`Code under test (${testCase.targetFile})`, input.targetContent) : undefined,
  ].filter((p): p is string => p !== undefined);

  return [
    { role: 'system', content: system },
    { role: 'user', content: parts.join('\n\n') },
  ];
}

export function buildDiagnosisMessages(input: SemanticAnalysisInput): ChatMessage[] {
  const system = `You classify the root cause of a failing test.

Categories: ImportOrNameError, EnvironmentError, AssertionMismatch, MockOrFixtureError, AmbiguousOrComplex.
Scopes: Local (one unique token or line), MultiLine (one function or block), FileWide (structural or several places).

Output JSON: {"category": ..., "scope": ..., "confidence": <0..1>, "token": "<exact failing fragment from the target file, optional>", "explanation": "<one sentence>"}.
Only give a token that appears verbatim in the target file.`;

  const { metadata, ruleDiagnosis } = input;
  const parts = [
    `Case: ${metadata.caseId} (selector ${metadata.selector})`,
    metadata.intent ? `Intent: ${metadata.intent}` : undefined,
    ruleDiagnosis
      ? `Rule-based guess: ${ruleDiagnosis.category}/${ruleDiagnosis.scope} at ${ruleDiagnosis.confidence}`
      : undefined,
    `Failure output:\n\`\`\`\n${clip(input.failureText, MAX_FAILURE_CHARS)}\n\`\`\``,
    metadata.targetFile ? fenced(`Target file (${metadata.targetFile})`, metadata.targetContent) : undefined,
  ].filter((p): p is string => p !== undefined);

  return [
    { role: 'system', content: system },
    { role: 'user', content: parts.join('\n\n') },
  ];
}

const KIND_INSTRUCTIONS: Record<PatchKind, string> = {
  TargetedReplace:
    '{"oldText": "<fragment occurring exactly once in the file>", "newText": "<replacement>"}',
  UnifiedDiff:
    '{"diff": "<unified diff against the file, with @@ hunk headers and at least 2 lines of context>"}',
  FullRewrite: '{"content": "<complete new file content>"}',
};

export function buildDraftPatchMessages(input: DraftPatchInput, kind: PatchKind): ChatMessage[] {
  const system = `You repair a failing test with the smallest change that makes it pass.

Patch kind: ${kind}
Target file: ${input.targetFile}

Output JSON with these fields: ${KIND_INSTRUCTIONS[kind].slice(0, -1)}, "confidence": <0..1>, "rationale": "<one sentence>"}.
Output {"noPatch": true} when no safe patch of this kind exists. Never touch other files.`;

  const { diagnosis, testCase } = input;
  const parts = [
    `Diagnosis: ${diagnosis.category} (${diagnosis.scope}, confidence ${diagnosis.confidence})`,
    diagnosis.explanation ? `Explanation: ${diagnosis.explanation}` : undefined,
    diagnosis.token ? `Failing fragment: ${diagnosis.token}` : undefined,
    diagnosis.expected !== undefined ? `Expected: ${diagnosis.expected}` : undefined,
    diagnosis.actual !== undefined ? `Actual: ${diagnosis.actual}` : undefined,
    testCase.intent ? `Test intent: ${testCase.intent}` : undefined,
    input.rejection ? `Your previous draft was rejected: ${input.rejection}` : undefined,
    `Failure output:\n\`\`\`\n${clip(input.failureText, MAX_FAILURE_CHARS)}\n\`\`\``,
    fenced(`Target file (${input.targetFile})`, input.targetContent),
    testCase.testFile && testCase.testFile !== input.targetFile && input.testContent !== undefined
      ? fenced(`Test file (${testCase.testFile})`, input.testContent)
      : undefined,
  ].filter((p): p is string => p !== undefined);

  return [
    { role: 'system', content: system },
    { role: 'user', content: parts.join('\n\n') },
  ];
}
