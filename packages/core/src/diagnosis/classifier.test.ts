import { SilentLogger, type FailureMetadata } from '@testmend/shared';
import { DiagnosisClassifier, type SemanticAnalyzer } from './classifier';

const meta = (overrides: Partial<FailureMetadata> = {}): FailureMetadata => ({
  caseId: 'case-1',
  selector: 'tests/cart.test.ts',
  ...overrides,
});

describe('DiagnosisClassifier', () => {
  it('recommends a targeted replace for a unique missing import', async () => {
    const classifier = new DiagnosisClassifier();

    const diagnosis = await classifier.classify(
      "Error: Cannot find module './helpr'\nRequire stack:\n- /repo/src/greet.ts",
      meta({ targetContent: "import { helper } from './helpr';\nexport const greet = helper;\n" }),
    );

    expect(diagnosis).toMatchObject({
      category: 'ImportOrNameError',
      scope: 'Local',
      confidence: 0.9,
      token: './helpr',
      uniqueness: 1,
      recommendedPatchKind: 'TargetedReplace',
      ruleId: 'js-relative-module',
    });
    expect(diagnosis.signature).toMatch(/^[0-9a-f]{12}$/);
  });

  it('falls back to a full rewrite when the token is not unique', async () => {
    const diagnosis = await new DiagnosisClassifier().classify(
      "NameError: name 'total' is not defined",
      meta({ targetContent: 'total = 1\nprint(total)\n' }),
    );

    expect(diagnosis.uniqueness).toBe(2);
    expect(diagnosis.recommendedPatchKind).toBe('FullRewrite');
  });

  it('treats a sandbox timeout as an environment error', async () => {
    const diagnosis = await new DiagnosisClassifier().classify('', meta({ timedOut: true }));

    expect(diagnosis).toMatchObject({
      category: 'EnvironmentError',
      confidence: 0.95,
      ruleId: 'sandbox-timeout',
    });
  });

  it('recognises connection failures as environment errors', async () => {
    const diagnosis = await new DiagnosisClassifier().classify(
      'Error: connect ECONNREFUSED 127.0.0.1:5432',
      meta(),
    );

    expect(diagnosis.category).toBe('EnvironmentError');
    expect(diagnosis.ruleId).toBe('econnrefused');
  });

  it('gives assertion mismatches a rule-level diagnosis without an analyzer', async () => {
    const diagnosis = await new DiagnosisClassifier().classify(
      'AssertionError: expected 3 to be 4 // Object.is equality',
      meta(),
    );

    expect(diagnosis).toMatchObject({
      category: 'AssertionMismatch',
      scope: 'MultiLine',
      confidence: 0.65,
      recommendedPatchKind: 'UnifiedDiff',
      expected: '4',
      actual: '3',
    });
  });

  it('extracts Expected/Received pairs', async () => {
    const diagnosis = await new DiagnosisClassifier().classify(
      'expect(received).toBe(expected)\n\n    Expected: 10\n    Received: 12\n',
      meta(),
    );

    expect(diagnosis.expected).toBe('10');
    expect(diagnosis.actual).toBe('12');
  });

  it('marks unrecognised output as ambiguous', async () => {
    const diagnosis = await new DiagnosisClassifier().classify('Segmentation fault', meta());

    expect(diagnosis).toMatchObject({
      category: 'AmbiguousOrComplex',
      confidence: 0.3,
      recommendedPatchKind: 'FullRewrite',
    });
  });

  it('lets the analyzer refine an assertion mismatch', async () => {
    const analyzer: SemanticAnalyzer = {
      refineDiagnosis: vi.fn().mockResolvedValue({
        category: 'AssertionMismatch',
        scope: 'Local',
        confidence: 0.8,
        token: 'rate = 0.2',
        explanation: 'Tax rate constant is wrong',
      }),
    };
    const classifier = new DiagnosisClassifier({ analyzer });

    const diagnosis = await classifier.classify(
      'AssertionError: expected 120 to be 110',
      meta({ targetContent: 'const rate = 0.2;\n' }),
    );

    expect(diagnosis).toMatchObject({
      scope: 'Local',
      confidence: 0.8,
      uniqueness: 1,
      recommendedPatchKind: 'TargetedReplace',
      explanation: 'Tax rate constant is wrong',
    });
    expect(diagnosis.ruleId).toBeUndefined();
    expect(analyzer.refineDiagnosis).toHaveBeenCalledWith(
      expect.objectContaining({
        ruleDiagnosis: expect.objectContaining({ category: 'AssertionMismatch', ruleId: 'assertion' }),
      }),
      undefined,
    );
  });

  it('does not consult the analyzer when a specific rule matched', async () => {
    const analyzer: SemanticAnalyzer = { refineDiagnosis: vi.fn() };

    await new DiagnosisClassifier({ analyzer }).classify(
      'ReferenceError: total is not defined',
      meta(),
    );

    expect(analyzer.refineDiagnosis).not.toHaveBeenCalled();
  });

  it('keeps the rule-level answer when the analyzer fails', async () => {
    const logger = new SilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const analyzer: SemanticAnalyzer = {
      refineDiagnosis: vi.fn().mockRejectedValue(new Error('provider down')),
    };

    const diagnosis = await new DiagnosisClassifier({ analyzer, logger }).classify(
      'AssertionError: expected 3 to be 4',
      meta(),
    );

    expect(diagnosis.category).toBe('AssertionMismatch');
    expect(diagnosis.confidence).toBe(0.65);
    expect(warn).toHaveBeenCalledWith(
      'Semantic analysis failed for case-1, keeping rule-level diagnosis: provider down',
    );
  });

  it('applies the knowledge prior and clamps to [0, 1]', async () => {
    const down = new DiagnosisClassifier({ knowledge: { prior: () => -0.1 } });
    const up = new DiagnosisClassifier({ knowledge: { prior: () => 0.1 } });

    const lowered = await down.classify('ReferenceError: x is not defined', meta());
    const raised = await up.classify('', meta({ timedOut: true }));

    expect(lowered.confidence).toBeCloseTo(0.8);
    expect(raised.confidence).toBe(1);
  });
});
