import {
  CancelledError,
  countOccurrences,
  stripAnsi,
  type Diagnosis,
  type DiagnosisCategory,
  type DiagnosisScope,
  type FailureMetadata,
  type Logger,
} from '@testmend/shared';
import { failureSignature } from './signature';
import { DEFAULT_RULES, extractExpectation, matchRules, type DiagnosisRule } from './rules';
import { selectPatchKind } from './routing';

/** What the semantic analyzer concludes about a failure the rules could not settle. */
export interface SemanticVerdict {
  category: DiagnosisCategory;
  scope: DiagnosisScope;
  confidence: number;
  token?: string;
  explanation?: string;
}

export interface SemanticAnalysisInput {
  failureText: string;
  metadata: FailureMetadata;
  /** The rule-level diagnosis, when a rule matched */
  ruleDiagnosis?: Diagnosis;
}

/**
 * Collaborator consulted for assertion mismatches and failures no rule
 * recognises. Returning null keeps the rule-level answer.
 */
export interface SemanticAnalyzer {
  refineDiagnosis(input: SemanticAnalysisInput, signal?: AbortSignal): Promise<SemanticVerdict | null>;
}

/** Source of a confidence nudge for signatures seen in earlier runs. */
export interface DiagnosisPrior {
  prior(signature: string): number;
}

export interface DiagnosisClassifierOptions {
  rules?: readonly DiagnosisRule[];
  analyzer?: SemanticAnalyzer;
  knowledge?: DiagnosisPrior;
  logger?: Logger;
}

const AMBIGUOUS_CONFIDENCE = 0.3;
const TIMEOUT_CONFIDENCE = 0.95;

const clamp = (n: number) => Math.min(1, Math.max(0, n));

/**
 * Classifies a failure: signature rules first, then the semantic analyzer
 * for assertion mismatches and unrecognised output, then the knowledge prior.
 * The recommended patch kind is always derived with {@link selectPatchKind}.
 */
export class DiagnosisClassifier {
  private readonly rules: readonly DiagnosisRule[];

  constructor(private readonly options: DiagnosisClassifierOptions = {}) {
    this.rules = options.rules ?? DEFAULT_RULES;
  }

  async classify(
    failureText: string,
    metadata: FailureMetadata,
    signal?: AbortSignal,
  ): Promise<Diagnosis> {
    const text = stripAnsi(failureText);
    const signature = failureSignature(text);

    let verdict = this.ruleVerdict(text, metadata);

    if (!verdict || verdict.category === 'AssertionMismatch') {
      const refined = await this.consultAnalyzer(text, metadata, signature, verdict, signal);
      if (refined) verdict = { ...refined, ruleId: undefined };
    }

    const base = verdict ?? {
      category: 'AmbiguousOrComplex' as const,
      scope: 'FileWide' as const,
      confidence: AMBIGUOUS_CONFIDENCE,
      explanation: 'No known failure signature matched',
    };

    return this.finish(text, metadata, signature, base);
  }

  private ruleVerdict(
    text: string,
    metadata: FailureMetadata,
  ): (SemanticVerdict & { ruleId?: string }) | undefined {
    if (metadata.timedOut) {
      return {
        category: 'EnvironmentError',
        scope: 'FileWide',
        confidence: TIMEOUT_CONFIDENCE,
        ruleId: 'sandbox-timeout',
        explanation: 'The test run exceeded its time limit',
      };
    }
    const match = matchRules(text, this.rules);
    if (!match) return undefined;
    return {
      category: match.rule.category,
      scope: match.rule.scope,
      confidence: match.rule.confidence,
      token: match.token,
      ruleId: match.rule.id,
      explanation: `Matched ${match.rule.id}: ${match.evidence}`,
    };
  }

  private async consultAnalyzer(
    text: string,
    metadata: FailureMetadata,
    signature: string,
    ruleVerdict: (SemanticVerdict & { ruleId?: string }) | undefined,
    signal?: AbortSignal,
  ): Promise<SemanticVerdict | null> {
    const analyzer = this.options.analyzer;
    if (!analyzer) return null;
    try {
      return await analyzer.refineDiagnosis(
        {
          failureText: text,
          metadata,
          ruleDiagnosis: ruleVerdict ? this.finish(text, metadata, signature, ruleVerdict) : undefined,
        },
        signal,
      );
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      const err = error instanceof Error ? error : new Error(String(error));
      await this.options.logger?.warn(
        `Semantic analysis failed for ${metadata.caseId}, keeping rule-level diagnosis: ${err.message}`,
      );
      return null;
    }
  }

  private finish(
    text: string,
    metadata: FailureMetadata,
    signature: string,
    verdict: SemanticVerdict & { ruleId?: string },
  ): Diagnosis {
    const uniqueness =
      verdict.token !== undefined && metadata.targetContent !== undefined
        ? countOccurrences(metadata.targetContent, verdict.token)
        : undefined;
    const confidence = clamp(verdict.confidence + (this.options.knowledge?.prior(signature) ?? 0));
    const expectation =
      verdict.category === 'AssertionMismatch' ? extractExpectation(text) : {};

    return {
      category: verdict.category,
      confidence,
      scope: verdict.scope,
      recommendedPatchKind: selectPatchKind(verdict.category, verdict.scope, uniqueness),
      signature,
      token: verdict.token,
      uniqueness,
      ruleId: verdict.ruleId,
      explanation: verdict.explanation,
      ...expectation,
    };
  }
}
