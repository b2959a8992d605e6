import {
  EscalationError,
  makeEvent,
  type Diagnosis,
  type EscalationReason,
  type EventBus,
  type FailureRecord,
  type ManualPatch,
  type TestCase,
  type Verdict,
} from '@testmend/shared';
import type { ChecklistStore } from '../checklist/types';
import { assertTransition } from '../engine/state_machine';

/** A case waiting for a human decision. */
export interface EscalationRequest {
  caseId: string;
  reason: EscalationReason;
  retryCount: number;
  at: string;
  message?: string;
  diagnosis?: Diagnosis;
  lastFailure?: FailureRecord;
  /** The committed Escalated case */
  testCase: TestCase;
}

export interface EscalationDecision {
  verdict: Verdict;
  manualPatch?: ManualPatch;
}

/**
 * Source of human decisions, such as an interactive prompt. The engine
 * awaits it in the background; other cases keep running meanwhile.
 */
export interface EscalationReviewer {
  review(request: EscalationRequest, signal?: AbortSignal): Promise<EscalationDecision>;
}

export interface EscalationControllerOptions {
  store: ChecklistStore;
  runId: string;
  maxRetries: number;
  bus?: EventBus;
  clock?: () => Date;
}

const VERDICT_STATUS = {
  fix: 'Healing',
  flag_bug: 'FlaggedBug',
  skip: 'Skipped',
  keep_as_expected_failure: 'ExpectedFailure',
} as const satisfies Record<Verdict, TestCase['status']>;

/**
 * Hands cases to a human and records their verdicts. Nothing is ever
 * resolved without an explicit verdict.
 */
export class EscalationController {
  private readonly clock: () => Date;

  constructor(private readonly options: EscalationControllerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async escalate(
    testCase: TestCase,
    reason: EscalationReason,
    diagnosis?: Diagnosis,
    message?: string,
  ): Promise<EscalationRequest> {
    assertTransition(testCase.id, testCase.status, 'Escalated');
    const at = this.clock().toISOString();
    const next: TestCase = {
      ...testCase,
      status: 'Escalated',
      escalation: { reason, at, message, diagnosis },
      verdict: undefined,
      updatedAt: at,
    };
    await this.options.store.save(next);

    await this.emitTransition(testCase, next);
    await this.options.bus?.emit(
      makeEvent(this.options.runId, {
        type: 'CaseEscalated',
        payload: {
          caseId: next.id,
          reason,
          retryCount: next.retryCount,
          signature: diagnosis?.signature ?? next.lastFailure?.signature,
          category: diagnosis?.category ?? next.lastFailure?.category,
        },
      }),
    );

    return toRequest(next);
  }

  /**
   * Records a verdict. `fix` re-enters Healing: with a manual patch, that
   * patch is applied next without using a retry; without one, automated
   * healing continues, which needs retries left.
   *
   * @throws EscalationError when the case is unknown, not escalated, or a
   *   patchless `fix` has no retries left
   */
  async resolve(caseId: string, verdict: Verdict, manualPatch?: ManualPatch): Promise<TestCase> {
    const current = await this.options.store.get(caseId);
    if (!current) {
      throw new EscalationError(`Unknown case "${caseId}"`);
    }
    if (current.status !== 'Escalated') {
      throw new EscalationError(`Case "${caseId}" is ${current.status}, not Escalated`);
    }
    if (manualPatch && verdict !== 'fix') {
      throw new EscalationError(`A manual patch can only accompany the fix verdict`);
    }
    if (verdict === 'fix' && !manualPatch && current.retryCount >= this.options.maxRetries) {
      throw new EscalationError(
        `Case "${caseId}" has used all ${this.options.maxRetries} retries; fix needs a manual patch`,
      );
    }

    const status = VERDICT_STATUS[verdict];
    assertTransition(caseId, current.status, status);
    const next: TestCase = {
      ...current,
      status,
      verdict,
      pendingManualPatch: manualPatch,
      updatedAt: this.clock().toISOString(),
    };
    await this.options.store.save(next);

    await this.emitTransition(current, next);
    await this.options.bus?.emit(
      makeEvent(this.options.runId, {
        type: 'EscalationResolved',
        payload: { caseId, verdict, status, manualPatch: manualPatch !== undefined },
      }),
    );
    return next;
  }

  /** Escalated cases waiting for a verdict, in insertion order. */
  async pending(): Promise<EscalationRequest[]> {
    const cases = await this.options.store.load();
    return cases.filter((c) => c.status === 'Escalated').map(toRequest);
  }

  private async emitTransition(from: TestCase, to: TestCase): Promise<void> {
    await this.options.bus?.emit(
      makeEvent(this.options.runId, {
        type: 'CaseTransitioned',
        payload: { caseId: to.id, from: from.status, to: to.status, retryCount: to.retryCount },
      }),
    );
  }
}

function toRequest(testCase: TestCase): EscalationRequest {
  const escalation = testCase.escalation;
  return {
    caseId: testCase.id,
    reason: escalation?.reason ?? 'retries_exhausted',
    retryCount: testCase.retryCount,
    at: escalation?.at ?? testCase.updatedAt,
    message: escalation?.message,
    diagnosis: escalation?.diagnosis,
    lastFailure: testCase.lastFailure,
    testCase,
  };
}
