import type { SandboxResult, SandboxRunOptions, SandboxRunner } from '@testmend/exec';
import type { PatchEngine } from '@testmend/repo';
import {
  AppError,
  CancelledError,
  ENGINE_TERMINAL_STATUSES,
  PatchOpError,
  SandboxError,
  UsageError,
  makeEvent,
  tail,
  type AppliedPatch,
  type CaseSeed,
  type CaseStatus,
  type Config,
  type Diagnosis,
  type EscalationReason,
  type EventBus,
  type EventInit,
  type FailureMetadata,
  type FatalCaseError,
  type Logger,
  type Patch,
  type PatchKind,
  type PatchRecord,
  type RunSummary,
  type TestCase,
} from '@testmend/shared';
import type { ChecklistStore } from '../checklist/types';
import type { Collaborator, PatchDraft } from '../collaborator/types';
import type { DiagnosisClassifier } from '../diagnosis/classifier';
import { escalatePatchKind } from '../diagnosis/routing';
import { failureSignature } from '../diagnosis/signature';
import { EscalationController, type EscalationReviewer } from '../escalation/controller';
import { buildSummary } from '../run/summary';
import { selectBatch } from './scheduler';
import { assertTransition } from './state_machine';

/** Failure text kept on a case, from the end of the output */
const MAX_FAILURE_CHARS = 20_000;
/** Output kept per execution record */
const RECORD_TAIL_CHARS = 4_000;

export type FailureClassifier = Pick<DiagnosisClassifier, 'classify'>;

export interface HealingEngineOptions {
  runId: string;
  config: Config;
  store: ChecklistStore;
  patches: PatchEngine;
  sandbox: SandboxRunner;
  classifier: FailureClassifier;
  bus: EventBus;
  logger: Logger;
  collaborator?: Collaborator;
  /** Must settle once the run's signal aborts */
  reviewer?: EscalationReviewer;
  clock?: () => Date;
}

export interface EngineRunOptions {
  signal?: AbortSignal;
}

type CaseChanges = Partial<Omit<TestCase, 'id' | 'status' | 'updatedAt'>>;

/**
 * Wakes the scheduling loop. A notification that arrives while nobody is
 * waiting is kept for the next `wait`.
 */
class Wakeup {
  private pending = false;
  private release?: () => void;

  notify(): void {
    this.pending = true;
    const release = this.release;
    this.release = undefined;
    release?.();
  }

  async wait(): Promise<void> {
    if (!this.pending) {
      await new Promise<void>((resolve) => {
        this.release = resolve;
      });
    }
    this.pending = false;
  }
}

/**
 * Drives every case of a run through
 * Pending → Generating → Verifying → (Passed | Failed → Healing → Verifying … | Escalated)
 * with a bounded worker pool.
 *
 * Each transition is committed to the checklist store before the next step
 * starts, so a crash or cancellation leaves every case at a status it can
 * be resumed from. Errors that make one case impossible to continue are
 * recorded in the summary's `fatal` list and never stop the other cases.
 */
export class HealingEngine {
  readonly escalations: EscalationController;

  private readonly clock: () => Date;
  private readonly cases = new Map<string, TestCase>();
  private readonly diagnoses = new Map<string, Diagnosis>();
  /** Patches applied by this process, for rollback */
  private readonly applied = new Map<string, AppliedPatch>();
  private readonly reviews = new Set<Promise<void>>();
  private readonly wakeup = new Wakeup();
  private fatal: FatalCaseError[] = [];
  private excluded = new Set<string>();
  private active = false;

  constructor(private readonly options: HealingEngineOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.escalations = new EscalationController({
      store: options.store,
      runId: options.runId,
      maxRetries: options.config.healing.maxRetries,
      bus: options.bus,
      clock: this.clock,
    });
  }

  /** Seeds the batch into the checklist (new ids only) and runs to completion. */
  async runOnce(batch: readonly CaseSeed[], runOptions: EngineRunOptions = {}): Promise<RunSummary> {
    this.claim();
    try {
      const inserted = await this.options.store.seed(batch);
      await this.options.logger.info(
        `Seeded ${inserted.length} new case(s) from a batch of ${batch.length}`,
      );
      return await this.drive(false, runOptions.signal);
    } finally {
      this.active = false;
    }
  }

  /** Continues every unfinished case from its last committed status. */
  async resume(runOptions: EngineRunOptions = {}): Promise<RunSummary> {
    this.claim();
    try {
      return await this.drive(true, runOptions.signal);
    } finally {
      this.active = false;
    }
  }

  private claim(): void {
    if (this.active) {
      throw new UsageError(`Run ${this.options.runId} is already being processed`);
    }
    this.active = true;
  }

  private async drive(resumed: boolean, signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = this.clock();
    const { logger, config } = this.options;
    const workers = config.concurrency.workers;

    this.cases.clear();
    this.fatal = [];
    this.excluded = new Set();
    for (const testCase of await this.options.store.load()) {
      this.cases.set(testCase.id, testCase);
    }

    await this.emit({
      type: 'RunStarted',
      payload: { caseCount: this.cases.size, resumed, workers },
    });

    const onAbort = () => this.wakeup.notify();
    signal?.addEventListener('abort', onAbort);
    const running = new Map<string, Promise<void>>();

    try {
      while (!signal?.aborted) {
        const busyResources = new Set(
          [...running.keys()].flatMap((id) => this.cases.get(id)?.resources ?? []),
        );
        const batch = selectBatch(
          [...this.cases.values()],
          { running: new Set(running.keys()), busyResources, excluded: this.excluded },
          workers - running.size,
        );
        for (const testCase of batch) {
          const task = this.processCase(testCase.id, signal).finally(() => {
            running.delete(testCase.id);
            this.wakeup.notify();
          });
          running.set(testCase.id, task);
        }

        if (running.size === 0 && this.reviews.size === 0) break;
        await this.wakeup.wait();
      }
      await Promise.all([...running.values(), ...this.reviews]);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const finishedAt = this.clock();
    const cancelled = signal?.aborted ?? false;
    const cases = [...this.cases.values()].sort((a, b) => a.insertionIndex - b.insertionIndex);
    const summary = buildSummary({
      runId: this.options.runId,
      startedAt,
      finishedAt,
      resumed,
      cancelled,
      cases,
      fatal: this.fatal,
    });

    await this.emit({
      type: 'RunFinished',
      payload: {
        passed: summary.passed,
        failed: summary.failed,
        escalated: summary.escalated,
        cancelled,
        durationMs: summary.durationMs,
      },
    });
    await logger.info(
      `Run ${this.options.runId} ${cancelled ? 'cancelled' : 'finished'}: ${summary.passed} passed, ` +
        `${summary.escalated} escalated, ${summary.failed} failed of ${summary.total}`,
    );
    return summary;
  }

  /** Runs one case until it reaches a status the engine stops at. Never rejects. */
  private async processCase(caseId: string, signal?: AbortSignal): Promise<void> {
    const log = this.options.logger.child({ caseId });
    try {
      let testCase = this.current(caseId);
      while (!ENGINE_TERMINAL_STATUSES.has(testCase.status)) {
        if (signal?.aborted) throw new CancelledError();
        testCase = await this.step(testCase, log, signal);
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        await log.debug(`Stopped at ${this.current(caseId).status}: ${error.message}`);
        return;
      }
      await this.recordFatal(caseId, error, log);
    }
  }

  private async step(testCase: TestCase, log: Logger, signal?: AbortSignal): Promise<TestCase> {
    switch (testCase.status) {
      case 'Pending':
        return this.commit(testCase, 'Generating');
      case 'Generating':
        return this.generate(testCase, log, signal);
      case 'Verifying':
        return this.verify(testCase, log, signal);
      case 'Failed':
        return this.diagnose(testCase, log, signal);
      case 'Healing':
        return this.heal(testCase, log, signal);
      default:
        return testCase;
    }
  }

  private async generate(testCase: TestCase, log: Logger, signal?: AbortSignal): Promise<TestCase> {
    const { patches, collaborator } = this.options;
    const { testFile } = testCase;

    if (testFile && testCase.testCode !== undefined) {
      await patches.materialize(testFile, testCase.testCode);
      await log.debug(`Wrote ${testFile}`);
    } else if (testFile && collaborator && (await patches.read(testFile)) === null) {
      const targetContent = testCase.targetFile ? await patches.read(testCase.targetFile) : undefined;
      let code: string | null = null;
      try {
        code = await collaborator.proposeTest({ testCase, targetContent }, signal);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        await log.warn(`No test proposed for ${testFile}: ${messageOf(error)}`);
      }
      if (code) {
        await patches.materialize(testFile, code);
        await log.info(`Generated ${testFile}`);
      }
    }

    return this.commit(testCase, 'Verifying');
  }

  private async verify(testCase: TestCase, log: Logger, signal?: AbortSignal): Promise<TestCase> {
    const { store, sandbox, patches, config } = this.options;
    const attempt = (await store.history(testCase.id)).length + 1;

    const result = await runSandbox(sandbox, testCase.selector, patches.root, {
      timeoutMs: config.sandbox.timeoutMs,
      signal,
    });
    const at = this.clock().toISOString();

    await this.emit({
      type: 'VerificationCompleted',
      payload: {
        caseId: testCase.id,
        attempt,
        passed: result.passed,
        timedOut: result.timedOut,
        durationMs: result.durationMs,
      },
    });
    await store.appendExecutionRecord(testCase.id, {
      attempt,
      at,
      passed: result.passed,
      durationMs: result.durationMs,
      timedOut: result.timedOut,
      exitCode: result.exitCode ?? undefined,
      stdoutTail: tail(result.stdout, RECORD_TAIL_CHARS),
      stderrTail: tail(result.stderr, RECORD_TAIL_CHARS),
    });

    if (result.passed) {
      this.applied.delete(testCase.id);
      await log.info(`Passed on attempt ${attempt}`);
      return this.commit(testCase, 'Passed');
    }

    const text = failureText(result);
    const changes: CaseChanges = {
      lastFailure: { text, signature: failureSignature(text), timedOut: result.timedOut, at },
    };
    if (config.healing.rollbackFailedPatches) {
      changes.patches = await this.rollbackLast(testCase, log);
    }
    await log.info(`Failed on attempt ${attempt}${result.timedOut ? ' (timed out)' : ''}`);
    return this.commit(testCase, 'Failed', changes);
  }

  private async diagnose(testCase: TestCase, log: Logger, signal?: AbortSignal): Promise<TestCase> {
    const { healing } = this.options.config;
    const diagnosis = await this.classify(testCase, signal);
    await log.info(
      `Diagnosed ${diagnosis.category}/${diagnosis.scope} at ${diagnosis.confidence.toFixed(2)}, ` +
        `recommending ${diagnosis.recommendedPatchKind}`,
    );

    const updated: TestCase = testCase.lastFailure
      ? {
          ...testCase,
          lastFailure: {
            ...testCase.lastFailure,
            category: diagnosis.category,
            scope: diagnosis.scope,
            confidence: diagnosis.confidence,
          },
        }
      : testCase;

    if (testCase.retryCount >= healing.maxRetries) {
      return this.escalate(updated, 'retries_exhausted', log, diagnosis, signal);
    }
    if (diagnosis.confidence < healing.confidenceFloor) {
      return this.escalate(
        updated,
        'low_confidence',
        log,
        diagnosis,
        signal,
        `Confidence ${diagnosis.confidence.toFixed(2)} is below ${healing.confidenceFloor}`,
      );
    }
    return this.commit(updated, 'Healing');
  }

  private async heal(testCase: TestCase, log: Logger, signal?: AbortSignal): Promise<TestCase> {
    if (testCase.pendingManualPatch) {
      return this.applyManualPatch(testCase, log, signal);
    }

    const diagnosis = this.diagnoses.get(testCase.id) ?? (await this.classify(testCase, signal));
    if (diagnosis.category === 'EnvironmentError') {
      await log.info('Environment failure; re-verifying without a patch');
      return this.commit(testCase, 'Verifying', { retryCount: testCase.retryCount + 1 });
    }

    const { collaborator, patches } = this.options;
    const targetFile = testCase.targetFile ?? testCase.testFile;
    if (!targetFile) {
      return this.escalate(testCase, 'no_viable_patch', log, diagnosis, signal, 'Case names no file to patch');
    }
    if (!collaborator) {
      return this.escalate(testCase, 'no_viable_patch', log, diagnosis, signal, 'No collaborator configured to draft patches');
    }

    let kind: PatchKind | null = diagnosis.recommendedPatchKind;
    let rejection: string | undefined;
    while (kind) {
      const targetContent = await patches.read(targetFile);
      const testContent =
        testCase.testFile && testCase.testFile !== targetFile
          ? await patches.read(testCase.testFile)
          : undefined;

      let draft: PatchDraft | null;
      try {
        draft = await collaborator.draftPatch(
          {
            testCase,
            diagnosis,
            failureText: testCase.lastFailure?.text ?? '',
            targetFile,
            targetContent,
            testContent,
            rejection,
          },
          kind,
          signal,
        );
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        return this.escalate(testCase, 'collaborator_error', log, diagnosis, signal, messageOf(error));
      }
      if (!draft) {
        return this.escalate(testCase, 'no_viable_patch', log, diagnosis, signal, `No ${kind} patch was drafted`);
      }

      const patch: Patch = {
        id: nextPatchId(testCase),
        kind,
        targetFile,
        payload: draft.payload,
        confidence: draft.confidence ?? diagnosis.confidence,
      };
      try {
        const applied = await patches.apply(patch);
        return this.recordApplied(testCase, applied, 'auto', testCase.retryCount + 1, log);
      } catch (error) {
        if (!(error instanceof PatchOpError)) throw error;
        await this.rejected(testCase, patch, error, log);
        rejection = error.message;
        kind = escalatePatchKind(kind);
      }
    }

    return this.escalate(
      testCase,
      'no_viable_patch',
      log,
      diagnosis,
      signal,
      `Every patch kind was rejected; last: ${rejection ?? 'unknown'}`,
    );
  }

  private async applyManualPatch(testCase: TestCase, log: Logger, signal?: AbortSignal): Promise<TestCase> {
    const manual = testCase.pendingManualPatch;
    if (!manual) return testCase;

    const patch: Patch = {
      id: nextPatchId(testCase),
      kind: manual.kind,
      targetFile: manual.targetFile,
      payload: manual.payload,
      confidence: 1,
    };
    try {
      const applied = await this.options.patches.apply(patch);
      return this.recordApplied(testCase, applied, 'manual', testCase.retryCount, log);
    } catch (error) {
      if (!(error instanceof PatchOpError)) throw error;
      await this.rejected(testCase, patch, error, log);
      return this.escalate(
        { ...testCase, pendingManualPatch: undefined },
        'no_viable_patch',
        log,
        this.diagnoses.get(testCase.id),
        signal,
        `Manual patch rejected: ${error.message}`,
      );
    }
  }

  private async recordApplied(
    testCase: TestCase,
    applied: AppliedPatch,
    origin: PatchRecord['origin'],
    retryCount: number,
    log: Logger,
  ): Promise<TestCase> {
    const { patch } = applied;
    this.applied.set(testCase.id, applied);
    const record: PatchRecord = {
      id: patch.id,
      kind: patch.kind,
      targetFile: patch.targetFile,
      confidence: patch.confidence,
      origin,
      appliedAt: applied.appliedAt,
    };

    const next = await this.commit(testCase, 'Verifying', {
      retryCount,
      patchesApplied: [...testCase.patchesApplied, patch.id],
      patches: [...testCase.patches, record],
      pendingManualPatch: undefined,
    });
    await this.emit({
      type: 'PatchApplied',
      payload: {
        caseId: testCase.id,
        patchId: patch.id,
        kind: patch.kind,
        targetFile: patch.targetFile,
        origin,
      },
    });
    await log.info(`Applied ${origin} ${patch.kind} ${patch.id} to ${patch.targetFile}`);
    return next;
  }

  private async rejected(testCase: TestCase, patch: Patch, error: PatchOpError, log: Logger): Promise<void> {
    await log.warn(`Rejected ${patch.kind} for ${patch.targetFile}: ${error.message}`);
    await this.emit({
      type: 'PatchRejected',
      payload: {
        caseId: testCase.id,
        kind: patch.kind,
        targetFile: patch.targetFile,
        errorKind: error.kind ?? 'INVALID_PATCH',
        message: error.message,
      },
    });
  }

  /** Rolls back the last patch this process applied to the case, if any. */
  private async rollbackLast(testCase: TestCase, log: Logger): Promise<PatchRecord[]> {
    const applied = this.applied.get(testCase.id);
    if (!applied) return testCase.patches;

    let rolledBack: AppliedPatch;
    try {
      rolledBack = await this.options.patches.rollback(applied);
    } catch (error) {
      if (!(error instanceof PatchOpError)) throw error;
      await log.warn(`Kept patch ${applied.patch.id}: ${error.message}`);
      return testCase.patches;
    }
    this.applied.delete(testCase.id);

    const reason = 'Re-verification failed';
    await this.emit({
      type: 'PatchRolledBack',
      payload: {
        caseId: testCase.id,
        patchId: applied.patch.id,
        targetFile: applied.patch.targetFile,
        reason,
      },
    });
    await log.info(`Rolled back ${applied.patch.id}: ${reason}`);
    return testCase.patches.map((p) =>
      p.id === applied.patch.id ? { ...p, rolledBackAt: rolledBack.rolledBackAt } : p,
    );
  }

  private async classify(testCase: TestCase, signal?: AbortSignal): Promise<Diagnosis> {
    const diagnosis = await this.options.classifier.classify(
      testCase.lastFailure?.text ?? '',
      await this.metadata(testCase),
      signal,
    );
    this.diagnoses.set(testCase.id, diagnosis);
    await this.emit({
      type: 'DiagnosisCompleted',
      payload: {
        caseId: testCase.id,
        signature: diagnosis.signature,
        category: diagnosis.category,
        scope: diagnosis.scope,
        confidence: diagnosis.confidence,
        recommendedPatchKind: diagnosis.recommendedPatchKind,
        ruleId: diagnosis.ruleId,
      },
    });
    return diagnosis;
  }

  private async metadata(testCase: TestCase): Promise<FailureMetadata> {
    const targetFile = testCase.targetFile ?? testCase.testFile;
    const targetContent = targetFile ? await this.options.patches.read(targetFile) : null;
    return {
      caseId: testCase.id,
      selector: testCase.selector,
      testFile: testCase.testFile,
      targetFile,
      targetContent: targetContent ?? undefined,
      timedOut: testCase.lastFailure?.timedOut,
      intent: testCase.intent,
    };
  }

  private async escalate(
    testCase: TestCase,
    reason: EscalationReason,
    log: Logger,
    diagnosis?: Diagnosis,
    signal?: AbortSignal,
    message?: string,
  ): Promise<TestCase> {
    const request = await this.escalations.escalate(testCase, reason, diagnosis, message);
    this.cases.set(request.testCase.id, request.testCase);
    await log.warn(`Escalated (${reason})${message ? `: ${message}` : ''}`);

    const reviewer = this.options.reviewer;
    if (reviewer) {
      const review: Promise<void> = (async () => {
        try {
          const decision = await reviewer.review(request, signal);
          const resolved = await this.escalations.resolve(
            request.caseId,
            decision.verdict,
            decision.manualPatch,
          );
          this.cases.set(resolved.id, resolved);
          await log.info(`Resolved as ${decision.verdict}`);
        } catch (error) {
          if (error instanceof CancelledError) {
            await log.debug('Review cancelled');
            return;
          }
          await log.error(toError(error), 'Review failed; case stays Escalated');
        }
      })().finally(() => {
        this.reviews.delete(review);
        this.wakeup.notify();
      });
      this.reviews.add(review);
    }
    return request.testCase;
  }

  private async commit(testCase: TestCase, to: CaseStatus, changes: CaseChanges = {}): Promise<TestCase> {
    assertTransition(testCase.id, testCase.status, to);
    const next: TestCase = {
      ...testCase,
      ...changes,
      status: to,
      updatedAt: this.clock().toISOString(),
    };
    await this.options.store.save(next);
    this.cases.set(next.id, next);
    await this.emit({
      type: 'CaseTransitioned',
      payload: { caseId: next.id, from: testCase.status, to, retryCount: next.retryCount },
    });
    return next;
  }

  private async recordFatal(caseId: string, error: unknown, log: Logger): Promise<void> {
    const err = toError(error);
    const code = error instanceof AppError ? error.code : 'UnknownError';
    this.fatal.push({ caseId, code, message: err.message });
    this.excluded.add(caseId);
    await log.error(err, `Abandoning ${caseId} for this run`);
    await this.emit({ type: 'CaseFatal', payload: { caseId, code, message: err.message } });
  }

  private current(caseId: string): TestCase {
    const testCase = this.cases.get(caseId);
    if (!testCase) {
      throw new UsageError(`Unknown case "${caseId}"`);
    }
    return testCase;
  }

  private async emit(init: EventInit): Promise<void> {
    await this.options.bus.emit(makeEvent(this.options.runId, init));
  }
}

/** A run that could not start is a failed attempt, with the start error as its output. */
async function runSandbox(
  sandbox: SandboxRunner,
  selector: string,
  snapshot: string,
  options: SandboxRunOptions,
): Promise<SandboxResult> {
  const start = Date.now();
  try {
    return await sandbox.run(selector, snapshot, options);
  } catch (error) {
    if (!(error instanceof SandboxError)) throw error;
    return {
      passed: false,
      stdout: '',
      stderr: error.message,
      durationMs: Date.now() - start,
      timedOut: false,
      exitCode: null,
      truncated: false,
    };
  }
}

function failureText(result: SandboxResult): string {
  const parts = [result.stderr, result.stdout].filter((p) => p.trim() !== '');
  if (result.timedOut) parts.unshift('Test run timed out');
  return tail(parts.join('\n'), MAX_FAILURE_CHARS);
}

function nextPatchId(testCase: TestCase): string {
  return `${testCase.id}#${testCase.patches.length + 1}`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function messageOf(error: unknown): string {
  return toError(error).message;
}
