import inquirer from 'inquirer';
import pc from 'picocolors';
import type { EscalationDecision, EscalationRequest, EscalationReviewer } from '@testmend/core';
import { CancelledError, tail, type Verdict } from '@testmend/shared';
import { loadManualPatch } from '../utils/manual_patch';

type ReviewAnswers = {
  verdict: Verdict;
  patchFile?: string;
};

const FAILURE_PREVIEW_CHARS = 1200;

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new CancelledError('Review cancelled'));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError('Review cancelled'));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Asks a human for a verdict on each escalated case. A `fix` may name a
 * patch file; without one, automated healing continues, which needs
 * retries left.
 */
export class InquirerReviewer implements EscalationReviewer {
  constructor(private readonly maxRetries: number) {}

  async review(request: EscalationRequest, signal?: AbortSignal): Promise<EscalationDecision> {
    this.describe(request);
    const needsPatch = request.retryCount >= this.maxRetries;

    const answers = await abortable(
      inquirer.prompt<ReviewAnswers>([
        {
          type: 'list',
          name: 'verdict',
          message: `Verdict for ${request.caseId}`,
          choices: [
            { name: 'Fix (retry healing or apply a patch file)', value: 'fix' },
            { name: 'Flag as a product bug', value: 'flag_bug' },
            { name: 'Skip', value: 'skip' },
            { name: 'Keep as an expected failure', value: 'keep_as_expected_failure' },
          ],
        },
        {
          type: 'input',
          name: 'patchFile',
          message: needsPatch
            ? 'Patch file (YAML or JSON)'
            : 'Patch file (YAML or JSON, empty to retry automatically)',
          when: (answers: Partial<ReviewAnswers>) => answers.verdict === 'fix',
          validate: (input: string) =>
            !needsPatch || input.trim().length > 0 || 'All retries are used; a patch file is required',
        },
      ]),
      signal,
    );

    const patchFile = answers.patchFile?.trim();
    if (answers.verdict === 'fix' && patchFile) {
      return { verdict: 'fix', manualPatch: await loadManualPatch(patchFile) };
    }
    return { verdict: answers.verdict };
  }

  private describe(request: EscalationRequest): void {
    console.log(`\n${pc.bold(request.caseId)} ${pc.yellow(`escalated: ${request.reason}`)}`);
    if (request.message) console.log(`  ${request.message}`);
    console.log(`  Retries used: ${request.retryCount}/${this.maxRetries}`);
    const diagnosis = request.diagnosis;
    if (diagnosis) {
      console.log(
        `  Diagnosis: ${diagnosis.category} (${diagnosis.scope}, confidence ${diagnosis.confidence.toFixed(2)})`,
      );
      if (diagnosis.explanation) console.log(`  ${diagnosis.explanation}`);
    }
    if (request.lastFailure) {
      console.log(pc.gray(tail(request.lastFailure.text, FAILURE_PREVIEW_CHARS)));
    }
  }
}
