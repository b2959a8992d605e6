import {
  RUN_SUMMARY_SCHEMA_VERSION,
  type DiagnosisCategory,
  type FatalCaseError,
  type RunSummary,
  type TestCase,
} from '@testmend/shared';
import { blockedCases } from '../engine/scheduler';

export interface SummaryInput {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  resumed: boolean;
  cancelled: boolean;
  cases: readonly TestCase[];
  fatal: readonly FatalCaseError[];
}

/**
 * Counts cases by their final committed status. A case counts as passed only
 * when it is Passed; skipped, flagged and expected failures have their own
 * buckets.
 */
export function buildSummary(input: SummaryInput): RunSummary {
  const { cases } = input;
  const blocked = blockedCases(cases);
  const blockedSet = new Set(blocked);
  const count = (status: TestCase['status']) => cases.filter((c) => c.status === status).length;

  const byCategory: Partial<Record<DiagnosisCategory, number>> = {};
  for (const c of cases) {
    const category = c.lastFailure?.category;
    if (category) byCategory[category] = (byCategory[category] ?? 0) + 1;
  }

  return {
    schemaVersion: RUN_SUMMARY_SCHEMA_VERSION,
    runId: input.runId,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    durationMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    resumed: input.resumed,
    cancelled: input.cancelled,
    total: cases.length,
    passed: count('Passed'),
    failed: count('Failed'),
    escalated: count('Escalated'),
    flaggedBug: count('FlaggedBug'),
    skipped: count('Skipped'),
    expectedFailure: count('ExpectedFailure'),
    pending: cases.filter(
      (c) =>
        ['Pending', 'Generating', 'Verifying', 'Healing'].includes(c.status) && !blockedSet.has(c.id),
    ).length,
    blocked,
    fatal: [...input.fatal],
    byCategory,
    patchesApplied: cases.reduce((sum, c) => sum + c.patchesApplied.length, 0),
  };
}
