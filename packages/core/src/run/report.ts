import {
  RUN_SUMMARY_SCHEMA_VERSION,
  atomicWrite,
  getRunArtifactPaths,
  readFileIfExists,
  type CaseStatus,
  type ExecutionRecord,
  type RunSummary,
  type TestCase,
} from '@testmend/shared';
import { FileChecklistStore } from '../checklist/file_store';
import type { ChecklistStore } from '../checklist/types';
import { blockedCases } from '../engine/scheduler';
import { assertRunExists, type RunLocation } from './runtime';

export const RUN_REPORT_SCHEMA_VERSION = 1;

export interface CaseReport extends TestCase {
  history: ExecutionRecord[];
  blocked: boolean;
}

export interface RunReport {
  schemaVersion: typeof RUN_REPORT_SCHEMA_VERSION;
  runId: string;
  generatedAt: string;
  counts: Record<CaseStatus, number>;
  /** Summary of the last `runOnce` or `resume`, when one was written */
  summary: RunSummary | null;
  cases: CaseReport[];
}

export function isRunSummary(value: unknown): value is RunSummary {
  if (typeof value !== 'object' || value === null) return false;
  return (
    Reflect.get(value, 'schemaVersion') === RUN_SUMMARY_SCHEMA_VERSION &&
    typeof Reflect.get(value, 'runId') === 'string'
  );
}

export async function readRunSummary({ repoRoot, runId }: RunLocation): Promise<RunSummary | null> {
  const raw = await readFileIfExists(getRunArtifactPaths(repoRoot, runId).summary);
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRunSummary(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function countStatuses(cases: readonly TestCase[]): Record<CaseStatus, number> {
  const result = emptyCounts();
  for (const c of cases) result[c.status] += 1;
  return result;
}

function emptyCounts(): Record<CaseStatus, number> {
  return {
    Pending: 0,
    Generating: 0,
    Verifying: 0,
    Passed: 0,
    Failed: 0,
    Healing: 0,
    Escalated: 0,
    Skipped: 0,
    FlaggedBug: 0,
    ExpectedFailure: 0,
  };
}

export async function buildRunReport(
  runId: string,
  store: ChecklistStore,
  summary: RunSummary | null,
  now: Date = new Date(),
): Promise<RunReport> {
  const cases = await store.load();
  const blocked = new Set(blockedCases(cases));
  const entries: CaseReport[] = [];
  for (const c of cases) {
    entries.push({ ...c, history: await store.history(c.id), blocked: blocked.has(c.id) });
  }
  return {
    schemaVersion: RUN_REPORT_SCHEMA_VERSION,
    runId,
    generatedAt: now.toISOString(),
    counts: countStatuses(cases),
    summary,
    cases: entries,
  };
}

/** Reads a run's checklist and last summary into a report, optionally writing it out. */
export async function writeRunReport(
  location: RunLocation,
  outPath?: string,
): Promise<{ report: RunReport; path: string }> {
  await assertRunExists(location);
  const paths = getRunArtifactPaths(location.repoRoot, location.runId);
  const store = new FileChecklistStore(paths.checklist, location.runId);
  const report = await buildRunReport(location.runId, store, await readRunSummary(location));
  const target = outPath ?? paths.report;
  await atomicWrite(target, JSON.stringify(report, null, 2));
  return { report, path: target };
}
