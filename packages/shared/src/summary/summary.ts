import path from 'node:path';
import { atomicWrite } from '../fs/io';
import { redactForLogs } from '../redaction';
import type { DiagnosisCategory } from '../types/diagnosis';

export const RUN_SUMMARY_SCHEMA_VERSION = 1;

export interface FatalCaseError {
  caseId: string;
  code: string;
  message: string;
}

/**
 * Outcome of one `runOnce` or `resume` call.
 * Counts are by final committed status; skipped, flagged and expected-failure
 * cases never count as passed.
 */
export interface RunSummary {
  schemaVersion: typeof RUN_SUMMARY_SCHEMA_VERSION;
  runId: string;
  startedAt: string; // ISO 8601
  finishedAt: string; // ISO 8601
  durationMs: number;
  resumed: boolean;
  cancelled: boolean;
  total: number;
  passed: number;
  failed: number;
  escalated: number;
  flaggedBug: number;
  skipped: number;
  expectedFailure: number;
  /** Not terminal and not blocked: still has work to do */
  pending: number;
  /** Waiting on a dependency that ended in a non-Passed terminal status */
  blocked: string[];
  fatal: FatalCaseError[];
  /** Diagnosis category of each case's last failure */
  byCategory: Partial<Record<DiagnosisCategory, number>>;
  patchesApplied: number;
}

export class SummaryWriter {
  static async write(summary: RunSummary, runDir: string): Promise<string> {
    const summaryPath = path.join(runDir, 'summary.json');
    await atomicWrite(summaryPath, JSON.stringify(redactForLogs(summary), null, 2));
    return summaryPath;
  }
}
