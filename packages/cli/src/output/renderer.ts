import pc from 'picocolors';
import type { EscalationRequest, RunReport } from '@testmend/core';
import type { RunSummary, TestCase } from '@testmend/shared';
import { printTable } from './table';

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs < 0) return 'N/A';
  const totalSeconds = Math.round(durationMs / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;

  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(minutes / 60);
  const remMinutes = minutes % 60;
  return `${hours}h ${remMinutes}m`;
}

export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  isJsonMode(): boolean {
    return this.isJson;
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  summary(summary: RunSummary, summaryPath?: string): void {
    if (this.isJson) {
      this.json(summary);
      return;
    }

    const open = summary.failed + summary.escalated + summary.fatal.length;
    if (summary.cancelled) {
      console.log(`\n${pc.yellow(`⏹ Run ${summary.runId} was cancelled.`)}`);
    } else if (open === 0 && summary.pending === 0) {
      console.log(`\n${pc.green(`✅ Run ${summary.runId} finished.`)}`);
    } else {
      console.log(`\n${pc.yellow(`⚠ Run ${summary.runId} finished with open cases.`)}`);
    }

    console.log(pc.bold('\nCases:'));
    console.log(`  Passed: ${summary.passed}  Failed: ${summary.failed}  Escalated: ${summary.escalated}`);
    console.log(
      `  Flagged bug: ${summary.flaggedBug}  Skipped: ${summary.skipped}  Expected failure: ${summary.expectedFailure}`,
    );
    console.log(`  Pending: ${summary.pending}  Blocked: ${summary.blocked.length}  Total: ${summary.total}`);
    console.log(`  Patches applied: ${summary.patchesApplied}`);
    console.log(`  Duration: ${formatDuration(summary.durationMs)}`);

    if (summary.blocked.length > 0) {
      console.log(pc.bold('\nBlocked:'));
      summary.blocked.forEach((id) => console.log(`  - ${id}`));
    }

    if (summary.fatal.length > 0) {
      console.log(pc.bold('\nStopped by errors:'));
      summary.fatal.forEach((f) => console.log(`  - ${f.caseId} [${f.code}] ${f.message}`));
    }

    if (summaryPath) {
      console.log(pc.bold('\nArtifacts:'));
      console.log(`  Summary: ${summaryPath}`);
    }

    const nextSteps: string[] = [];
    if (summary.escalated > 0) {
      nextSteps.push(`Review escalations: ${pc.cyan(`testmend review ${summary.runId}`)}`);
    }
    if (summary.cancelled || summary.pending > 0 || summary.fatal.length > 0) {
      nextSteps.push(`Continue the run: ${pc.cyan(`testmend resume ${summary.runId}`)}`);
    }
    if (nextSteps.length > 0) {
      console.log(pc.bold('\nNext steps:'));
      nextSteps.forEach((step) => console.log(`  - ${step}`));
    }
  }

  status(report: RunReport): void {
    if (this.isJson) {
      this.json({
        runId: report.runId,
        counts: report.counts,
        cases: report.cases.map((c) => ({
          id: c.id,
          status: c.status,
          retryCount: c.retryCount,
          blocked: c.blocked,
          verdict: c.verdict,
        })),
      });
      return;
    }

    console.log(pc.bold(`\nRun ${report.runId}`));
    if (report.cases.length === 0) {
      console.log(pc.gray('  No cases.'));
      return;
    }
    printTable(
      report.cases.map((c) => ({
        id: c.id,
        status: c.blocked ? `${c.status} (blocked)` : c.status,
        retries: c.retryCount,
        patches: c.patchesApplied.length,
        category: c.lastFailure?.category ?? '-',
      })),
    );
    const counts = Object.entries(report.counts)
      .filter(([, n]) => n > 0)
      .map(([status, n]) => `${status}: ${n}`)
      .join('  ');
    console.log(`  ${counts}`);
  }

  escalations(requests: readonly EscalationRequest[]): void {
    if (this.isJson) {
      this.json(
        requests.map(({ testCase: _testCase, ...request }) => request),
      );
      return;
    }
    if (requests.length === 0) {
      console.log(pc.green('No cases are waiting for review.'));
      return;
    }
    printTable(
      requests.map((r) => ({
        case: r.caseId,
        reason: r.reason,
        retries: r.retryCount,
        category: r.diagnosis?.category ?? r.lastFailure?.category ?? '-',
        message: r.message ?? '',
      })),
    );
  }

  resolved(testCase: TestCase): void {
    if (this.isJson) {
      this.json({ caseId: testCase.id, status: testCase.status, verdict: testCase.verdict });
      return;
    }
    console.log(
      `${pc.green('✔')} ${testCase.id} resolved as ${testCase.verdict ?? '-'} (now ${testCase.status})`,
    );
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
