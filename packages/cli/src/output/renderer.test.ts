import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { EscalationRequest, RunReport } from '@testmend/core';
import { RUN_SUMMARY_SCHEMA_VERSION, stripAnsi, type RunSummary } from '@testmend/shared';
import { OutputRenderer, formatDuration } from './renderer';

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    schemaVersion: RUN_SUMMARY_SCHEMA_VERSION,
    runId: 'run-1',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:01:05.000Z',
    durationMs: 65_000,
    resumed: false,
    cancelled: false,
    total: 3,
    passed: 3,
    failed: 0,
    escalated: 0,
    flaggedBug: 0,
    skipped: 0,
    expectedFailure: 0,
    pending: 0,
    blocked: [],
    fatal: [],
    byCategory: {},
    patchesApplied: 2,
    ...overrides,
  };
}

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  const output = () => logSpy.mock.calls.map((c) => stripAnsi(String(c[0]))).join('\n');

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders the summary as JSON when json mode is enabled', () => {
    new OutputRenderer(true).summary(summary(), '/tmp/summary.json');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual(summary());
  });

  it('renders a finished run (human)', () => {
    new OutputRenderer(false).summary(summary(), '/tmp/summary.json');

    const text = output();
    expect(text).toContain('✅ Run run-1 finished.');
    expect(text).toContain('  Passed: 3  Failed: 0  Escalated: 0');
    expect(text).toContain('  Patches applied: 2');
    expect(text).toContain('  Duration: 1m 5s');
    expect(text).toContain('  Summary: /tmp/summary.json');
    expect(text).not.toContain('Next steps:');
  });

  it('points at review and resume when cases are left open', () => {
    new OutputRenderer(false).summary(
      summary({
        passed: 1,
        escalated: 1,
        pending: 1,
        blocked: ['later'],
        fatal: [{ caseId: 'io', code: 'StoreError', message: 'disk full' }],
      }),
    );

    const text = output();
    expect(text).toContain('⚠ Run run-1 finished with open cases.');
    expect(text).toContain('  - later');
    expect(text).toContain('  - io [StoreError] disk full');
    expect(text).toContain('  - Review escalations: testmend review run-1');
    expect(text).toContain('  - Continue the run: testmend resume run-1');
  });

  it('says so when a run was cancelled', () => {
    new OutputRenderer(false).summary(summary({ cancelled: true, pending: 2, passed: 1 }));

    expect(output()).toContain('⏹ Run run-1 was cancelled.');
  });

  it('renders status as JSON with one entry per case', () => {
    const report: RunReport = {
      schemaVersion: 1,
      runId: 'run-1',
      generatedAt: '2026-01-01T00:00:00.000Z',
      counts: {
        Pending: 0,
        Generating: 0,
        Verifying: 0,
        Passed: 1,
        Failed: 0,
        Healing: 0,
        Escalated: 0,
        Skipped: 0,
        FlaggedBug: 0,
        ExpectedFailure: 0,
      },
      summary: null,
      cases: [
        {
          id: 'a',
          status: 'Passed',
          priority: 0,
          insertionIndex: 0,
          retryCount: 1,
          selector: 'a',
          dependsOn: [],
          resources: [],
          patchesApplied: ['a#1'],
          patches: [],
          updatedAt: '2026-01-01T00:00:00.000Z',
          history: [],
          blocked: false,
        },
      ],
    };

    new OutputRenderer(true).status(report);

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      runId: 'run-1',
      counts: report.counts,
      cases: [{ id: 'a', status: 'Passed', retryCount: 1, blocked: false }],
    });
  });

  it('leaves the case out of escalations JSON', () => {
    const request = {
      caseId: 'cart',
      reason: 'retries_exhausted',
      retryCount: 3,
      at: '2026-01-01T00:00:00.000Z',
      message: 'out of retries',
    } satisfies Omit<EscalationRequest, 'testCase'>;

    const testCase: EscalationRequest['testCase'] = {
      id: 'cart',
      status: 'Escalated',
      priority: 0,
      insertionIndex: 0,
      retryCount: 3,
      selector: 'cart',
      dependsOn: [],
      resources: [],
      patchesApplied: [],
      patches: [],
      updatedAt: '2026-01-01T00:00:00.000Z',
    };

    new OutputRenderer(true).escalations([{ ...request, testCase }]);

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual([request]);
  });

  it('reports an empty escalation list (human)', () => {
    new OutputRenderer(false).escalations([]);

    expect(output()).toBe('No cases are waiting for review.');
  });

  it('writes errors to stderr', () => {
    new OutputRenderer(true).error(new Error('boom'));

    expect(errSpy).toHaveBeenCalledWith(JSON.stringify({ error: 'boom' }));
  });

  it('formats durations', () => {
    expect(formatDuration(4_400)).toBe('4s');
    expect(formatDuration(3_725_000)).toBe('1h 2m');
    expect(formatDuration(-1)).toBe('N/A');
  });
});
