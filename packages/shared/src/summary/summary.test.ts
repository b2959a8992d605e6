import { tmpdir } from 'os';
import { join } from 'path';
import { mkdtemp } from 'fs/promises';
import { readJson, remove } from 'fs-extra';
import { RUN_SUMMARY_SCHEMA_VERSION, type RunSummary, SummaryWriter } from './summary';

describe('SummaryWriter', () => {
  let runDir: string;

  beforeEach(async () => {
    runDir = await mkdtemp(join(tmpdir(), 'testmend-summary-'));
  });

  afterEach(async () => {
    await remove(runDir);
  });

  const summary: RunSummary = {
    schemaVersion: RUN_SUMMARY_SCHEMA_VERSION,
    runId: 'run-1',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:02.000Z',
    durationMs: 2000,
    resumed: false,
    cancelled: false,
    total: 3,
    passed: 2,
    failed: 0,
    escalated: 1,
    flaggedBug: 0,
    skipped: 0,
    expectedFailure: 0,
    pending: 0,
    blocked: [],
    fatal: [],
    byCategory: { AssertionMismatch: 1 },
    patchesApplied: 1,
  };

  it('writes summary.json into the run directory', async () => {
    const written = await SummaryWriter.write(summary, runDir);
    expect(written).toBe(join(runDir, 'summary.json'));
    expect(await readJson(written)).toEqual(summary);
  });

  it('redacts secrets carried in fatal error messages', async () => {
    const withSecret: RunSummary = {
      ...summary,
      fatal: [{ caseId: 'c1', code: 'StoreError', message: 'TOKEN=test-secret' }],
    };
    const written = await SummaryWriter.write(withSecret, runDir);
    expect((await readJson(written)).fatal[0].message).toBe('[REDACTED]');
  });
});
