import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FakeAdapter } from '@testmend/adapters';
import { ConfigSchema, UsageError, getRunArtifactPaths, type CaseSeed } from '@testmend/shared';
import { FakeSandbox, fail, pass, type Decide } from '../__fixtures__/harness';
import { writeRunReport } from './report';
import { listEscalations, loadRunConfig, resolveEscalation, resumeRun, startRun } from './runtime';

const GREET = "import { helper } from './helpr';\nexport const greet = () => helper();\n";
const seeds: CaseSeed[] = [{ id: 'greet', selector: 'greet', targetFile: 'src/greet.ts' }];

const decide: Decide = async (_selector, root) => {
  const content = await fs.readFile(path.join(root, 'src/greet.ts'), 'utf8');
  return content.includes("'./helpr'") ? fail("Error: Cannot find module './helpr'") : pass();
};

async function readLines(file: string): Promise<unknown[]> {
  const raw = await fs.readFile(file, 'utf8');
  return raw
    .split('\n')
    .filter((line) => line.trim())
    .map((line) => JSON.parse(line));
}

describe('run runtime', () => {
  let repoRoot: string;

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'testmend-runtime-'));
    await fs.mkdir(path.join(repoRoot, 'src'));
    await fs.writeFile(path.join(repoRoot, 'src/greet.ts'), GREET);
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it('heals through a provider adapter and writes the run artifacts', async () => {
    const adapter = new FakeAdapter([
      JSON.stringify({ oldText: "'./helpr'", newText: "'./helper'", confidence: 0.9 }),
    ]);

    const { summary, summaryPath, run } = await startRun(seeds, {
      repoRoot,
      runId: 'run-a',
      config: ConfigSchema.parse({ concurrency: { workers: 1 } }),
      sandbox: new FakeSandbox(decide),
      adapter,
      logLevel: 'error',
    });

    expect(summary).toMatchObject({ runId: 'run-a', total: 1, passed: 1, patchesApplied: 1 });
    expect(adapter.requests).toHaveLength(1);
    expect(await fs.readFile(path.join(repoRoot, 'src/greet.ts'), 'utf8')).toBe(
      "import { helper } from './helper';\nexport const greet = () => helper();\n",
    );

    const paths = getRunArtifactPaths(repoRoot, 'run-a');
    expect(summaryPath).toBe(paths.summary);
    expect(JSON.parse(await fs.readFile(paths.summary, 'utf8'))).toMatchObject({ runId: 'run-a', passed: 1 });
    expect(JSON.parse(await fs.readFile(paths.effectiveConfig, 'utf8'))).toMatchObject({
      concurrency: { workers: 1 },
      healing: { maxRetries: 3 },
    });
    expect(run.paths).toEqual(paths);

    const trace = await readLines(paths.trace);
    expect(trace[0]).toMatchObject({ type: 'RunStarted', runId: 'run-a' });
    expect(trace[trace.length - 1]).toMatchObject({ type: 'RunFinished' });

    const knowledge = await readLines(path.join(repoRoot, '.testmend/knowledge.jsonl'));
    expect(knowledge).toEqual([
      expect.objectContaining({
        outcome: 'healed',
        category: 'ImportOrNameError',
        patchKind: 'TargetedReplace',
      }),
    ]);

    const { report, path: reportPath } = await writeRunReport({ repoRoot, runId: 'run-a' });
    expect(reportPath).toBe(paths.report);
    expect(report.counts.Passed).toBe(1);
    expect(report.summary?.passed).toBe(1);
    expect(report.cases).toHaveLength(1);
    expect(report.cases[0]?.history.map((r) => r.passed)).toEqual([false, true]);
    expect(report.cases[0]?.blocked).toBe(false);
  });

  it('resolves an escalation offline and heals it on resume', async () => {
    const config = ConfigSchema.parse({ knowledge: { enabled: false } });
    const sandbox = new FakeSandbox(decide);

    const first = await startRun(seeds, { repoRoot, runId: 'run-b', config, sandbox, logLevel: 'error' });
    expect(first.summary.escalated).toBe(1);

    const pending = await listEscalations({ repoRoot, runId: 'run-b' });
    expect(pending.map((p) => [p.caseId, p.reason, p.message])).toEqual([
      ['greet', 'no_viable_patch', 'No collaborator configured to draft patches'],
    ]);

    const resolved = await resolveEscalation({
      repoRoot,
      runId: 'run-b',
      caseId: 'greet',
      verdict: 'fix',
      manualPatch: {
        kind: 'TargetedReplace',
        targetFile: 'src/greet.ts',
        payload: { kind: 'TargetedReplace', oldText: "'./helpr'", newText: "'./helper'" },
      },
    });
    expect(resolved.status).toBe('Healing');

    const { summary, run } = await resumeRun({ repoRoot, runId: 'run-b', sandbox, logLevel: 'error' });
    expect(summary).toMatchObject({ resumed: true, passed: 1, escalated: 0 });
    expect(await run.store.get('greet')).toMatchObject({
      status: 'Passed',
      retryCount: 0,
      patches: [{ id: 'greet#1', origin: 'manual' }],
    });
  });

  it('refuses to resume a run that does not exist', async () => {
    await expect(resumeRun({ repoRoot, runId: 'nope' })).rejects.toBeInstanceOf(UsageError);
  });

  it('keeps the api key out of the effective config and reads it back from the environment', async () => {
    const config = ConfigSchema.parse({
      knowledge: { enabled: false },
      provider: { type: 'fake', model: 'scripted', api_key: 'test-secret', api_key_env: 'TESTMEND_KEY' },
    });
    await startRun([{ id: 'ok', selector: 'ok' }], {
      repoRoot,
      runId: 'run-c',
      config,
      sandbox: new FakeSandbox(async () => pass()),
      logLevel: 'error',
    });

    const raw = await fs.readFile(getRunArtifactPaths(repoRoot, 'run-c').effectiveConfig, 'utf8');
    expect(raw).not.toContain('test-secret');

    const reloaded = await loadRunConfig({ repoRoot, runId: 'run-c' }, { TESTMEND_KEY: 'env-placeholder' });
    expect(reloaded.provider).toEqual({
      type: 'fake',
      model: 'scripted',
      api_key_env: 'TESTMEND_KEY',
      api_key: 'env-placeholder',
    });
  });
});
