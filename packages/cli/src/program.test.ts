import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { SandboxResult, SandboxRunner } from '@testmend/exec';
import { main, name } from './program';

const GREET = "import { helper } from './helpr';\nexport const greet = () => helper();\n";

describe('testmend program', () => {
  let repo: string;
  let logSpy: ReturnType<typeof vi.spyOn>;

  const sandbox: SandboxRunner = {
    run: async (selector, root): Promise<SandboxResult> => {
      const content = await fs.readFile(path.join(root, 'src/greet.ts'), 'utf8');
      const passed = selector !== 'greet' || !content.includes("'./helpr'");
      return {
        passed,
        stdout: '',
        stderr: passed ? '' : "Error: Cannot find module './helpr'",
        durationMs: 1,
        timedOut: false,
        exitCode: passed ? 0 : 1,
        truncated: false,
      };
    },
  };

  const cli = (...args: string[]) =>
    main(['node', 'testmend', ...args], { cwd: repo, overrides: { sandbox } });

  const lastJson = (): unknown => {
    const calls = logSpy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1]?.[0]));
  };

  beforeEach(async () => {
    repo = await fs.mkdtemp(path.join(os.tmpdir(), 'testmend-cli-'));
    await fs.mkdir(path.join(repo, 'src'));
    await fs.writeFile(path.join(repo, 'src/greet.ts'), GREET);
    await fs.writeFile(path.join(repo, '.testmend.yaml'), 'knowledge:\n  enabled: false\n');
    await fs.writeFile(
      path.join(repo, 'batch.yaml'),
      '- id: greet\n  targetFile: src/greet.ts\n- id: other\n',
    );
    await fs.writeFile(
      path.join(repo, 'fix.yaml'),
      [
        'kind: TargetedReplace',
        'targetFile: src/greet.ts',
        'payload:',
        '  kind: TargetedReplace',
        `  oldText: "'./helpr'"`,
        `  newText: "'./helper'"`,
        '',
      ].join('\n'),
    );
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(repo, { recursive: true, force: true });
  });

  it('exports name', () => {
    expect(name).toBe('@testmend/cli');
  });

  it('runs a batch, takes a verdict and resumes to a pass', async () => {
    expect(await cli('--json', 'run', 'batch.yaml', '--run-id', 'r1', '--strict')).toBe(1);
    expect(lastJson()).toMatchObject({ runId: 'r1', total: 2, passed: 1, escalated: 1 });

    expect(await cli('--json', 'escalations', 'r1')).toBe(0);
    expect(lastJson()).toEqual([
      expect.objectContaining({ caseId: 'greet', reason: 'no_viable_patch', retryCount: 0 }),
    ]);

    expect(await cli('--json', 'resolve', 'r1', 'greet', 'fix', '--patch', 'fix.yaml')).toBe(0);
    expect(lastJson()).toEqual({ caseId: 'greet', status: 'Healing', verdict: 'fix' });

    expect(await cli('--json', 'resume', 'r1')).toBe(0);
    expect(lastJson()).toMatchObject({ runId: 'r1', resumed: true, passed: 2, escalated: 0 });
    expect(await fs.readFile(path.join(repo, 'src/greet.ts'), 'utf8')).toContain("'./helper'");

    expect(await cli('--json', 'status', 'r1')).toBe(0);
    expect(lastJson()).toMatchObject({
      runId: 'r1',
      cases: [
        { id: 'greet', status: 'Passed', retryCount: 0 },
        { id: 'other', status: 'Passed', retryCount: 0 },
      ],
    });

    expect(await cli('--json', 'report', 'r1', '--out', 'report.json')).toBe(0);
    const report = JSON.parse(await fs.readFile(path.join(repo, 'report.json'), 'utf8'));
    expect(report.counts.Passed).toBe(2);
    expect(report.cases[0].history.map((r: { passed: boolean }) => r.passed)).toEqual([false, true]);
  });

  it('exits 0 without strict mode even when cases escalate', async () => {
    expect(await cli('--json', 'run', 'batch.yaml', '--run-id', 'r2')).toBe(0);
    expect(lastJson()).toMatchObject({ escalated: 1 });
  });

  it('reports an unknown run as a usage error', async () => {
    expect(await cli('--json', 'status', 'missing')).toBe(2);
    expect(lastJson()).toEqual({
      error: { code: 'UsageError', message: `Run "missing" not found under ${repo}` },
    });
  });

  it('rejects an unknown verdict before doing anything', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(await cli('resolve', 'r1', 'greet', 'maybe')).toBe(2);
  });

  it('rejects a verdict on a case that is not escalated', async () => {
    await cli('--json', 'run', 'batch.yaml', '--run-id', 'r3');

    expect(await cli('--json', 'resolve', 'r3', 'other', 'skip')).toBe(1);
    expect(lastJson()).toEqual({
      error: { code: 'EscalationError', message: 'Case "other" is Passed, not Escalated' },
    });
  });
});
