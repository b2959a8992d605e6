import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from './path';
import { createRunDir, getRunArtifactPaths, listRunIds, newRunId, runExists } from './artifacts';

describe('artifacts', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'testmend-artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('lays out run files under .testmend/runs/<runId>', () => {
    const paths = getRunArtifactPaths('/repo', 'r1');
    expect(paths).toEqual({
      root: '/repo/.testmend/runs/r1',
      checklist: '/repo/.testmend/runs/r1/checklist.json',
      trace: '/repo/.testmend/runs/r1/trace.jsonl',
      summary: '/repo/.testmend/runs/r1/summary.json',
      effectiveConfig: '/repo/.testmend/runs/r1/effective-config.json',
      report: '/repo/.testmend/runs/r1/report.json',
    });
  });

  it('creates the run directory and lists runs in order', async () => {
    await createRunDir(tmpDir, 'b-run');
    await createRunDir(tmpDir, 'a-run');
    expect(await listRunIds(tmpDir)).toEqual(['a-run', 'b-run']);
  });

  it('returns no runs when nothing was created', async () => {
    expect(await listRunIds(tmpDir)).toEqual([]);
  });

  it('reports a run as existing once its checklist is written', async () => {
    const paths = await createRunDir(tmpDir, 'r1');
    expect(await runExists(tmpDir, 'r1')).toBe(false);
    await fs.writeFile(paths.checklist, '{}');
    expect(await runExists(tmpDir, 'r1')).toBe(true);
  });

  it('builds sortable run ids from the clock', () => {
    const id = newRunId(new Date('2026-03-04T05:06:07.890Z'));
    expect(id).toMatch(/^20260304T050607Z-[0-9a-f]{6}$/);
  });
});
