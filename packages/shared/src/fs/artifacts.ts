import * as fs from 'fs/promises';
import { randomBytes } from 'node:crypto';
import { pathExists } from 'fs-extra';
import { join } from './path';

export const APP_DIR = '.testmend';
export const RUNS_DIR = 'runs';

export interface RunArtifactPaths {
  root: string;
  /** Checklist document of the run */
  checklist: string;
  /** JSONL audit trail of heal events */
  trace: string;
  summary: string;
  /** Config the run was started with, for `resume` */
  effectiveConfig: string;
  report: string;
}

export function getRunArtifactPaths(baseDir: string, runId: string): RunArtifactPaths {
  const root = join(baseDir, APP_DIR, RUNS_DIR, runId);
  return {
    root,
    checklist: join(root, 'checklist.json'),
    trace: join(root, 'trace.jsonl'),
    summary: join(root, 'summary.json'),
    effectiveConfig: join(root, 'effective-config.json'),
    report: join(root, 'report.json'),
  };
}

/**
 * Creates the artifact directory of a run and returns its paths.
 */
export async function createRunDir(baseDir: string, runId: string): Promise<RunArtifactPaths> {
  const paths = getRunArtifactPaths(baseDir, runId);
  await fs.mkdir(paths.root, { recursive: true });
  return paths;
}

export async function runExists(baseDir: string, runId: string): Promise<boolean> {
  return pathExists(getRunArtifactPaths(baseDir, runId).checklist);
}

/**
 * Sortable run id: UTC timestamp plus a short random suffix.
 */
export function newRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
  return `${stamp}-${randomBytes(3).toString('hex')}`;
}

/** Run ids found under the artifacts directory, oldest first. */
export async function listRunIds(baseDir: string): Promise<string[]> {
  const dir = join(baseDir, APP_DIR, RUNS_DIR);
  if (!(await pathExists(dir))) return [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
}
