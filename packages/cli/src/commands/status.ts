import type { Command } from 'commander';
import {
  FileChecklistStore,
  assertRunExists,
  buildRunReport,
  readRunSummary,
} from '@testmend/core';
import { getRunArtifactPaths } from '@testmend/shared';
import { rendererFor, repoRootOf, type CliContext } from './context';

export function registerStatusCommand(program: Command, ctx: CliContext) {
  program
    .command('status')
    .argument('<runId>', 'Run to inspect')
    .description('Show the committed status of every case of a run')
    .action(async (runId: string) => {
      const renderer = rendererFor(program);
      const repoRoot = await repoRootOf(ctx);
      await assertRunExists({ repoRoot, runId });

      const store = new FileChecklistStore(getRunArtifactPaths(repoRoot, runId).checklist, runId);
      const report = await buildRunReport(runId, store, await readRunSummary({ repoRoot, runId }));
      renderer.status(report);
    });
}
