import path from 'path';
import type { Command } from 'commander';
import { writeRunReport } from '@testmend/core';
import { formatDuration } from '../output/renderer';
import { rendererFor, repoRootOf, type CliContext } from './context';

export function registerReportCommand(program: Command, ctx: CliContext) {
  program
    .command('report')
    .argument('<runId>', 'Run to report on')
    .option('--out <file>', 'Where to write the JSON report (defaults to the run directory)')
    .description('Write a JSON report of a run: every case with its execution history')
    .action(async (runId: string, options: { out?: string }) => {
      const renderer = rendererFor(program);
      const repoRoot = await repoRootOf(ctx);
      const out = options.out ? path.resolve(ctx.cwd, options.out) : undefined;

      const { report, path: written } = await writeRunReport({ repoRoot, runId }, out);

      if (!renderer.isJsonMode()) {
        renderer.log(`Report of run ${runId} written to ${written}`);
        if (report.summary) {
          renderer.log(
            `Last summary: ${report.summary.passed}/${report.summary.total} passed in ${formatDuration(report.summary.durationMs)}`,
          );
        }
        return;
      }
      renderer.json({ runId, path: written });
    });
}
