import type { Command } from 'commander';
import { assertRunExists, loadRunConfig, resumeRun } from '@testmend/core';
import { InquirerReviewer } from '../ui/reviewer';
import {
  applyStrict,
  globalOptions,
  logLevelFor,
  rendererFor,
  repoRootOf,
  withInterrupt,
  type CliContext,
} from './context';

interface ResumeOptions {
  strict?: boolean;
  interactive?: boolean;
}

export function registerResumeCommand(program: Command, ctx: CliContext) {
  program
    .command('resume')
    .argument('<runId>', 'Run to continue')
    .description('Continue every unfinished case of a run from its last committed status')
    .option('--strict', 'Exit non-zero when any case ends Failed or Escalated')
    .option('--interactive', 'Ask for a verdict as soon as a case is escalated')
    .action(async (runId: string, options: ResumeOptions) => {
      const globals = globalOptions(program);
      const renderer = rendererFor(program);
      const repoRoot = await repoRootOf(ctx);
      await assertRunExists({ repoRoot, runId });
      const config = await loadRunConfig({ repoRoot, runId });

      const { summary, summaryPath } = await withInterrupt(renderer, (signal) =>
        resumeRun({
          repoRoot,
          runId,
          config,
          signal,
          logLevel: logLevelFor(globals),
          reviewer: options.interactive ? new InquirerReviewer(config.healing.maxRetries) : undefined,
          ...ctx.overrides,
        }),
      );

      renderer.summary(summary, summaryPath);
      applyStrict(ctx, config.strict || !!options.strict, summary);
    });
}
