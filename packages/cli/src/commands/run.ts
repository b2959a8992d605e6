import path from 'path';
import type { Command } from 'commander';
import { startRun } from '@testmend/core';
import { newRunId, type ConfigInput } from '@testmend/shared';
import { InquirerReviewer } from '../ui/reviewer';
import { loadBatch } from '../utils/batch';
import {
  applyStrict,
  globalOptions,
  loadConfig,
  logLevelFor,
  parseNonNegativeInt,
  parsePositiveInt,
  rendererFor,
  withInterrupt,
  type CliContext,
} from './context';

interface RunOptions {
  runId?: string;
  workers?: number;
  maxRetries?: number;
  strict?: boolean;
  interactive?: boolean;
}

export function registerRunCommand(program: Command, ctx: CliContext) {
  program
    .command('run')
    .argument('<batch>', 'YAML or JSON file listing the cases to verify')
    .description('Verify a batch of test cases, healing failures where possible')
    .option('--run-id <id>', 'Run id (defaults to a new timestamped id)')
    .option('--workers <n>', 'Cases processed concurrently', parsePositiveInt)
    .option('--max-retries <n>', 'Automated heal attempts per case', parseNonNegativeInt)
    .option('--strict', 'Exit non-zero when any case ends Failed or Escalated')
    .option('--interactive', 'Ask for a verdict as soon as a case is escalated')
    .action(async (batchFile: string, options: RunOptions) => {
      const globals = globalOptions(program);
      const renderer = rendererFor(program);

      const batch = await loadBatch(path.resolve(ctx.cwd, batchFile));
      const flags: ConfigInput = {
        concurrency: options.workers !== undefined ? { workers: options.workers } : undefined,
        healing: options.maxRetries !== undefined ? { maxRetries: options.maxRetries } : undefined,
        strict: options.strict ? true : undefined,
      };
      const { config, repoRoot } = await loadConfig(program, ctx, flags);
      const runId = options.runId ?? newRunId();

      if (globals.verbose) renderer.log(`Run ${runId}: ${batch.length} case(s) in ${repoRoot}`);

      const { summary, summaryPath } = await withInterrupt(renderer, (signal) =>
        startRun(batch, {
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
      applyStrict(ctx, config.strict, summary);
    });
}
