import path from 'path';
import { InvalidArgumentError, type Command } from 'commander';
import {
  assertRunExists,
  listEscalations,
  loadRunConfig,
  resolveEscalation,
} from '@testmend/core';
import { CancelledError, EscalationError, VERDICTS, type Verdict } from '@testmend/shared';
import { InquirerReviewer } from '../ui/reviewer';
import { loadManualPatch } from '../utils/manual_patch';
import { rendererFor, repoRootOf, withInterrupt, type CliContext } from './context';

export function parseVerdict(value: string): Verdict {
  const verdict = VERDICTS.find((v) => v === value);
  if (!verdict) {
    throw new InvalidArgumentError(`Expected one of ${VERDICTS.join(', ')}`);
  }
  return verdict;
}

export function registerEscalationCommands(program: Command, ctx: CliContext) {
  program
    .command('escalations')
    .argument('<runId>', 'Run to inspect')
    .description('List the cases of a run waiting for a human verdict')
    .action(async (runId: string) => {
      const renderer = rendererFor(program);
      const repoRoot = await repoRootOf(ctx);
      renderer.escalations(await listEscalations({ repoRoot, runId }));
    });

  program
    .command('resolve')
    .argument('<runId>', 'Run the case belongs to')
    .argument('<caseId>', 'Escalated case')
    .argument('<verdict>', `One of ${VERDICTS.join(', ')}`, parseVerdict)
    .option('--patch <file>', 'Manual patch (YAML or JSON) to apply with the fix verdict')
    .description('Record a verdict for an escalated case; resume the run to act on a fix')
    .action(async (runId: string, caseId: string, verdict: Verdict, options: { patch?: string }) => {
      const renderer = rendererFor(program);
      const repoRoot = await repoRootOf(ctx);
      const manualPatch = options.patch
        ? await loadManualPatch(path.resolve(ctx.cwd, options.patch))
        : undefined;

      const resolved = await resolveEscalation({ repoRoot, runId, caseId, verdict, manualPatch });
      renderer.resolved(resolved);
    });

  program
    .command('review')
    .argument('<runId>', 'Run to review')
    .description('Walk through every escalated case of a run and record a verdict for each')
    .action(async (runId: string) => {
      const renderer = rendererFor(program);
      const repoRoot = await repoRootOf(ctx);
      await assertRunExists({ repoRoot, runId });
      const config = await loadRunConfig({ repoRoot, runId });
      const reviewer = ctx.overrides.reviewer ?? new InquirerReviewer(config.healing.maxRetries);

      const pending = await listEscalations({ repoRoot, runId }, config);
      if (pending.length === 0) {
        renderer.escalations(pending);
        return;
      }

      let fixes = 0;
      await withInterrupt(renderer, async (signal) => {
        for (const request of pending) {
          if (signal.aborted) break;
          try {
            const decision = await reviewer.review(request, signal);
            const resolved = await resolveEscalation(
              { repoRoot, runId, caseId: request.caseId, ...decision },
              config,
            );
            if (resolved.verdict === 'fix') fixes++;
            renderer.resolved(resolved);
          } catch (error) {
            if (error instanceof CancelledError) break;
            if (!(error instanceof EscalationError)) throw error;
            renderer.error(`${request.caseId}: ${error.message}`);
          }
        }
      });

      if (fixes > 0) {
        renderer.log(`Resume the run to heal the fixed cases: testmend resume ${runId}`);
      }
    });
}
