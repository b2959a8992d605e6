import { InvalidArgumentError, type Command } from 'commander';
import { resolveConfig, type LoadedConfig, type RuntimeOverrides } from '@testmend/core';
import type { ConfigInput, LogLevel, RunSummary } from '@testmend/shared';
import { findRepoRoot } from '@testmend/repo';
import { OutputRenderer } from '../output/renderer';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

/** What every command shares: where it runs and how it reports. */
export interface CliContext {
  cwd: string;
  /** Replaces parts of the runtime, e.g. the sandbox in tests */
  overrides: RuntimeOverrides;
  exitCode: number;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

export function rendererFor(program: Command): OutputRenderer {
  return new OutputRenderer(!!globalOptions(program).json);
}

export function logLevelFor(options: GlobalOptions): LogLevel {
  if (options.json) return 'error';
  return options.verbose ? 'debug' : 'info';
}

export async function loadConfig(
  program: Command,
  ctx: CliContext,
  flags?: ConfigInput,
): Promise<LoadedConfig> {
  return resolveConfig(globalOptions(program).config, flags, ctx.cwd);
}

export async function repoRootOf(ctx: CliContext): Promise<string> {
  return findRepoRoot(ctx.cwd);
}

/**
 * Runs `task` with a signal that aborts on the first Ctrl-C. A second
 * Ctrl-C falls through to the default handler.
 */
export async function withInterrupt<T>(
  renderer: OutputRenderer,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => {
    renderer.log('Stopping after the current steps; interrupt again to quit immediately.');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return n;
}

/** Strict mode fails the process when any case ended Failed or Escalated. */
export function applyStrict(ctx: CliContext, strict: boolean, summary: RunSummary): void {
  if (strict && summary.failed + summary.escalated > 0) {
    ctx.exitCode = 1;
  }
}
