import { Command, CommanderError } from 'commander';
import type { RuntimeOverrides } from '@testmend/core';
import { AppError, exitCodeFor } from '@testmend/shared';
import { version } from '../package.json';
import { registerCommands, type CliContext } from './commands';

export const name = '@testmend/cli';

export interface ProgramOptions {
  cwd?: string;
  overrides?: RuntimeOverrides;
}

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('testmend')
    .description('Verify candidate test cases, heal failures with minimal patches, escalate the rest')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerCommands(program, ctx);
  return program;
}

function reportError(e: unknown, opts: { json?: boolean; verbose?: boolean }): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses and runs one command line. Resolves to the process exit code:
 * 2 for usage and config errors, 1 for other failures and for strict runs
 * with open cases, 0 otherwise.
 */
export async function main(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  const ctx: CliContext = {
    cwd: options.cwd ?? process.cwd(),
    overrides: options.overrides ?? {},
    exitCode: 0,
  };
  const program = createProgram(ctx);

  try {
    await program.parseAsync([...argv]);
    return ctx.exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed its message
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts<{ json?: boolean; verbose?: boolean }>());
    return exitCodeFor(e);
  }
}
