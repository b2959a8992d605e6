import type { Command } from 'commander';
import type { CliContext } from './context';
import { registerEscalationCommands } from './escalations';
import { registerReportCommand } from './report';
import { registerResumeCommand } from './resume';
import { registerRunCommand } from './run';
import { registerStatusCommand } from './status';

export function registerCommands(program: Command, ctx: CliContext) {
  registerRunCommand(program, ctx);
  registerResumeCommand(program, ctx);
  registerStatusCommand(program, ctx);
  registerEscalationCommands(program, ctx);
  registerReportCommand(program, ctx);
}

export type { CliContext } from './context';
