import { spawn } from 'child_process';
import { withDir } from 'tmp-promise';
import { CancelledError, SandboxError } from '@testmend/shared';
import { buildCommand } from '../classify/parser';
import type { ParsedCommand } from '../classify/types';
import { getSafeEnv } from '../runner/env';
import { killProcessTree } from '../runner/process';
import { copySnapshot } from './snapshot';

export interface SandboxResult {
  passed: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  /** null when the process was ended by a signal */
  exitCode: number | null;
  truncated: boolean;
}

export interface SandboxRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs one test selector against a snapshot of the source tree.
 * A failing or timed-out test is a result; only a process that cannot be
 * started rejects (with `SandboxError`), and an abort rejects with
 * `CancelledError`.
 */
export interface SandboxRunner {
  run(selector: string, snapshot: string, options: SandboxRunOptions): Promise<SandboxResult>;
}

export interface ProcessSandboxRunnerOptions {
  /** Command template; `{selector}` is replaced inside each argument */
  command: string;
  maxOutputBytes: number;
  envAllowlist?: readonly string[];
  /** Top-level entries left out of the snapshot copy */
  ignore?: readonly string[];
  /** Delay between SIGTERM and SIGKILL */
  killGraceMs?: number;
}

type StreamName = 'stdout' | 'stderr';

class CappedOutput {
  private used = 0;
  private readonly chunks: Record<StreamName, Buffer[]> = { stdout: [], stderr: [] };
  private cutIn: StreamName | null = null;

  constructor(private readonly limit: number) {}

  get truncated(): boolean {
    return this.cutIn !== null;
  }

  push(stream: StreamName, chunk: Buffer): void {
    if (this.cutIn) return;
    const room = this.limit - this.used;
    if (chunk.length > room) {
      this.chunks[stream].push(chunk.subarray(0, room));
      this.used = this.limit;
      this.cutIn = stream;
      return;
    }
    this.chunks[stream].push(chunk);
    this.used += chunk.length;
  }

  text(stream: StreamName): string {
    const body = Buffer.concat(this.chunks[stream]).toString('utf8');
    return this.cutIn === stream ? `${body}\n[output truncated at ${this.limit} bytes]\n` : body;
  }
}

export class ProcessSandboxRunner implements SandboxRunner {
  private readonly killGraceMs: number;

  constructor(private readonly options: ProcessSandboxRunnerOptions) {
    this.killGraceMs = options.killGraceMs ?? 2000;
  }

  async run(selector: string, snapshot: string, options: SandboxRunOptions): Promise<SandboxResult> {
    const command = buildCommand(this.options.command, selector);
    if (!command.bin) {
      throw new SandboxError(`Could not parse command: ${this.options.command}`);
    }
    throwIfAborted(options.signal);

    return withDir(
      async ({ path: workDir }) => {
        await copySnapshot(snapshot, workDir, this.options.ignore ?? []);
        throwIfAborted(options.signal);
        return this.exec(command, workDir, options);
      },
      { unsafeCleanup: true, prefix: 'testmend-sandbox-' },
    );
  }

  private exec(command: ParsedCommand, cwd: string, options: SandboxRunOptions): Promise<SandboxResult> {
    const env = getSafeEnv(this.options.envAllowlist ?? [], process.env, command.env);
    const output = new CappedOutput(this.options.maxOutputBytes);
    const start = Date.now();

    return new Promise<SandboxResult>((resolve, reject) => {
      let settled = false;
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(command.bin, command.args, {
        cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });

      const terminate = () => {
        const pid = child.pid;
        if (pid === undefined) return;
        killProcessTree(pid, 'SIGTERM');
        killTimer = setTimeout(() => killProcessTree(pid, 'SIGKILL'), this.killGraceMs);
        killTimer.unref();
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs);

      const onAbort = () => {
        cancelled = true;
        terminate();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = () => {
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.stdout.on('data', (chunk: Buffer) => output.push('stdout', chunk));
      child.stderr.on('data', (chunk: Buffer) => output.push('stderr', chunk));

      child.on('error', (err) => {
        if (settled) return;
        finish();
        reject(new SandboxError(`Failed to start process: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        if (settled) return;
        finish();
        if (cancelled) {
          reject(new CancelledError(`Sandbox run cancelled: ${command.raw}`));
          return;
        }
        resolve({
          passed: !timedOut && code === 0,
          stdout: output.text('stdout'),
          stderr: output.text('stderr'),
          durationMs: Date.now() - start,
          timedOut,
          exitCode: code,
          truncated: output.truncated,
        });
      });
    });
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError('Sandbox run cancelled before start');
  }
}
