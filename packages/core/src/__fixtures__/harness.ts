import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { SandboxResult, SandboxRunner, SandboxRunOptions } from '@testmend/exec';
import { PatchEngine, type PatchEngineOptions } from '@testmend/repo';
import {
  CancelledError,
  ConfigSchema,
  SilentLogger,
  type CaseStatus,
  type ConfigInput,
  type HealEvent,
} from '@testmend/shared';
import type { ChecklistStore } from '../checklist/types';
import { MemoryChecklistStore } from '../checklist/memory_store';
import type { Collaborator } from '../collaborator/types';
import { DiagnosisClassifier } from '../diagnosis/classifier';
import { HealingEngine } from '../engine/engine';
import { HealEventBus } from '../engine/events';
import type { EscalationReviewer } from '../escalation/controller';

export type Outcome = Partial<SandboxResult> & { passed: boolean };

export type Decide = (
  selector: string,
  root: string,
  call: number,
  signal?: AbortSignal,
) => Promise<Outcome> | Outcome;

export const pass = (): Outcome => ({ passed: true });
export const fail = (stderr: string): Outcome => ({ passed: false, stderr });

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Sandbox stand-in that asks `decide` for the outcome of each run.
 * `call` counts runs of the same selector, starting at 1.
 */
export class FakeSandbox implements SandboxRunner {
  readonly calls: string[] = [];

  constructor(private readonly decide: Decide) {}

  async run(selector: string, snapshot: string, options: SandboxRunOptions): Promise<SandboxResult> {
    if (options.signal?.aborted) {
      throw new CancelledError('Sandbox run cancelled before start');
    }
    this.calls.push(selector);
    const call = this.calls.filter((s) => s === selector).length;
    const outcome = await this.decide(selector, snapshot, call, options.signal);
    return {
      stdout: '',
      stderr: '',
      durationMs: 5,
      timedOut: false,
      exitCode: outcome.passed ? 0 : 1,
      truncated: false,
      ...outcome,
    };
  }
}

export function fakeCollaborator(overrides: Partial<Collaborator> = {}): Collaborator {
  return {
    proposeTest: vi.fn(async () => null),
    refineDiagnosis: vi.fn(async () => null),
    draftPatch: vi.fn(async () => null),
    ...overrides,
  };
}

export interface HarnessOptions {
  decide: Decide;
  files?: Record<string, string>;
  config?: ConfigInput;
  collaborator?: Collaborator;
  reviewer?: EscalationReviewer;
  store?: ChecklistStore;
  patchOptions?: Omit<PatchEngineOptions, 'root'>;
}

export async function createHarness(options: HarnessOptions) {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'testmend-engine-'));
  for (const [file, content] of Object.entries(options.files ?? {})) {
    await fs.mkdir(path.dirname(path.join(root, file)), { recursive: true });
    await fs.writeFile(path.join(root, file), content);
  }

  const store = options.store ?? new MemoryChecklistStore('run-1');
  const patches = new PatchEngine({ root, ...options.patchOptions });
  const sandbox = new FakeSandbox(options.decide);
  const logger = new SilentLogger();
  const bus = new HealEventBus(logger);
  const events: HealEvent[] = [];
  bus.subscribe((event) => {
    events.push(event);
  });
  const config = ConfigSchema.parse(options.config ?? {});

  const makeEngine = () =>
    new HealingEngine({
      runId: 'run-1',
      config,
      store,
      patches,
      sandbox,
      classifier: new DiagnosisClassifier(),
      bus,
      logger,
      collaborator: options.collaborator,
      reviewer: options.reviewer,
    });

  return {
    root,
    store,
    patches,
    sandbox,
    bus,
    events,
    config,
    engine: makeEngine(),
    makeEngine,
    read: (file: string) => fs.readFile(path.join(root, file), 'utf8'),
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

/** Statuses a case was committed to, in order. */
export function transitions(events: readonly HealEvent[], caseId: string): CaseStatus[] {
  return events.flatMap((e) =>
    e.type === 'CaseTransitioned' && e.payload.caseId === caseId ? [e.payload.to] : [],
  );
}

export function eventTypes(events: readonly HealEvent[], caseId: string): string[] {
  return events.flatMap((e) =>
    'caseId' in e.payload && e.payload.caseId === caseId ? [e.type] : [],
  );
}
