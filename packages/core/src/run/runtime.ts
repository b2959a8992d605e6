import path from 'node:path';
import {
  createProviderAdapter,
  type ProviderAdapter,
} from '@testmend/adapters';
import { ProcessSandboxRunner, type SandboxRunner } from '@testmend/exec';
import { PatchEngine } from '@testmend/repo';
import {
  ConfigError,
  JsonlLogger,
  SummaryWriter,
  UsageError,
  createRunDir,
  getRunArtifactPaths,
  readFileIfExists,
  runExists,
  type CaseSeed,
  type Config,
  type LogLevel,
  type Logger,
  type ManualPatch,
  type RunArtifactPaths,
  type RunSummary,
  type TestCase,
  type Verdict,
} from '@testmend/shared';
import { FileChecklistStore } from '../checklist/file_store';
import { LlmCollaborator } from '../collaborator/llm_collaborator';
import type { Collaborator } from '../collaborator/types';
import { ConfigLoader } from '../config/loader';
import { DiagnosisClassifier } from '../diagnosis/classifier';
import { KnowledgeBase, KnowledgeRecorder } from '../diagnosis/knowledge';
import { HealingEngine } from '../engine/engine';
import { HealEventBus } from '../engine/events';
import {
  EscalationController,
  type EscalationRequest,
  type EscalationReviewer,
} from '../escalation/controller';

/** Replaceable parts of a run, mostly for tests. */
export interface RuntimeOverrides {
  sandbox?: SandboxRunner;
  /** Used instead of an adapter built from `config.provider` */
  adapter?: ProviderAdapter;
  reviewer?: EscalationReviewer;
  logLevel?: LogLevel;
  env?: NodeJS.ProcessEnv;
  clock?: () => Date;
}

export interface RunLocation {
  repoRoot: string;
  runId: string;
}

export interface OpenRunOptions extends RunLocation, RuntimeOverrides {
  config: Config;
}

/** Everything one run is made of, wired from its config. */
export interface HealingRun {
  runId: string;
  repoRoot: string;
  config: Config;
  paths: RunArtifactPaths;
  store: FileChecklistStore;
  bus: HealEventBus;
  logger: Logger;
  engine: HealingEngine;
}

export interface RunOutcome {
  run: HealingRun;
  summary: RunSummary;
  summaryPath: string;
}

function createCollaborator(
  config: Config,
  runId: string,
  logger: Logger,
  adapter?: ProviderAdapter,
): Collaborator | undefined {
  const provider = adapter ?? (config.provider ? createProviderAdapter(config.provider) : undefined);
  if (!provider) return undefined;
  return new LlmCollaborator(provider, {
    runId,
    logger: logger.child({ component: 'collaborator' }),
    timeoutMs: config.provider?.timeoutMs,
    temperature: config.provider?.temperature,
  });
}

/**
 * Builds the store, event bus, knowledge base, patch engine, sandbox,
 * classifier and engine of a run. Creates the run directory when needed.
 */
export async function openRun(options: OpenRunOptions): Promise<HealingRun> {
  const { repoRoot, runId, config, clock } = options;
  const paths = await createRunDir(repoRoot, runId);
  const logger = new JsonlLogger(paths.trace, { runId }, options.logLevel ?? 'info');
  const bus = new HealEventBus(logger);
  const store = new FileChecklistStore(paths.checklist, runId, clock);

  let knowledge: KnowledgeBase | undefined;
  if (config.knowledge.enabled) {
    knowledge = new KnowledgeBase(path.resolve(repoRoot, config.knowledge.path), logger);
    await knowledge.load();
    bus.subscribe(new KnowledgeRecorder(knowledge, clock).handle);
  }

  const collaborator = createCollaborator(config, runId, logger, options.adapter);
  const classifier = new DiagnosisClassifier({
    analyzer: collaborator,
    knowledge,
    logger: logger.child({ component: 'diagnosis' }),
  });
  const patches = new PatchEngine({ root: repoRoot, ...config.patch });
  const sandbox =
    options.sandbox ??
    new ProcessSandboxRunner({
      command: config.sandbox.command,
      maxOutputBytes: config.sandbox.maxOutputBytes,
      envAllowlist: config.sandbox.envAllowlist,
      ignore: config.sandbox.ignore,
    });

  const engine = new HealingEngine({
    runId,
    config,
    store,
    patches,
    sandbox,
    classifier,
    bus,
    logger,
    collaborator,
    reviewer: options.reviewer,
    clock,
  });

  return { runId, repoRoot, config, paths, store, bus, logger, engine };
}

/**
 * Starts (or extends) a run with a batch: seeds new case ids, drives every
 * case to a resting status and writes the effective config and summary.
 */
export async function startRun(
  batch: readonly CaseSeed[],
  options: OpenRunOptions & { signal?: AbortSignal },
): Promise<RunOutcome> {
  const run = await openRun(options);
  ConfigLoader.writeEffectiveConfig(run.config, run.paths.root);
  const summary = await run.engine.runOnce(batch, { signal: options.signal });
  const summaryPath = await SummaryWriter.write(summary, run.paths.root);
  return { run, summary, summaryPath };
}

/**
 * Continues an existing run. Without an explicit config, the config the run
 * was started with is used.
 */
export async function resumeRun(
  options: RunLocation & RuntimeOverrides & { config?: Config; signal?: AbortSignal },
): Promise<RunOutcome> {
  await assertRunExists(options);
  const config = options.config ?? (await loadRunConfig(options, options.env));
  const run = await openRun({ ...options, config });
  const summary = await run.engine.resume({ signal: options.signal });
  const summaryPath = await SummaryWriter.write(summary, run.paths.root);
  return { run, summary, summaryPath };
}

export async function assertRunExists({ repoRoot, runId }: RunLocation): Promise<void> {
  if (!(await runExists(repoRoot, runId))) {
    throw new UsageError(`Run "${runId}" not found under ${repoRoot}`);
  }
}

/** The config a run was started with; the API key comes from the environment again. */
export async function loadRunConfig(
  { repoRoot, runId }: RunLocation,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  const file = getRunArtifactPaths(repoRoot, runId).effectiveConfig;
  const raw = await readFileIfExists(file);
  if (raw === null) {
    throw new UsageError(`Run "${runId}" has no effective config at ${file}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Effective config of run "${runId}" is not valid JSON`, { cause: error });
  }
  return ConfigLoader.resolveSecrets(ConfigLoader.validate(parsed), env);
}

async function escalationController(location: RunLocation, config?: Config) {
  await assertRunExists(location);
  const runConfig = config ?? (await loadRunConfig(location));
  const paths = getRunArtifactPaths(location.repoRoot, location.runId);
  const logger = new JsonlLogger(paths.trace, { runId: location.runId });
  return new EscalationController({
    store: new FileChecklistStore(paths.checklist, location.runId),
    runId: location.runId,
    maxRetries: runConfig.healing.maxRetries,
    bus: new HealEventBus(logger),
  });
}

export async function listEscalations(
  location: RunLocation,
  config?: Config,
): Promise<EscalationRequest[]> {
  return (await escalationController(location, config)).pending();
}

/**
 * Records a human verdict outside a running engine. A `fix` case is picked
 * up by the next `resumeRun`.
 */
export async function resolveEscalation(
  location: RunLocation & { caseId: string; verdict: Verdict; manualPatch?: ManualPatch },
  config?: Config,
): Promise<TestCase> {
  const controller = await escalationController(location, config);
  return controller.resolve(location.caseId, location.verdict, location.manualPatch);
}
