import { z } from 'zod';

export const ProviderConfigSchema = z.object({
  type: z.enum(['openai', 'fake']),
  model: z.string().min(1),
  /** Environment variable holding the API key */
  api_key_env: z.string().optional(),
  api_key: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  /** Canned responses for the `fake` provider, returned in order */
  responses: z.array(z.string()).optional(),
});

export const HealingConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  confidenceFloor: z.number().min(0).max(1).default(0.6),
  /** Roll a patch back when the re-verification it was made for still fails */
  rollbackFailedPatches: z.boolean().default(false),
});

export const ConcurrencyConfigSchema = z.object({
  workers: z.number().int().min(1).max(64).default(4),
});

export const SandboxConfigSchema = z.object({
  /** Shell-free command line; `{selector}` is replaced with the case selector */
  command: z.string().min(1).default('npm test -- {selector}'),
  timeoutMs: z.number().int().positive().default(120_000),
  maxOutputBytes: z
    .number()
    .int()
    .positive()
    .default(1024 * 1024),
  /** Extra environment variable names passed through to the test process */
  envAllowlist: z.array(z.string()).default([]),
  /** Top-level entries not copied into the sandbox directory */
  ignore: z.array(z.string()).default(['node_modules', '.git', '.testmend']),
});

export const PatchConfigSchema = z.object({
  lockScope: z.enum(['file', 'tree']).default('file'),
  lockTimeoutMs: z.number().int().positive().default(30_000),
  /** Lines of drift tolerated when locating a diff hunk */
  fuzz: z.number().int().min(0).default(2),
  maxLinesTouched: z.number().int().positive().default(400),
  allowBinary: z.boolean().default(false),
});

export const KnowledgeConfigSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().default('.testmend/knowledge.jsonl'),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  healing: HealingConfigSchema.default({}),
  concurrency: ConcurrencyConfigSchema.default({}),
  sandbox: SandboxConfigSchema.default({}),
  patch: PatchConfigSchema.default({}),
  knowledge: KnowledgeConfigSchema.default({}),
  provider: ProviderConfigSchema.optional(),
  /** Exit non-zero when any case ends Failed or Escalated */
  strict: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type HealingConfig = z.infer<typeof HealingConfigSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type PatchConfig = z.infer<typeof PatchConfigSchema>;
export type KnowledgeConfig = z.infer<typeof KnowledgeConfigSchema>;
