import { z } from 'zod';
import type { AdapterContext, ProviderAdapter } from '@testmend/adapters';
import {
  AppError,
  ProviderError,
  extractJsonObject,
  type ChatMessage,
  type Logger,
  type PatchKind,
  type PatchPayload,
} from '@testmend/shared';
import type { SemanticAnalysisInput, SemanticVerdict } from '../diagnosis/classifier';
import { buildDiagnosisMessages, buildDraftPatchMessages, buildProposeTestMessages } from './prompts';
import type { Collaborator, DraftPatchInput, PatchDraft, ProposeTestInput } from './types';

const proposeTestSchema = z.object({
  testCode: z.string(),
});

const verdictSchema = z.object({
  category: z.enum([
    'ImportOrNameError',
    'EnvironmentError',
    'AssertionMismatch',
    'MockOrFixtureError',
    'AmbiguousOrComplex',
  ]),
  scope: z.enum(['Local', 'MultiLine', 'FileWide']),
  confidence: z.number().min(0).max(1),
  token: z.string().min(1).optional(),
  explanation: z.string().optional(),
});

const draftMeta = {
  confidence: z.number().min(0).max(1).optional(),
  rationale: z.string().optional(),
};

const noPatchSchema = z.object({ noPatch: z.literal(true) });

const draftSchemas = {
  TargetedReplace: z.object({ oldText: z.string().min(1), newText: z.string(), ...draftMeta }),
  UnifiedDiff: z.object({ diff: z.string().min(1), ...draftMeta }),
  FullRewrite: z.object({ content: z.string(), ...draftMeta }),
} satisfies Record<PatchKind, z.ZodTypeAny>;

export interface LlmCollaboratorOptions {
  runId: string;
  logger: Logger;
  timeoutMs?: number;
  temperature?: number;
}

/**
 * Collaborator backed by a provider adapter. Every answer is a JSON object
 * pulled out of the model's text and checked with zod; anything else is a
 * `ProviderError`.
 */
export class LlmCollaborator implements Collaborator {
  constructor(
    private readonly adapter: ProviderAdapter,
    private readonly options: LlmCollaboratorOptions,
  ) {}

  async proposeTest(input: ProposeTestInput, signal?: AbortSignal): Promise<string | null> {
    const text = await this.ask(buildProposeTestMessages(input), signal);
    if (!text) return null;
    const { testCode } = this.parse(text, proposeTestSchema, 'test proposal');
    return testCode.trim() ? testCode : null;
  }

  async refineDiagnosis(
    input: SemanticAnalysisInput,
    signal?: AbortSignal,
  ): Promise<SemanticVerdict | null> {
    const text = await this.ask(buildDiagnosisMessages(input), signal);
    if (!text) return null;
    return this.parse(text, verdictSchema, 'diagnosis');
  }

  async draftPatch(
    input: DraftPatchInput,
    kind: PatchKind,
    signal?: AbortSignal,
  ): Promise<PatchDraft | null> {
    const text = await this.ask(buildDraftPatchMessages(input, kind), signal);
    if (!text) return null;

    const json = this.extract(text, 'patch');
    if (noPatchSchema.safeParse(json).success) return null;

    switch (kind) {
      case 'TargetedReplace': {
        const { oldText, newText, confidence, rationale } = this.validate(
          json,
          draftSchemas.TargetedReplace,
          'patch',
        );
        return this.draft({ kind, oldText, newText }, confidence, rationale);
      }
      case 'UnifiedDiff': {
        const { diff, confidence, rationale } = this.validate(json, draftSchemas.UnifiedDiff, 'patch');
        return this.draft({ kind, diff }, confidence, rationale);
      }
      case 'FullRewrite': {
        const { content, confidence, rationale } = this.validate(json, draftSchemas.FullRewrite, 'patch');
        return this.draft({ kind, content }, confidence, rationale);
      }
    }
  }

  private draft(payload: PatchPayload, confidence?: number, rationale?: string): PatchDraft {
    return { payload, confidence, rationale };
  }

  private async ask(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const ctx: AdapterContext = {
      runId: this.options.runId,
      logger: this.options.logger,
      abortSignal: signal,
      timeoutMs: this.options.timeoutMs,
    };
    try {
      const response = await this.adapter.generate(
        {
          messages,
          temperature: this.options.temperature ?? 0.1,
          jsonMode: this.adapter.capabilities().supportsJsonMode,
        },
        ctx,
      );
      return (response.text ?? '').trim();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new ProviderError(
        `Provider ${this.adapter.id()} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private extract(text: string, what: string): unknown {
    try {
      return extractJsonObject(text, what);
    } catch (error) {
      throw new ProviderError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  private validate<T extends z.ZodTypeAny>(json: unknown, schema: T, what: string): z.infer<T> {
    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ProviderError(`Invalid ${what} response:\n${issues}`, { cause: result.error });
    }
    return result.data;
  }

  private parse<T extends z.ZodTypeAny>(text: string, schema: T, what: string): z.infer<T> {
    return this.validate(this.extract(text, what), schema, what);
  }
}
