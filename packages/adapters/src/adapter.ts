import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@testmend/shared';
import type { AdapterContext } from './types';

/**
 * Unified interface over LLM providers. The collaborator that drafts tests,
 * diagnoses and patches talks to a provider only through this.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsJsonMode: true, latencyClass: 'fast' }; }
 *   async generate(req, ctx) { return { text: '{}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  id(): string;
  capabilities(): ProviderCapabilities;
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
