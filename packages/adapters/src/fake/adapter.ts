import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@testmend/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { executeProviderRequest } from '../common';

export type FakeResponder = (request: ModelRequest) => string;
export type FakeResponse = string | FakeResponder;

/**
 * Replays scripted responses in order. Once the script runs out every
 * request gets an empty response, which collaborators treat as "no answer".
 */
export class FakeAdapter implements ProviderAdapter {
  /** Every request received, in order */
  readonly requests: ModelRequest[] = [];
  private readonly script: FakeResponse[];

  constructor(responses: readonly FakeResponse[] = []) {
    this.script = [...responses];
  }

  static fromConfig(config: ProviderConfig): FakeAdapter {
    return new FakeAdapter(config.responses ?? []);
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: true, latencyClass: 'fast' };
  }

  get remaining(): number {
    return this.script.length;
  }

  async generate(request: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.id(), 'fake', async (signal) => {
      if (signal.aborted) {
        throw new Error('aborted');
      }
      this.requests.push(request);
      const next = this.script.shift();
      if (next === undefined) {
        return { text: '' };
      }
      return { text: typeof next === 'string' ? next : next(request) };
    });
  }
}
