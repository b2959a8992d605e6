import type { ProviderConfig } from '@testmend/shared';
import type { ProviderAdapter } from './adapter';
import { FakeAdapter } from './fake/adapter';
import { OpenAIAdapter } from './openai';

export function createProviderAdapter(config: ProviderConfig): ProviderAdapter {
  switch (config.type) {
    case 'openai':
      return new OpenAIAdapter(config);
    case 'fake':
      return FakeAdapter.fromConfig(config);
  }
}
