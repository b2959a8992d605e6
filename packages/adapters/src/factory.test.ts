import { createProviderAdapter } from './factory';
import { FakeAdapter } from './fake/adapter';
import { OpenAIAdapter } from './openai';

describe('createProviderAdapter', () => {
  it('creates a fake adapter', () => {
    expect(createProviderAdapter({ type: 'fake', model: 'fake' })).toBeInstanceOf(FakeAdapter);
  });

  it('creates an OpenAI adapter', () => {
    const adapter = createProviderAdapter({ type: 'openai', model: 'gpt-4o-mini', api_key: 'test-key' });
    expect(adapter).toBeInstanceOf(OpenAIAdapter);
    expect(adapter.id()).toBe('openai');
  });
});
