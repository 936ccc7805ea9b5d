import { describe, it, expect } from 'vitest';
import { createProvider } from '../../../src/engine/embeddings/factory.js';
import { VoyageProvider } from '../../../src/engine/embeddings/voyage.js';
import { OpenAIProvider } from '../../../src/engine/embeddings/openai.js';
import { ConfigError } from '../../../src/errors.js';

describe('createProvider', () => {
  it('creates a VoyageProvider for "voyage"', () => {
    const provider = createProvider('voyage', { apiKey: 'test-key' });
    expect(provider).toBeInstanceOf(VoyageProvider);
    expect(provider.name).toBe('voyage');
    expect(provider.model).toBe('voyage-3-lite');
    expect(provider.dimensions).toBe(512);
  });

  it('passes custom model to VoyageProvider', () => {
    const provider = createProvider('voyage', { model: 'voyage-3', apiKey: 'test-key' });
    expect(provider.model).toBe('voyage-3');
    expect(provider.dimensions).toBe(1024);
  });

  it('creates an OpenAIProvider for "openai"', () => {
    const provider = createProvider('openai', { apiKey: 'test-key' });
    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider.model).toBe('text-embedding-3-small');
    expect(provider.dimensions).toBe(1536);
  });

  it('throws ConfigError on unknown provider', () => {
    expect(() => createProvider('unknown', { apiKey: 'test-key' })).toThrow(ConfigError);
    expect(() => createProvider('unknown', { apiKey: 'test-key' }))
      .toThrow("Unknown embedding provider: 'unknown'. Supported providers: voyage, openai");
  });

  it('throws when the API key is missing', () => {
    expect(() => createProvider('voyage')).toThrow('Voyage provider requires an API key');
    expect(() => createProvider('openai', { apiKey: undefined })).toThrow('OpenAI provider requires an API key');
  });
});
