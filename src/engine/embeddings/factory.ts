import { ConfigError } from '../../errors.js';
import type { EmbeddingProvider } from './provider.js';
import { OpenAIProvider } from './openai.js';
import { VoyageProvider } from './voyage.js';

/**
 * Create an embedding provider by name.
 *
 * @param name - Provider name ('voyage' or 'openai')
 * @param options - Optional overrides for model and API key
 * @throws ConfigError if the provider name is unknown or the API key is missing
 */
export function createProvider(
  name: string,
  options?: { model?: string; apiKey?: string }
): EmbeddingProvider {
  switch (name) {
    case 'voyage':
      if (!options?.apiKey) {
        throw new ConfigError('Voyage provider requires an API key');
      }
      return new VoyageProvider({ model: options.model, apiKey: options.apiKey });

    case 'openai':
      if (!options?.apiKey) {
        throw new ConfigError('OpenAI provider requires an API key');
      }
      return new OpenAIProvider({ model: options.model, apiKey: options.apiKey });

    default:
      throw new ConfigError(
        `Unknown embedding provider: '${name}'. Supported providers: voyage, openai`
      );
  }
}
