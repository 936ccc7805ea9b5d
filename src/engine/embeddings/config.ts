/**
 * Embedding configuration: provider, model and API key resolved from
 * explicit options or environment variables.
 */

import { ConfigError } from '../../errors.js';

export interface EmbeddingConfig {
  provider: string;  // 'voyage' | 'openai'
  model: string;     // provider-specific model name
  apiKey: string;    // from env var
}

/** Maps provider name → { envVar, defaultModel } */
const PROVIDER_DEFAULTS: Record<string, { envVar: string; defaultModel: string }> = {
  voyage: {
    envVar: 'VOYAGE_API_KEY',
    defaultModel: 'voyage-3-lite',
  },
  openai: {
    envVar: 'OPENAI_API_KEY',
    defaultModel: 'text-embedding-3-small',
  },
};

const DEFAULT_PROVIDER = 'voyage';

/**
 * Load embedding configuration from explicit options and environment.
 *
 * Provider falls back to VECNOTE_EMBED_PROVIDER, then 'voyage'; model to
 * VECNOTE_EMBED_MODEL, then the provider's default.
 *
 * @throws ConfigError if the provider is unknown or its API key is not set
 */
export function loadEmbeddingConfig(
  providerName?: string,
  modelName?: string,
  env: NodeJS.ProcessEnv = process.env,
): EmbeddingConfig {
  const provider = providerName ?? env.VECNOTE_EMBED_PROVIDER ?? DEFAULT_PROVIDER;

  const defaults = PROVIDER_DEFAULTS[provider];
  if (!defaults) {
    throw new ConfigError(
      `Unknown embedding provider: '${provider}'. Supported: ${Object.keys(PROVIDER_DEFAULTS).join(', ')}`
    );
  }

  const model = modelName ?? env.VECNOTE_EMBED_MODEL ?? defaults.defaultModel;
  const apiKey = env[defaults.envVar];

  if (!apiKey) {
    throw new ConfigError(
      `Missing API key for ${provider}: set ${defaults.envVar} environment variable`
    );
  }

  return { provider, model, apiKey };
}
