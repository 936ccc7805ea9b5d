export { toUnitVector, type EmbeddingProvider } from './provider.js';
export { VoyageProvider } from './voyage.js';
export { OpenAIProvider } from './openai.js';
export { createProvider } from './factory.js';
export { loadEmbeddingConfig, type EmbeddingConfig } from './config.js';
