import { z } from 'zod';
import { EncodingFailedError } from '../../errors.js';
import { postEmbeddingRequest } from './http.js';
import { toUnitVector, type EmbeddingProvider } from './provider.js';

const OPENAI_API_URL = 'https://api.openai.com/v1/embeddings';

const DEFAULT_MODEL = 'text-embedding-3-small';

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/** OpenAI accepts up to 2048 inputs per request */
const MAX_BATCH_SIZE = 2048;

const openAIResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number().int(),
    embedding: z.array(z.number()),
  })),
});

export class OpenAIProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;

  constructor(options: { model?: string; apiKey: string }) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.apiKey = options.apiKey;
    this.dimensions = MODEL_DIMENSIONS[this.model] ?? 1536;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    const allResults: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      allResults.push(...await this.embedBatch(texts.slice(i, i + MAX_BATCH_SIZE)));
    }
    return allResults;
  }

  private async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const body = await postEmbeddingRequest('OpenAI', OPENAI_API_URL, this.apiKey, 'OPENAI_API_KEY', {
      input: texts,
      model: this.model,
    });

    const parsed = openAIResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EncodingFailedError('OpenAI API returned unexpected response format: missing data array');
    }

    // Entries carry their input index; the API does not promise order.
    const results: Float32Array[] = new Array(texts.length);
    for (const item of parsed.data.data) {
      if (item.index < 0 || item.index >= texts.length) {
        throw new EncodingFailedError(`OpenAI API returned out-of-range index ${item.index}`);
      }
      if (item.embedding.length !== this.dimensions) {
        throw new EncodingFailedError(
          `Dimension mismatch for text ${item.index}: expected ${this.dimensions}, got ${item.embedding.length}`
        );
      }
      results[item.index] = toUnitVector(item.embedding);
    }

    for (let i = 0; i < texts.length; i++) {
      if (!results[i]) {
        throw new EncodingFailedError(`OpenAI API returned no embedding for text ${i}`);
      }
    }
    return results;
  }
}
