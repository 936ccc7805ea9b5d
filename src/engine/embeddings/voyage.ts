import { z } from 'zod';
import { EncodingFailedError } from '../../errors.js';
import { postEmbeddingRequest } from './http.js';
import { toUnitVector, type EmbeddingProvider } from './provider.js';

const VOYAGE_API_URL = 'https://api.voyageai.com/v1/embeddings';

/** Default model: cheapest, 512 dimensions */
const DEFAULT_MODEL = 'voyage-3-lite';

/** Model → dimension mapping for known Voyage models */
const MODEL_DIMENSIONS: Record<string, number> = {
  'voyage-3-lite': 512,
  'voyage-3': 1024,
  'voyage-code-3': 1024,
};

/** Maximum texts per API request (Voyage limit is 128) */
const MAX_BATCH_SIZE = 128;

const voyageResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
  model: z.string().optional(),
});

export class VoyageProvider implements EmbeddingProvider {
  readonly name = 'voyage';
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;

  constructor(options: { model?: string; apiKey: string }) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.apiKey = options.apiKey;
    // Unknown models are assumed to use the common 1024 width
    this.dimensions = MODEL_DIMENSIONS[this.model] ?? 1024;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    const allResults: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE);
      const batchResults = await this.embedBatch(batch);
      allResults.push(...batchResults);
    }

    return allResults;
  }

  private async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const body = await postEmbeddingRequest('Voyage', VOYAGE_API_URL, this.apiKey, 'VOYAGE_API_KEY', {
      input: texts,
      model: this.model,
    });

    const parsed = voyageResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EncodingFailedError('Voyage API returned unexpected response format: missing data array');
    }
    if (parsed.data.data.length !== texts.length) {
      throw new EncodingFailedError(
        `Voyage API returned ${parsed.data.data.length} embeddings for ${texts.length} texts`
      );
    }

    return parsed.data.data.map((item, index) => {
      if (item.embedding.length !== this.dimensions) {
        throw new EncodingFailedError(
          `Dimension mismatch for text ${index}: expected ${this.dimensions}, got ${item.embedding.length}`
        );
      }
      return toUnitVector(item.embedding);
    });
  }
}
