import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { VoyageProvider } from '../../../src/engine/embeddings/voyage.js';
import { EncodingFailedError } from '../../../src/errors.js';

function mockResponse(body: object, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function voyageResponse(embeddings: number[][]): object {
  return {
    data: embeddings.map(e => ({ embedding: e })),
    model: 'voyage-3-lite',
    usage: { total_tokens: 10 },
  };
}

/** A 512-wide vector with `value` at `index` and zeros elsewhere */
function basis(index: number, value = 2): number[] {
  const v = new Array<number>(512).fill(0);
  v[index] = value;
  return v;
}

describe('VoyageProvider', () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('has correct name, model, and dimensions', () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    expect(provider.name).toBe('voyage');
    expect(provider.model).toBe('voyage-3-lite');
    expect(provider.dimensions).toBe(512);
  });

  it('maps known models to their width and unknown ones to 1024', () => {
    expect(new VoyageProvider({ model: 'voyage-code-3', apiKey: 'test-key' }).dimensions).toBe(1024);
    expect(new VoyageProvider({ model: 'voyage-next', apiKey: 'test-key' }).dimensions).toBe(1024);
  });

  it('sends correct request format', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key-123' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse(voyageResponse([basis(0)])));

    await provider.embed(['hello world']);

    expect(globalThis.fetch).toHaveBeenCalledWith(
      'https://api.voyageai.com/v1/embeddings',
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': 'Bearer test-key-123',
        },
        body: JSON.stringify({
          input: ['hello world'],
          model: 'voyage-3-lite',
        }),
      })
    );
  });

  it('returns unit-length Float32Arrays in input order', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse(voyageResponse([basis(0, 3), basis(7, 0.5)])));

    const results = await provider.embed(['first', 'second']);
    expect(results).toHaveLength(2);
    expect(results[0]).toBeInstanceOf(Float32Array);
    expect(results[0][0]).toBe(1);
    expect(results[1][7]).toBe(1);
    expect(results[1][0]).toBe(0);
  });

  it('splits large inputs into batches of 128', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    const fetchMock = vi.fn().mockImplementation(async (_url: string, init: { body: string }) => {
      const { input } = JSON.parse(init.body) as { input: string[] };
      return mockResponse(voyageResponse(input.map(() => basis(1))));
    });
    globalThis.fetch = fetchMock;

    const results = await provider.embed(Array.from({ length: 130 }, (_, i) => `text ${i}`));
    expect(results).toHaveLength(130);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('returns empty array for empty input without calling the API', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    const fetchMock = vi.fn();
    globalThis.fetch = fetchMock;

    expect(await provider.embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('throws on 401 authentication error', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse({ detail: 'Invalid API key' }, 401));

    await expect(provider.embed(['test']))
      .rejects.toThrow('Voyage API authentication failed (401): check VOYAGE_API_KEY');
  });

  it('throws on 429 rate limit error', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse({ detail: 'Rate limit exceeded' }, 429));

    await expect(provider.embed(['test'])).rejects.toThrow('Voyage API rate limited (429): Rate limit exceeded');
  });

  it('throws on generic API error with the status', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse({ detail: 'Internal server error' }, 500));

    const err = await provider.embed(['test']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EncodingFailedError);
    expect(err).toMatchObject({ message: 'Voyage API error (500): Internal server error', status: 500 });
  });

  it('throws on network failure', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(provider.embed(['test'])).rejects.toThrow('Voyage API network error: ECONNREFUSED');
  });

  it('throws on dimension mismatch', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse(voyageResponse([new Array(256).fill(0.1)])));

    await expect(provider.embed(['test'])).rejects.toThrow('Dimension mismatch for text 0: expected 512, got 256');
  });

  it('throws when the reply count differs from the input count', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse(voyageResponse([basis(0)])));

    await expect(provider.embed(['a', 'b'])).rejects.toThrow('Voyage API returned 1 embeddings for 2 texts');
  });

  it('throws on unexpected response format', async () => {
    const provider = new VoyageProvider({ apiKey: 'test-key' });
    globalThis.fetch = vi.fn().mockResolvedValue(mockResponse({ unexpected: true }));

    await expect(provider.embed(['test'])).rejects.toThrow('unexpected response format');
  });
});
