import { z } from 'zod';
import { EncodingFailedError } from '../../errors.js';

const apiErrorSchema = z.object({
  detail: z.string().optional(),
  message: z.string().optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

/**
 * POST a JSON body with bearer auth and parse the JSON reply. Network
 * failures and non-2xx replies become EncodingFailedError.
 */
export async function postEmbeddingRequest(
  label: string,
  url: string,
  apiKey: string,
  envVar: string,
  body: unknown,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${apiKey}`,
      },
      body: JSON.stringify(body),
    });
  } catch (err) {
    throw new EncodingFailedError(`${label} API network error: ${errorMessage(err)}`);
  }

  if (!response.ok) {
    const errorBody = await response.text();
    let detail = errorBody;
    try {
      const parsed = apiErrorSchema.safeParse(JSON.parse(errorBody));
      if (parsed.success) {
        detail = parsed.data.detail ?? parsed.data.message ?? parsed.data.error?.message ?? errorBody;
      }
    } catch {
      // Not JSON; report the raw body
    }

    if (response.status === 429) {
      throw new EncodingFailedError(`${label} API rate limited (429): ${detail}`, 429);
    }
    if (response.status === 401) {
      throw new EncodingFailedError(`${label} API authentication failed (401): check ${envVar}`, 401);
    }
    throw new EncodingFailedError(`${label} API error (${response.status}): ${detail}`, response.status);
  }

  try {
    return await response.json();
  } catch (err) {
    throw new EncodingFailedError(`${label} API returned invalid JSON: ${errorMessage(err)}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
