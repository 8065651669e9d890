import { LLMProviderError } from '../provider';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON object body. A non-JSON body (an HTML error page, an empty
 * reply) becomes an LLMProviderError carrying the HTTP status.
 */
export async function readJsonBody(res: Response, label: string): Promise<Record<string, unknown>> {
  const text = await res.text().catch(() => '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new LLMProviderError(
      `${label} returned non-JSON response (HTTP ${res.status}): ${text.slice(0, 200) || '(empty body)'}`,
      res.status,
    );
  }
  if (!isRecord(parsed)) {
    throw new LLMProviderError(`${label} returned an unexpected response shape`, res.status);
  }
  return parsed;
}
