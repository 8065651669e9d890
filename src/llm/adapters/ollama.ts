/**
 * Ollama adapter for a local Ollama server (`POST /api/chat`).
 *
 * Default base URL: http://localhost:11434
 *
 * Usage:
 *   registerOllamaAdapter();
 *   const provider = createAdapterProvider({ provider: 'ollama', model: 'llama3' });
 */

import {
  LLMCallOptions,
  LLMRawResponse,
  LLMProviderError,
  registerLLMAdapter,
} from '../provider';
import { readJsonBody, isRecord } from './http';

/** Default base URL for a local Ollama instance. */
export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434';

/** Ollama /api/chat request body. */
interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  stream: false;
  options?: {
    temperature?: number;
    num_predict?: number;
  };
  format?: 'json';
}

/**
 * Create an Ollama adapter function.
 */
export function createOllamaAdapter() {
  return async function ollamaAdapter(options: LLMCallOptions): Promise<LLMRawResponse> {
    const baseUrl = (options.baseUrl || OLLAMA_DEFAULT_BASE_URL).replace(/\/+$/, '');
    const url = `${baseUrl}/api/chat`;

    const messages: Array<{ role: string; content: string }> = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of options.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    const body: OllamaChatRequest = {
      model: options.model,
      messages,
      stream: false,
      options: {
        temperature: options.temperature,
        num_predict: options.maxTokens,
      },
    };
    if (options.responseFormat?.type === 'json_object') {
      body.format = 'json';
    }

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(120_000),
      });
    } catch (err) {
      throw new LLMProviderError(
        `Ollama connection failed (${baseUrl}): ${err instanceof Error ? err.message : 'unknown error'}`,
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new LLMProviderError(
        `Ollama returned HTTP ${res.status}: ${text.slice(0, 200)}`,
        res.status,
      );
    }

    const data = await readJsonBody(res, 'Ollama');
    const message: Record<string, unknown> = isRecord(data.message) ? data.message : {};
    const promptTokens = typeof data.prompt_eval_count === 'number' ? data.prompt_eval_count : undefined;
    const completionTokens = typeof data.eval_count === 'number' ? data.eval_count : undefined;

    return {
      content: typeof message.content === 'string' ? message.content : '',
      finishReason: data.done === true ? 'stop' : 'length',
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: (promptTokens ?? 0) + (completionTokens ?? 0),
      },
    };
  };
}

/** Register the Ollama adapter with the LLM adapter registry. */
export function registerOllamaAdapter(): void {
  registerLLMAdapter('ollama', createOllamaAdapter());
}
