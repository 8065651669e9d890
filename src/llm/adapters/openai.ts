/**
 * OpenAI-compatible adapter (`POST /v1/chat/completions`).
 *
 * Works against the hosted OpenAI API and any server speaking the same
 * protocol (vLLM, LocalAI, LM Studio, llama.cpp server).
 *
 * Default base URL: https://api.openai.com
 */

import {
  LLMCallOptions,
  LLMRawResponse,
  LLMProviderError,
  registerLLMAdapter,
} from '../provider';
import { readJsonBody, isRecord } from './http';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com';

/** OpenAI-compatible chat completion request. */
interface OpenAIChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  max_tokens?: number;
  temperature?: number;
  response_format?: { type: string };
}

export function createOpenAIAdapter() {
  return async function openAIAdapter(options: LLMCallOptions): Promise<LLMRawResponse> {
    const baseUrl = (options.baseUrl || OPENAI_DEFAULT_BASE_URL).replace(/\/+$/, '');
    const url = `${baseUrl}/v1/chat/completions`;

    const messages: Array<{ role: string; content: string }> = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of options.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    const body: OpenAIChatRequest = {
      model: options.model,
      messages,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    };
    if (options.responseFormat?.type === 'json_object') {
      body.response_format = { type: 'json_object' };
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (options.apiKey) {
      headers['Authorization'] = `Bearer ${options.apiKey}`;
    }

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(120_000),
      });
    } catch (err) {
      throw new LLMProviderError(
        `OpenAI-compatible connection failed (${baseUrl}): ${err instanceof Error ? err.message : 'unknown error'}`,
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new LLMProviderError(
        `OpenAI-compatible server returned HTTP ${res.status}: ${text.slice(0, 200)}`,
        res.status,
      );
    }

    const data = await readJsonBody(res, 'OpenAI-compatible server');
    const choice: Record<string, unknown> = Array.isArray(data.choices) && isRecord(data.choices[0]) ? data.choices[0] : {};
    const message: Record<string, unknown> = isRecord(choice.message) ? choice.message : {};
    const usage = isRecord(data.usage) ? data.usage : undefined;

    return {
      content: typeof message.content === 'string' ? message.content : '',
      finishReason: typeof choice.finish_reason === 'string' ? choice.finish_reason : 'stop',
      usage: usage
        ? {
            promptTokens: typeof usage.prompt_tokens === 'number' ? usage.prompt_tokens : undefined,
            completionTokens: typeof usage.completion_tokens === 'number' ? usage.completion_tokens : undefined,
            totalTokens: typeof usage.total_tokens === 'number' ? usage.total_tokens : undefined,
          }
        : undefined,
    };
  };
}

/**
 * Register the OpenAI-compatible adapter under `openai`, and under
 * `custom` for self-hosted servers speaking the same protocol.
 */
export function registerOpenAIAdapter(): void {
  const adapter = createOpenAIAdapter();
  registerLLMAdapter('openai', adapter);
  registerLLMAdapter('custom', adapter);
}
