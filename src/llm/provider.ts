/**
 * Completion Provider port and LLM adapter registry.
 *
 * A CompletionProvider turns a prompt (or a message list) into text. The
 * planner, the analysis/decision handlers and agent-executed tools all talk
 * to this port; concrete HTTP adapters are registered per provider id and
 * bound to model settings by createAdapterProvider().
 */

import { createTypedError, maskSecretsInMessage, TypedError } from '../domain/errors';

// ─── Types ──────────────────────────────────────────────────────────────────

/** Supported LLM provider identifiers. */
export type LLMProvider = 'ollama' | 'openai' | 'custom';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['ollama', 'openai', 'custom'];

export function isLLMProvider(value: unknown): value is LLMProvider {
  return typeof value === 'string' && LLM_PROVIDERS.some((p) => p === value);
}

/** A single chat message. */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Response from a raw LLM call. */
export interface LLMRawResponse {
  content: string;
  finishReason?: string;
  usage?: { promptTokens?: number; completionTokens?: number; totalTokens?: number };
}

/** Options for the underlying LLM call (used by adapters). */
export interface LLMCallOptions {
  provider: LLMProvider;
  model: string;
  messages: ChatMessage[];
  systemPrompt?: string;
  apiKey: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  responseFormat?: { type: 'json_object' | 'text' };
}

/**
 * Adapter function type for calling an LLM provider.
 * Implementations handle the HTTP call to the specific provider API.
 */
export type LLMAdapter = (options: LLMCallOptions) => Promise<LLMRawResponse>;

/** Per-call options accepted by a CompletionProvider. */
export interface CompletionOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask providers that support it for a JSON object. */
  json?: boolean;
  /** Session to report provider switches to. */
  sessionId?: string;
}

/** The port every consumer of text completion depends on. */
export interface CompletionProvider {
  readonly name: string;
  complete(request: string | ChatMessage[], options?: CompletionOptions): Promise<string>;
}

// ─── Error Types ────────────────────────────────────────────────────────────

/** Error thrown when the LLM provider returns a non-2xx response or cannot be reached. */
export class LLMProviderError extends Error {
  public readonly typedError: TypedError;
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'LLMProviderError';
    this.statusCode = statusCode;
    // No status code means the server was never reached; that is a transport fault.
    const retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
    this.typedError = createTypedError({
      code: 'PROVIDER.HTTP',
      message,
      retryable,
      details: { statusCode },
      suggestedFixes: retryable
        ? [{ type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } }]
        : [{ type: 'CHECK_PROVIDER_CONFIG', params: { statusCode }, description: 'Verify the model name and API key' }],
    });
  }
}

/** The provider answered but returned no text. */
export class EmptyCompletionError extends Error {
  public readonly typedError: TypedError;

  constructor(provider: string) {
    super(`Response does not contain any content (provider: ${provider})`);
    this.name = 'EmptyCompletionError';
    this.typedError = createTypedError({
      code: 'PROVIDER.EMPTY_CONTENT',
      message: this.message,
      retryable: true,
      details: { provider },
    });
  }
}

// ─── Adapter Registry ───────────────────────────────────────────────────────

const adapters = new Map<LLMProvider, LLMAdapter>();

/** Register an LLM provider adapter. */
export function registerLLMAdapter(provider: LLMProvider, adapter: LLMAdapter): void {
  adapters.set(provider, adapter);
}

/** Get the registered adapter for a provider, or throw. */
export function getLLMAdapter(provider: LLMProvider): LLMAdapter {
  const adapter = adapters.get(provider);
  if (!adapter) {
    throw new LLMProviderError(
      `No adapter registered for LLM provider: ${provider}. ` +
      `Register one with registerLLMAdapter().`,
      400,
    );
  }
  return adapter;
}

// ─── Adapter-backed provider ────────────────────────────────────────────────

/** Model settings bound into a CompletionProvider. */
export interface ProviderSettings {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  /** Display name; defaults to "<provider>:<model>". */
  name?: string;
}

/** Bind a registered adapter to model settings. */
export function createAdapterProvider(settings: ProviderSettings): CompletionProvider {
  const name = settings.name ?? `${settings.provider}:${settings.model}`;
  const apiKey = settings.apiKey ?? '';

  return {
    name,
    async complete(request, options = {}) {
      const adapter = getLLMAdapter(settings.provider);
      const messages: ChatMessage[] = typeof request === 'string'
        ? [{ role: 'user', content: request }]
        : request;

      let response: LLMRawResponse;
      try {
        response = await adapter({
          provider: settings.provider,
          model: settings.model,
          messages,
          systemPrompt: options.systemPrompt,
          apiKey,
          baseUrl: settings.baseUrl,
          maxTokens: options.maxTokens ?? settings.maxTokens,
          temperature: options.temperature ?? settings.temperature,
          responseFormat: options.json ? { type: 'json_object' } : undefined,
        });
      } catch (err) {
        if (err instanceof LLMProviderError && apiKey) {
          throw new LLMProviderError(maskSecretsInMessage(err.message, [apiKey]), err.statusCode);
        }
        throw err;
      }

      if (!response.content || response.content.trim() === '') {
        throw new EmptyCompletionError(name);
      }
      return response.content;
    },
  };
}
