/**
 * Built-in LLM adapters.
 *
 * Quick start:
 *   import { registerBuiltInAdapters } from 'intentflow/llm/adapters';
 *   registerBuiltInAdapters();
 */

import { registerOllamaAdapter } from './ollama';
import { registerOpenAIAdapter } from './openai';

export { createOllamaAdapter, registerOllamaAdapter, OLLAMA_DEFAULT_BASE_URL } from './ollama';
export { createOpenAIAdapter, registerOpenAIAdapter, OPENAI_DEFAULT_BASE_URL } from './openai';

/** Register every built-in adapter at once. */
export function registerBuiltInAdapters(): void {
  registerOllamaAdapter();
  registerOpenAIAdapter();
}
