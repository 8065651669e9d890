/**
 * Breaker-guarded ports.
 *
 * Wrap a CompletionProvider or ToolRegistry so every outbound call passes
 * through the circuit breaker under `provider:<name>` / `tool:<name>`.
 * Callers keep depending on the plain ports.
 */

import { CompletionProvider } from '../llm/provider';
import { ToolRegistry } from '../tools/registry';
import { CircuitBreaker } from './circuit-breaker';

export function providerServiceName(provider: CompletionProvider): string {
  return `provider:${provider.name}`;
}

export function toolServiceName(toolName: string): string {
  return `tool:${toolName}`;
}

export function guardProvider(provider: CompletionProvider, breaker: CircuitBreaker): CompletionProvider {
  return {
    name: provider.name,
    complete: (request, options) =>
      breaker.execute(providerServiceName(provider), () => provider.complete(request, options)),
  };
}

export function guardToolRegistry(registry: ToolRegistry, breaker: CircuitBreaker): ToolRegistry {
  return {
    list: () => registry.list(),
    has: (name) => registry.has(name),
    invoke: (name, params) => breaker.execute(toolServiceName(name), () => registry.invoke(name, params)),
  };
}
