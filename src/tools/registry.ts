/**
 * Tool Registry — the port through which tool_call steps reach external
 * capabilities (search, document store, mail delivery, ...).
 *
 * Handlers are registered per tool name, in the same way step handlers are
 * registered per type. A handler signals a failure by throwing; a ToolError
 * states whether the failure is retryable, anything else is classified by
 * its message.
 */

import { createTypedError, TypedError } from '../domain/errors';

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameterSpec {
  type: ToolParameterType;
  required?: boolean;
  description?: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ToolParameterSpec>;
}

export type ToolHandler = (params: Record<string, unknown>) => Promise<Record<string, unknown>>;

export interface ToolRegistry {
  list(): ToolDefinition[];
  has(name: string): boolean;
  invoke(name: string, params: Record<string, unknown>): Promise<Record<string, unknown>>;
}

/** Tool-specific failure that propagates as a step failure. */
export class ToolError extends Error {
  public readonly typedError: TypedError;
  public readonly toolName: string;

  constructor(
    toolName: string,
    message: string,
    options: { retryable?: boolean; code?: string; details?: Record<string, unknown> } = {},
  ) {
    super(message);
    this.name = 'ToolError';
    this.toolName = toolName;
    this.typedError = createTypedError({
      code: options.code ?? 'TOOL.FAILED',
      message,
      retryable: options.retryable ?? false,
      details: { toolName, ...options.details },
    });
  }
}

/** In-memory ToolRegistry. */
export class InMemoryToolRegistry implements ToolRegistry {
  private tools = new Map<string, { definition: ToolDefinition; handler: ToolHandler }>();

  register(definition: ToolDefinition, handler: ToolHandler): void {
    this.tools.set(definition.name, { definition, handler });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  async invoke(name: string, params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolError(name, `Unknown tool: ${name}`, { code: 'TOOL.NOT_FOUND' });
    }

    const missing = Object.entries(tool.definition.parameters)
      .filter(([key, spec]) => spec.required && (params[key] === undefined || params[key] === null || params[key] === ''))
      .map(([key]) => key);
    if (missing.length > 0) {
      throw new ToolError(name, `Missing required parameters for ${name}: ${missing.join(', ')}`, {
        code: 'TOOL.INVALID_PARAMETERS',
        details: { missing },
      });
    }

    return tool.handler(params);
  }
}
