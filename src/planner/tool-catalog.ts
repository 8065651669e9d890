/**
 * Tool catalog — the tools the planner may put into a plan.
 *
 * The built-in list lives in tool-catalog.json; tools registered at runtime
 * in the Tool Registry are merged in by name.
 */

import catalogJson from './tool-catalog.json';
import { ToolDefinition, ToolParameterSpec, ToolParameterType } from '../tools/registry';

const PARAMETER_TYPES: readonly ToolParameterType[] = ['string', 'number', 'boolean', 'array', 'object'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseParameter(raw: unknown): ToolParameterSpec {
  if (!isRecord(raw)) return { type: 'string' };
  const type = PARAMETER_TYPES.find((t) => t === raw.type) ?? 'string';
  return {
    type,
    required: raw.required === true ? true : undefined,
    description: typeof raw.description === 'string' ? raw.description : undefined,
  };
}

/** Validate an unknown value as a list of tool definitions, dropping malformed entries. */
export function parseToolCatalog(raw: unknown): ToolDefinition[] {
  if (!Array.isArray(raw)) return [];
  const tools: ToolDefinition[] = [];
  for (const entry of raw) {
    if (!isRecord(entry) || typeof entry.name !== 'string' || !entry.name) continue;
    const parameters: Record<string, ToolParameterSpec> = {};
    if (isRecord(entry.parameters)) {
      for (const [key, spec] of Object.entries(entry.parameters)) {
        parameters[key] = parseParameter(spec);
      }
    }
    tools.push({
      name: entry.name,
      description: typeof entry.description === 'string' ? entry.description : '',
      parameters,
    });
  }
  return tools;
}

export const BUILT_IN_TOOLS: readonly ToolDefinition[] = parseToolCatalog(catalogJson);

/** Built-in catalog plus any extra definitions, extras winning on name clashes. */
export function mergeToolCatalog(extra: ToolDefinition[]): ToolDefinition[] {
  const byName = new Map<string, ToolDefinition>();
  for (const tool of BUILT_IN_TOOLS) byName.set(tool.name, tool);
  for (const tool of extra) byName.set(tool.name, tool);
  return [...byName.values()];
}

/** Render tools as prompt lines: `- name(param, param?): description`. */
export function renderToolCatalog(tools: ToolDefinition[]): string {
  return tools
    .map((tool) => {
      const params = Object.entries(tool.parameters)
        .map(([key, spec]) => `${key}${spec.required ? '' : '?'}: ${spec.type}`)
        .join(', ');
      const description = tool.description ? ` - ${tool.description}` : '';
      return `- ${tool.name}(${params})${description}`;
    })
    .join('\n');
}
