/**
 * Structured response parsing — pulls a JSON object out of free-form LLM text.
 *
 * Providers are not guaranteed to emit strict JSON: answers arrive wrapped in
 * prose or markdown fences, with comments, trailing commas or raw newlines
 * inside strings. parseStructuredResponse() runs an explicit, ordered list of
 * extraction strategies and fails deterministically with StructuredParseError
 * when none of them yields an object.
 *
 * Order:
 *   1. fenced code block (```json ... ``` or ``` ... ```)
 *   2. first balanced {...} that parses (and carries `requiredKey`, if given)
 *   3. StructuredParseError
 */

import { createTypedError, TypedError } from '../domain/errors';
import { ExpectedOutputFormat, OutputFieldType } from '../domain/workflow';

export interface ParseOptions {
  /** Top-level key the extracted object must contain (e.g. "steps"). */
  requiredKey?: string;
}

export interface ExtractionStrategy {
  name: string;
  extract(text: string, options: ParseOptions): Record<string, unknown> | null;
}

/** Error thrown when no strategy can extract a JSON object. */
export class StructuredParseError extends Error {
  public readonly typedError: TypedError;
  public readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super(message);
    this.name = 'StructuredParseError';
    this.rawResponse = rawResponse;
    this.typedError = createTypedError({
      code: 'PROVIDER.UNSTRUCTURED_RESPONSE',
      message,
      retryable: true,
      details: { rawResponsePreview: rawResponse.slice(0, 500) },
      suggestedFixes: [
        { type: 'RETRY_WITH_SIMPLER_PROMPT', params: {} },
      ],
    });
  }
}

// ─── Strategies ─────────────────────────────────────────────────────────────

const fencedBlock: ExtractionStrategy = {
  name: 'fenced-block',
  extract(text, options) {
    for (const match of text.matchAll(/```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g)) {
      const body = match[1].trim();
      const direct = parseObject(body);
      if (direct && acceptable(direct, options)) return direct;
      const nested = findBalancedObject(body, options);
      if (nested) return nested;
    }
    return null;
  },
};

const balancedObject: ExtractionStrategy = {
  name: 'balanced-object',
  extract(text, options) {
    return findBalancedObject(text, options);
  },
};

/** Extraction strategies in priority order. */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [fencedBlock, balancedObject];

/**
 * Extract a JSON object from an LLM response.
 *
 * @throws StructuredParseError when no strategy yields an acceptable object
 */
export function parseStructuredResponse(
  text: string,
  options: ParseOptions = {},
): Record<string, unknown> {
  for (const strategy of EXTRACTION_STRATEGIES) {
    const result = strategy.extract(text, options);
    if (result) return result;
  }

  const wanted = options.requiredKey ? ` containing "${options.requiredKey}"` : '';
  throw new StructuredParseError(`No JSON object${wanted} found in response`, text);
}

function acceptable(obj: Record<string, unknown>, options: ParseOptions): boolean {
  return !options.requiredKey || Object.prototype.hasOwnProperty.call(obj, options.requiredKey);
}

/**
 * Scan for balanced {...} spans left to right, string- and escape-aware.
 * Spans that do not parse or lack the required key are skipped, and the
 * scan continues inside them so nested objects are still considered.
 */
function findBalancedObject(text: string, options: ParseOptions): Record<string, unknown> | null {
  let from = text.indexOf('{');
  while (from !== -1) {
    const end = matchingBrace(text, from);
    if (end !== -1) {
      const candidate = parseObject(text.slice(from, end + 1));
      if (candidate && acceptable(candidate, options)) return candidate;
    }
    from = text.indexOf('{', from + 1);
  }
  return null;
}

function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function parseObject(text: string): Record<string, unknown> | null {
  const parsed = tryParse(text) ?? tryParse(repairJSON(text));
  if (parsed && typeof parsed.value === 'object' && parsed.value !== null && !Array.isArray(parsed.value)) {
    return Object.fromEntries(Object.entries(parsed.value));
  }
  return null;
}

function tryParse(text: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

// ─── JSON Repair ────────────────────────────────────────────────────────────

/**
 * Repair common LLM JSON mistakes, outside of string literals:
 * `//` and `/* *\/` comments and trailing commas before } or ].
 * Inside strings, raw control characters are escaped.
 */
export function repairJSON(raw: string): string {
  const out: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escaped) {
        escaped = false;
        out.push(ch);
      } else if (ch === '\\') {
        escaped = true;
        out.push(ch);
      } else if (ch === '"') {
        inString = false;
        out.push(ch);
      } else if (ch.charCodeAt(0) < 0x20) {
        out.push(escapeControlChar(ch));
      } else {
        out.push(ch);
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out.push(ch);
      continue;
    }

    const skipTo = commentEnd(raw, i);
    if (skipTo !== i) {
      i = skipTo - 1;
      continue;
    }

    if (ch === ',') {
      const next = raw[nextSignificant(raw, i + 1)];
      if (next === '}' || next === ']') continue;
    }

    out.push(ch);
  }

  return out.join('');
}

/** If a comment starts at i, the index just past it; otherwise i. */
function commentEnd(raw: string, i: number): number {
  if (raw[i] !== '/') return i;
  if (raw[i + 1] === '/') {
    const newline = raw.indexOf('\n', i);
    return newline === -1 ? raw.length : newline;
  }
  if (raw[i + 1] === '*') {
    const close = raw.indexOf('*/', i + 2);
    return close === -1 ? raw.length : close + 2;
  }
  return i;
}

function nextSignificant(raw: string, from: number): number {
  let i = from;
  while (i < raw.length) {
    if (/\s/.test(raw[i])) {
      i++;
      continue;
    }
    const skipTo = commentEnd(raw, i);
    if (skipTo === i) return i;
    i = skipTo;
  }
  return i;
}

function escapeControlChar(ch: string): string {
  switch (ch) {
    case '\n': return '\\n';
    case '\r': return '\\r';
    case '\t': return '\\t';
    case '\b': return '\\b';
    case '\f': return '\\f';
    default: return '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0');
  }
}

// ─── Labeled key/value fallback ─────────────────────────────────────────────

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function cleanLabeledValue(value: string): string {
  return value
    .trim()
    .replace(/^\*\*\s*/, '')
    .replace(/\s*\*\*$/, '')
    .replace(/,$/, '')
    .replace(/^["']|["']$/g, '')
    .trim();
}

/**
 * Scrape `field: value` style lines for each wanted field.
 *
 * Recognizes `"field": "value"`, `**Field Name:** value`,
 * `- Field Name: value` and `Field Name: value`, case-insensitively, with
 * underscores in the field name matching spaces. Fields not found are
 * omitted rather than set to an empty string.
 */
export function extractLabeledFields(text: string, fields: string[]): Record<string, string> {
  const found: Record<string, string> = {};

  for (const field of fields) {
    const label = field.replace(/_/g, ' ');
    const name = `(?:${escapeRegExp(field)}|${escapeRegExp(label)})`;
    const patterns = [
      new RegExp(`"${name}"\\s*:\\s*"([^"]*)"`, 'i'),
      new RegExp(`"${name}"\\s*:\\s*([^,}\\n]+)`, 'i'),
      new RegExp(`\\*\\*${name}\\s*:?\\s*\\*\\*\\s*:?[ \\t]*(.+)`, 'i'),
      new RegExp(`^[ \\t]*[-*•][ \\t]*${name}[ \\t]*:[ \\t]*(.+)$`, 'im'),
      new RegExp(`^[ \\t]*${name}[ \\t]*:[ \\t]*(.+)$`, 'im'),
    ];

    for (const pattern of patterns) {
      const match = text.match(pattern);
      if (!match) continue;
      const value = cleanLabeledValue(match[1]);
      if (value) {
        found[field] = value;
        break;
      }
    }
  }

  return found;
}

// ─── Output format conformance ──────────────────────────────────────────────

/** Result of coercing extracted data to an expected output format. */
export interface ConformResult {
  data: Record<string, unknown>;
  missing: string[];
}

/**
 * Keep extracted data, lightly coerced to the declared field types, and
 * report which declared fields are absent. Undeclared keys are kept.
 */
export function conformToFormat(
  data: Record<string, unknown>,
  format: ExpectedOutputFormat,
): ConformResult {
  const out: Record<string, unknown> = { ...data };
  const missing: string[] = [];

  for (const [field, type] of Object.entries(format.fields)) {
    const value = out[field];
    if (value === undefined || value === null || value === '') {
      missing.push(field);
      continue;
    }
    out[field] = coerce(value, type);
  }

  return { data: out, missing };
}

function coerce(value: unknown, type: OutputFieldType): unknown {
  switch (type) {
    case 'number':
      if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
        return Number(value);
      }
      return value;
    case 'boolean':
      if (typeof value === 'string') {
        const lower = value.trim().toLowerCase();
        if (lower === 'true') return true;
        if (lower === 'false') return false;
      }
      return value;
    case 'string':
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      return value;
    case 'array':
    case 'object':
      return value;
  }
}
