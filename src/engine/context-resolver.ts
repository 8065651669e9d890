/**
 * Context Resolver — substitutes {{path}} placeholders with values from the
 * accumulated execution context.
 *
 * The context maps `step_<N>` to `{ result }` for every completed step, so
 * `{{step_3.result.company_name}}` walks step_3 → result → company_name.
 * Path segments are separated by dots; list indices may be written as
 * `items[0]` or `items.0`.
 *
 * Resolution never invents a value. A placeholder whose path cannot be
 * walked is left exactly as written, and `findUnresolvedPlaceholders()`
 * lets the executor refuse to dispatch a step that still carries one.
 *
 * A placeholder may list fallbacks separated by `|`:
 * `{{step_2.result.email|step_1.result.contact|"unknown"}}`. Candidates are
 * tried left to right; a quoted candidate is a literal.
 */

import { Step, StepStatus, contextKey } from '../domain/workflow';
import { TypedError, createTypedError } from '../domain/errors';

/** Accumulated results of completed steps, keyed by `step_<N>`. */
export type ExecutionContext = Record<string, unknown>;

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;
const WHOLE_PLACEHOLDER = /^\s*\{\{([^{}]+)\}\}\s*$/;
const ANY_TEMPLATE = /\{\{[\s\S]*?\}\}/g;
const STEP_REFERENCE = /\{\{([^{}]*)\}\}/g;

type Lookup = { found: true; value: unknown } | { found: false };

/** Resolve placeholders recursively through strings, arrays and plain objects. */
export function resolve(value: unknown, context: ExecutionContext): unknown {
  if (typeof value === 'string') return resolveString(value, context);
  if (Array.isArray(value)) return value.map((item) => resolve(item, context));
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = resolve(item, context);
    }
    return out;
  }
  return value;
}

/** Resolve a parameter map, keeping its type. */
export function resolveParameters(
  params: Record<string, unknown>,
  context: ExecutionContext,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(params)) {
    out[key] = resolve(item, context);
  }
  return out;
}

function resolveString(text: string, context: ExecutionContext): unknown {
  const whole = text.match(WHOLE_PLACEHOLDER);
  if (whole) {
    const lookup = resolveExpression(whole[1], context);
    return lookup.found ? lookup.value : text;
  }

  return text.replace(PLACEHOLDER, (match: string, expression: string) => {
    const lookup = resolveExpression(expression, context);
    return lookup.found ? stringifyValue(lookup.value) : match;
  });
}

function resolveExpression(expression: string, context: ExecutionContext): Lookup {
  for (const candidate of splitCandidates(expression)) {
    const literal = candidate.match(/^"(.*)"$/) ?? candidate.match(/^'(.*)'$/);
    if (literal) return { found: true, value: literal[1] };

    const lookup = lookupPath(candidate, context);
    if (lookup.found) return lookup;
  }
  return { found: false };
}

/** Split `a|b|"c|d"` into candidates, ignoring pipes inside quotes. */
function splitCandidates(expression: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const ch of expression) {
    if (quote) {
      if (ch === quote) quote = null;
      current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === '|') {
      parts.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current.trim());
  return parts.filter((p) => p.length > 0);
}

/** Split a dotted/bracketed path into segments. */
export function parsePath(path: string): string[] {
  return path
    .trim()
    .replace(/\[\s*["']?([^\]"']+)["']?\s*\]/g, '.$1')
    .split('.')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function lookupPath(path: string, context: ExecutionContext): Lookup {
  const segments = parsePath(path);
  if (segments.length === 0) return { found: false };

  let current: unknown = context;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return { found: false };
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      const key = matchKey(current, segment);
      if (key === undefined) return { found: false };
      current = current[key];
    } else {
      return { found: false };
    }
    if (isMissing(current)) return { found: false };
  }
  return { found: true, value: current };
}

/**
 * Exact key first, then a loose match that ignores case, `_` and `-`, so
 * `company_name` finds `companyName` in a provider's JSON.
 */
function matchKey(record: Record<string, unknown>, segment: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(record, segment)) return segment;
  const wanted = looseKey(segment);
  return Object.keys(record).find((k) => looseKey(k) === wanted);
}

function looseKey(key: string): string {
  return key.toLowerCase().replace(/[_\-\s]/g, '');
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/** String form used when a value is embedded inside a larger string. */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Every `{{...}}` occurrence left anywhere inside a value. */
export function findUnresolvedPlaceholders(value: unknown): string[] {
  const found: string[] = [];
  collectTemplates(value, found);
  return found;
}

function collectTemplates(value: unknown, found: string[]): void {
  if (typeof value === 'string') {
    for (const match of value.matchAll(ANY_TEMPLATE)) {
      found.push(match[0]);
    }
  } else if (Array.isArray(value)) {
    for (const item of value) collectTemplates(item, found);
  } else if (isRecord(value)) {
    for (const item of Object.values(value)) collectTemplates(item, found);
  }
}

/** A reference from a parameter string to a field of an earlier step's result. */
export interface StepReference {
  stepNumber: number;
  /** Path below `result`, e.g. ['company_name']. Empty when the whole result is referenced. */
  fieldPath: string[];
  raw: string;
}

/** Collect all `step_N...` references in a value, including pipe candidates. */
export function extractStepReferences(value: unknown): StepReference[] {
  const refs: StepReference[] = [];
  for (const text of collectStrings(value)) {
    for (const match of text.matchAll(STEP_REFERENCE)) {
      for (const candidate of splitCandidates(match[1])) {
        const segments = parsePath(candidate);
        const head = segments[0]?.match(/^step_(\d+)$/);
        if (!head) continue;
        const rest = segments.slice(1);
        refs.push({
          stepNumber: Number(head[1]),
          fieldPath: rest[0] === 'result' ? rest.slice(1) : rest,
          raw: match[0],
        });
      }
    }
  }
  return refs;
}

function collectStrings(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.flatMap(collectStrings);
  if (isRecord(value)) return Object.values(value).flatMap(collectStrings);
  return [];
}

/**
 * Build the execution context visible to `beforeStep`: the results of
 * completed steps numbered strictly below it.
 */
export function buildExecutionContext(steps: Step[], beforeStep: number): ExecutionContext {
  const context: ExecutionContext = {};
  for (const step of steps) {
    if (step.stepNumber < beforeStep && step.status === StepStatus.Completed) {
      context[contextKey(step.stepNumber)] = { result: step.result };
    }
  }
  return context;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A step's parameters still contain template syntax after resolution. */
export class UnresolvedReferenceError extends Error {
  public readonly typedError: TypedError;
  public readonly placeholders: string[];

  constructor(placeholders: string[], stepNumber?: number) {
    const unique = [...new Set(placeholders)];
    super(`Unresolved references: ${unique.join(', ')}`);
    this.name = 'UnresolvedReferenceError';
    this.placeholders = unique;
    this.typedError = createTypedError({
      code: 'STEP.UNRESOLVED_REFERENCE',
      message: this.message,
      stepNumber,
      retryable: false,
      details: { placeholders: unique },
      suggestedFixes: [
        { type: 'FIX_PLAN_REFERENCE', params: { placeholders: unique }, description: 'Reference a field the upstream step actually produces' },
      ],
    });
  }
}

/** Throw UnresolvedReferenceError if any template syntax remains. */
export function assertFullyResolved(value: unknown, stepNumber?: number): void {
  const leftovers = findUnresolvedPlaceholders(value);
  if (leftovers.length > 0) {
    throw new UnresolvedReferenceError(leftovers, stepNumber);
  }
}
