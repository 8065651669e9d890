/**
 * Plan validation and normalization.
 *
 * Turns the provider's raw plan object into PlannedSteps, or reports every
 * violation it finds. Validation never throws: callers decide what a
 * failed result means.
 */

import { TypedError, createTypedError } from '../domain/errors';
import {
  ExpectedOutputFormat,
  OUTPUT_FIELD_TYPES,
  OutputFieldType,
  StepType,
  isStepType,
  STEP_TYPES,
} from '../domain/workflow';
import { normalizeAttachments } from '../domain/attachments';
import { extractStepReferences } from '../engine/context-resolver';
import { PlannedStep } from './interface';

export interface PlanValidationOptions {
  /** Tools whose steps always require confirmation. */
  confirmationTools: readonly string[];
}

export interface PlanValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
  steps: PlannedStep[];
}

/** Single generic field used when nothing else tells us what a step returns. */
export const DEFAULT_OUTPUT_FORMAT: ExpectedOutputFormat = { fields: { result: 'string' } };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(raw: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) return raw[key];
  }
  return undefined;
}

function pickString(raw: Record<string, unknown>, keys: string[]): string | undefined {
  const value = pick(raw, keys);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function pickBoolean(raw: Record<string, unknown>, keys: string[]): boolean {
  const value = pick(raw, keys);
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
  return false;
}

function violation(code: string, message: string, stepNumber?: number, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code, message, stepNumber, retryable: false, details });
}

/** Human-readable default for steps the provider left undescribed. */
export function defaultDescription(type: StepType, tool?: string): string {
  switch (type) {
    case 'tool_call':
      return `Run ${tool ?? 'tool'}`;
    case 'analysis':
      return 'Analyze the previous results';
    case 'decision':
      return 'Decide how to proceed';
    case 'notification':
      return 'Notify the user';
  }
}

function toFieldType(value: unknown): OutputFieldType {
  const raw = isRecord(value) ? value.type : value;
  const lower = typeof raw === 'string' ? raw.toLowerCase() : '';
  return OUTPUT_FIELD_TYPES.find((t) => t === lower) ?? 'string';
}

/**
 * Normalize whatever the provider gave as an output format to
 * `{ fields: { name: type } }`. Accepts `{type:'object', fields}`,
 * `{fields}`, JSON-schema style `{properties}`, a bare field map, a list
 * of field names, or any of those JSON-encoded in a string.
 */
export function normalizeOutputFormat(raw: unknown): ExpectedOutputFormat | undefined {
  if (raw === undefined || raw === null) return undefined;

  if (typeof raw === 'string') {
    const text = raw.trim();
    if (!text.startsWith('{') && !text.startsWith('[')) return undefined;
    try {
      return normalizeOutputFormat(JSON.parse(text));
    } catch {
      return undefined;
    }
  }

  let source: Record<string, unknown> = {};
  if (Array.isArray(raw)) {
    for (const name of raw) {
      if (typeof name === 'string' && name.trim()) source[name.trim()] = 'string';
    }
  } else if (isRecord(raw)) {
    if (isRecord(raw.fields)) source = raw.fields;
    else if (isRecord(raw.properties)) source = raw.properties;
    else {
      source = { ...raw };
      if (source.type === 'object') delete source.type;
    }
  }

  const fields: Record<string, OutputFieldType> = {};
  for (const [name, type] of Object.entries(source)) {
    fields[name] = toFieldType(type);
  }
  return Object.keys(fields).length > 0 ? { fields } : undefined;
}

/**
 * Fields later steps read from step `stepNumber`, taken from
 * `{{step_N.result.<field>}}` references in their parameters and descriptions.
 */
export function inferReferencedFields(stepNumber: number, laterSteps: PlannedStep[]): string[] {
  const fields = new Set<string>();
  for (const later of laterSteps) {
    for (const ref of extractStepReferences([later.toolParameters, later.description])) {
      if (ref.stepNumber === stepNumber && ref.fieldPath.length > 0 && !/^\d+$/.test(ref.fieldPath[0])) {
        fields.add(ref.fieldPath[0]);
      }
    }
  }
  return [...fields];
}

/** Validate and normalize a raw plan object. */
export function validatePlan(raw: Record<string, unknown>, options: PlanValidationOptions): PlanValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (raw.error !== undefined && raw.error !== null && raw.error !== false) {
    const message = typeof raw.message === 'string' ? raw.message
      : typeof raw.error === 'string' ? raw.error
      : 'The provider declined to produce a plan';
    errors.push(violation('PLANNER.PROVIDER_DECLINED', message));
    return { valid: false, errors, warnings, steps: [] };
  }

  if (!Array.isArray(raw.steps) || raw.steps.length === 0) {
    errors.push(violation('PLANNER.NO_STEPS', 'Plan contains no steps'));
    return { valid: false, errors, warnings, steps: [] };
  }

  const steps: PlannedStep[] = [];
  raw.steps.forEach((rawStep: unknown, index: number) => {
    const stepNumber = index + 1;
    if (!isRecord(rawStep)) {
      errors.push(violation('VALIDATION.INVALID_STEP', `Step ${stepNumber} is not an object`, stepNumber));
      return;
    }

    const type = pick(rawStep, ['type', 'stepType', 'step_type']);
    if (!isStepType(type)) {
      errors.push(violation(
        'VALIDATION.INVALID_STEP_TYPE',
        `Step ${stepNumber} has invalid type "${String(type)}"; expected one of ${STEP_TYPES.join(', ')}`,
        stepNumber,
        { type },
      ));
      return;
    }

    const toolName = pickString(rawStep, ['tool', 'toolName', 'tool_name']);
    if (type === 'tool_call' && !toolName) {
      errors.push(violation('VALIDATION.MISSING_TOOL', `Step ${stepNumber} is a tool_call without a tool`, stepNumber));
      return;
    }

    const rawParams = pick(rawStep, ['parameters', 'params', 'toolParameters', 'tool_parameters']);
    const toolParameters: Record<string, unknown> = isRecord(rawParams) ? { ...rawParams } : {};
    if (toolParameters.attachments !== undefined) {
      toolParameters.attachments = normalizeAttachments(toolParameters.attachments);
    }

    let requiresConfirmation = pickBoolean(rawStep, ['requires_confirmation', 'requiresConfirmation']);
    if (type === 'tool_call' && toolName && options.confirmationTools.includes(toolName) && !requiresConfirmation) {
      requiresConfirmation = true;
      warnings.push(`Step ${stepNumber}: ${toolName} always requires confirmation`);
    }

    steps.push({
      stepNumber,
      stepType: type,
      description: pickString(rawStep, ['description']) ?? defaultDescription(type, toolName),
      toolName: type === 'tool_call' ? toolName : undefined,
      toolParameters,
      requiresConfirmation,
      expectedOutputFormat: normalizeOutputFormat(
        pick(rawStep, ['output_format', 'expected_output_format', 'expectedOutputFormat']),
      ),
    });
  });

  if (errors.length > 0) {
    return { valid: false, errors, warnings, steps: [] };
  }

  validateReferences(steps, errors);
  synthesizeOutputFormats(steps, warnings);

  return { valid: errors.length === 0, errors, warnings, steps: errors.length === 0 ? steps : [] };
}

/** A step may only reference steps that run before it. */
function validateReferences(steps: PlannedStep[], errors: TypedError[]): void {
  for (const step of steps) {
    for (const ref of extractStepReferences([step.toolParameters, step.description])) {
      if (ref.stepNumber >= step.stepNumber) {
        errors.push(violation(
          'VALIDATION.FORWARD_REFERENCE',
          `Step ${step.stepNumber} references ${ref.raw}, which does not run before it`,
          step.stepNumber,
          { reference: ref.raw },
        ));
      }
    }
  }
}

/**
 * Give every analysis/decision step an addressable output format: the
 * declared one extended with fields later steps read, else the inferred
 * fields, else the single generic `result` field.
 */
function synthesizeOutputFormats(steps: PlannedStep[], warnings: string[]): void {
  for (const step of steps) {
    if (step.stepType !== 'analysis' && step.stepType !== 'decision') continue;

    const referenced = inferReferencedFields(step.stepNumber, steps.filter((s) => s.stepNumber > step.stepNumber));
    const fields: Record<string, OutputFieldType> = { ...step.expectedOutputFormat?.fields };
    for (const field of referenced) {
      if (!(field in fields)) fields[field] = 'string';
    }

    if (Object.keys(fields).length === 0) {
      step.expectedOutputFormat = { fields: { ...DEFAULT_OUTPUT_FORMAT.fields } };
      warnings.push(`Step ${step.stepNumber}: no output format, using a single "result" field`);
    } else {
      step.expectedOutputFormat = { fields };
    }
  }
}
