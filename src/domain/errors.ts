/**
 * Typed error model for machine-actionable error handling.
 *
 * Every error the engine raises carries a TypedError so that API consumers
 * and the status channel can branch on a stable code instead of parsing
 * message text.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'PLANNER'
  | 'WORKFLOW'
  | 'STEP'
  | 'TOOL'
  | 'PROVIDER'
  | 'CIRCUIT'
  | 'VALIDATION'
  | 'CONFIG'
  | 'RATE_LIMIT'
  | 'SYSTEM';

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.UNRESOLVED_REFERENCE"). */
  code: string;
  message: string;
  workflowId?: string;
  stepNumber?: number;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  workflowId?: string;
  stepNumber?: number;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    workflowId: params.workflowId,
    stepNumber: params.stepNumber,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Anything thrown by this library that carries a TypedError. */
export interface TypedErrorCarrier {
  typedError: TypedError;
}

export function hasTypedError(err: unknown): err is TypedErrorCarrier {
  if (typeof err !== 'object' || err === null || !('typedError' in err)) return false;
  const candidate = err.typedError;
  return typeof candidate === 'object' && candidate !== null && 'code' in candidate;
}

/** Normalize any thrown value into a message string. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: `${resourceType.toUpperCase()}.NOT_FOUND`,
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function workflowInvalidStateError(workflowId: string, status: string, expected: string[]): TypedError {
  return createTypedError({
    code: 'WORKFLOW.INVALID_STATE',
    message: `Workflow "${workflowId}" is ${status}; expected ${expected.join(' or ')}`,
    workflowId,
    retryable: false,
    details: { status, expected },
  });
}

export function workflowAlreadyRunningError(workflowId: string): TypedError {
  return createTypedError({
    code: 'WORKFLOW.ALREADY_RUNNING',
    message: `Workflow "${workflowId}" is already being executed`,
    workflowId,
    retryable: true,
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: 1000 }, description: 'Wait for the current run to return' },
    ],
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of the given secrets in a message with their masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of arbitrary key characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
