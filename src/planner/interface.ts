/**
 * Planner Interface — the boundary between intent and execution.
 *
 * A planner turns a free-text intent into a validated, persisted Workflow
 * whose steps are all pending. It never executes anything.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { Step, Workflow } from '../domain/workflow';

export interface Planner {
  createWorkflow(intent: string, sessionId: string): Promise<Workflow>;
}

/** A validated step as it leaves the planner, before any execution state exists. */
export type PlannedStep = Pick<
  Step,
  'stepNumber' | 'stepType' | 'description' | 'toolName' | 'toolParameters' | 'requiresConfirmation' | 'expectedOutputFormat'
>;

/** The provider's response contained no usable plan JSON. */
export class PlanParseError extends Error {
  public readonly typedError: TypedError;
  public readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super(message);
    this.name = 'PlanParseError';
    this.rawResponse = rawResponse;
    this.typedError = createTypedError({
      code: 'PLANNER.PLAN_PARSE',
      message,
      retryable: true,
      details: { rawResponsePreview: rawResponse.slice(0, 500) },
      suggestedFixes: [
        { type: 'REPHRASE_INTENT', params: {}, description: 'Rephrase the request and try again' },
      ],
    });
  }
}

/** The plan parsed but failed validation; nothing was persisted. */
export class InvalidPlanError extends Error {
  public readonly typedError: TypedError;
  public readonly errors: TypedError[];

  constructor(message: string, errors: TypedError[] = []) {
    super(message);
    this.name = 'InvalidPlanError';
    this.errors = errors;
    this.typedError = createTypedError({
      code: 'PLANNER.INVALID_PLAN',
      message,
      retryable: false,
      details: { violations: errors.map((e) => ({ code: e.code, message: e.message, stepNumber: e.stepNumber })) },
    });
  }
}
