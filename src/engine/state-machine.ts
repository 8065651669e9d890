/**
 * Workflow and Step state machines.
 *
 * Enforces valid state transitions for workflows and steps,
 * producing typed errors on invalid transitions.
 */

import {
  Step,
  StepStatus,
  Workflow,
  WorkflowStatus,
  VALID_STEP_TRANSITIONS,
  VALID_WORKFLOW_TRANSITIONS,
} from '../domain/workflow';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a workflow state transition. */
export function transitionWorkflowStatus(
  current: WorkflowStatus,
  target: WorkflowStatus,
): TransitionResult<WorkflowStatus> {
  const validTargets = VALID_WORKFLOW_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'WORKFLOW.INVALID_TRANSITION',
        message: `Invalid workflow state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a step state transition. */
export function transitionStepStatus(
  current: StepStatus,
  target: StepStatus,
): TransitionResult<StepStatus> {
  const validTargets = VALID_STEP_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'STEP.INVALID_TRANSITION',
        message: `Invalid step state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a workflow status is terminal. */
export function isTerminalWorkflowStatus(status: WorkflowStatus): boolean {
  return (
    status === WorkflowStatus.Completed ||
    status === WorkflowStatus.Failed ||
    status === WorkflowStatus.Cancelled
  );
}

/** Check if a step status is terminal. */
export function isTerminalStepStatus(status: StepStatus): boolean {
  return VALID_STEP_TRANSITIONS[status].length === 0;
}

/**
 * Check the confirmation invariant: a workflow is waiting_confirmation
 * iff exactly one step is pending_confirmation and it is the
 * lowest-numbered step that is not completed.
 */
export function checkConfirmationInvariant(workflow: Workflow): TypedError | null {
  const pending = workflow.steps.filter((s) => s.status === StepStatus.PendingConfirmation);
  const waiting = workflow.status === WorkflowStatus.WaitingConfirmation;

  if (!waiting) {
    if (pending.length === 0) return null;
    return invariantError(workflow, `Workflow is ${workflow.status} but step ${pending[0].stepNumber} awaits confirmation`);
  }

  if (pending.length !== 1) {
    return invariantError(workflow, `Expected exactly one step awaiting confirmation, found ${pending.length}`);
  }

  const firstOpen = firstIncompleteStep(workflow);
  if (!firstOpen || firstOpen.stepNumber !== pending[0].stepNumber) {
    return invariantError(workflow, `Step ${pending[0].stepNumber} awaits confirmation but is not the next incomplete step`);
  }

  if (workflow.currentStep !== pending[0].stepNumber) {
    return invariantError(workflow, `currentStep is ${workflow.currentStep} but step ${pending[0].stepNumber} awaits confirmation`);
  }

  return null;
}

/** Lowest-numbered step that has not completed, if any. */
export function firstIncompleteStep(workflow: Workflow): Step | undefined {
  return [...workflow.steps]
    .sort((a, b) => a.stepNumber - b.stepNumber)
    .find((s) => s.status !== StepStatus.Completed);
}

function invariantError(workflow: Workflow, message: string): TypedError {
  return createTypedError({
    code: 'WORKFLOW.CORRUPT_STATE',
    message,
    workflowId: workflow.id,
    retryable: false,
    details: { status: workflow.status, currentStep: workflow.currentStep },
  });
}
