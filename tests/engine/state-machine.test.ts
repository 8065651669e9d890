import {
  transitionWorkflowStatus,
  transitionStepStatus,
  isTerminalWorkflowStatus,
  isTerminalStepStatus,
  checkConfirmationInvariant,
  firstIncompleteStep,
} from '../../src/engine/state-machine';
import { Step, StepStatus, Workflow, WorkflowStatus } from '../../src/domain/workflow';

function step(stepNumber: number, status: StepStatus): Step {
  return {
    stepNumber,
    stepType: 'tool_call',
    toolName: 'web_search',
    description: `Step ${stepNumber}`,
    toolParameters: {},
    requiresConfirmation: false,
    status,
    attempts: 0,
  };
}

function workflow(status: WorkflowStatus, steps: Step[], currentStep: number | null = null): Workflow {
  return {
    id: 'wf_1',
    sessionId: 'sess_1',
    userIntent: 'Find jobs',
    status,
    currentStep,
    steps,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('Workflow state machine', () => {
  test('allows the normal lifecycle', () => {
    expect(transitionWorkflowStatus(WorkflowStatus.Created, WorkflowStatus.Running))
      .toEqual({ success: true, newStatus: WorkflowStatus.Running });
    expect(transitionWorkflowStatus(WorkflowStatus.Running, WorkflowStatus.WaitingConfirmation).success).toBe(true);
    expect(transitionWorkflowStatus(WorkflowStatus.WaitingConfirmation, WorkflowStatus.Running).success).toBe(true);
    expect(transitionWorkflowStatus(WorkflowStatus.Running, WorkflowStatus.Completed).success).toBe(true);
  });

  test('rejects leaving a terminal state', () => {
    const result = transitionWorkflowStatus(WorkflowStatus.Completed, WorkflowStatus.Running);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('WORKFLOW.INVALID_TRANSITION');
      expect(result.error.message).toBe('Invalid workflow state transition: completed -> running');
    }
  });

  test('rejects skipping straight from created to completed', () => {
    expect(transitionWorkflowStatus(WorkflowStatus.Created, WorkflowStatus.Completed).success).toBe(false);
  });

  test('terminal statuses', () => {
    expect(isTerminalWorkflowStatus(WorkflowStatus.Completed)).toBe(true);
    expect(isTerminalWorkflowStatus(WorkflowStatus.Failed)).toBe(true);
    expect(isTerminalWorkflowStatus(WorkflowStatus.Cancelled)).toBe(true);
    expect(isTerminalWorkflowStatus(WorkflowStatus.WaitingConfirmation)).toBe(false);
  });
});

describe('Step state machine', () => {
  test('confirmation path', () => {
    expect(transitionStepStatus(StepStatus.Running, StepStatus.PendingConfirmation).success).toBe(true);
    expect(transitionStepStatus(StepStatus.PendingConfirmation, StepStatus.Completed).success).toBe(true);
    expect(transitionStepStatus(StepStatus.PendingConfirmation, StepStatus.Rejected).success).toBe(true);
  });

  test('a pending step cannot complete without running', () => {
    const result = transitionStepStatus(StepStatus.Pending, StepStatus.Completed);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('STEP.INVALID_TRANSITION');
    }
  });

  test('terminal statuses', () => {
    expect(isTerminalStepStatus(StepStatus.Completed)).toBe(true);
    expect(isTerminalStepStatus(StepStatus.Rejected)).toBe(true);
    expect(isTerminalStepStatus(StepStatus.PendingConfirmation)).toBe(false);
  });
});

describe('checkConfirmationInvariant', () => {
  test('holds for a waiting workflow paused on its next step', () => {
    const wf = workflow(
      WorkflowStatus.WaitingConfirmation,
      [step(1, StepStatus.Completed), step(2, StepStatus.PendingConfirmation), step(3, StepStatus.Pending)],
      2,
    );
    expect(checkConfirmationInvariant(wf)).toBeNull();
  });

  test('holds for a running workflow with nothing pending', () => {
    expect(checkConfirmationInvariant(workflow(WorkflowStatus.Running, [step(1, StepStatus.Pending)]))).toBeNull();
  });

  test('flags a pending confirmation outside the waiting state', () => {
    const error = checkConfirmationInvariant(
      workflow(WorkflowStatus.Running, [step(1, StepStatus.PendingConfirmation)]),
    );
    expect(error?.code).toBe('WORKFLOW.CORRUPT_STATE');
    expect(error?.message).toBe('Workflow is running but step 1 awaits confirmation');
  });

  test('flags a waiting workflow with no pending step', () => {
    const error = checkConfirmationInvariant(
      workflow(WorkflowStatus.WaitingConfirmation, [step(1, StepStatus.Pending)], 1),
    );
    expect(error?.message).toBe('Expected exactly one step awaiting confirmation, found 0');
  });

  test('flags a mismatched currentStep', () => {
    const error = checkConfirmationInvariant(
      workflow(WorkflowStatus.WaitingConfirmation, [step(1, StepStatus.PendingConfirmation)], 3),
    );
    expect(error?.message).toBe('currentStep is 3 but step 1 awaits confirmation');
  });

  test('firstIncompleteStep follows step numbers, not array order', () => {
    const wf = workflow(WorkflowStatus.Running, [step(3, StepStatus.Pending), step(1, StepStatus.Completed), step(2, StepStatus.Failed)]);
    expect(firstIncompleteStep(wf)?.stepNumber).toBe(2);
  });
});
