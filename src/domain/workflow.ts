/**
 * Workflow domain types.
 *
 * A Workflow is one end-to-end execution of a decomposed user intent. It is
 * created by the planner with every step pending and mutated only by the
 * executor, one step at a time, in step-number order.
 */

/** Workflow lifecycle status. */
export enum WorkflowStatus {
  Created = 'created',
  Running = 'running',
  WaitingConfirmation = 'waiting_confirmation',
  Completed = 'completed',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

/** Step lifecycle status. */
export enum StepStatus {
  Pending = 'pending',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  Cancelled = 'cancelled',
  PendingConfirmation = 'pending_confirmation',
  Rejected = 'rejected',
}

/** Closed set of step kinds; each has exactly one handler in the executor. */
export type StepType = 'tool_call' | 'analysis' | 'decision' | 'notification';

export const STEP_TYPES: readonly StepType[] = ['tool_call', 'analysis', 'decision', 'notification'];

export function isStepType(value: unknown): value is StepType {
  return typeof value === 'string' && STEP_TYPES.some((t) => t === value);
}

/** Field types an output format can declare. */
export type OutputFieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export const OUTPUT_FIELD_TYPES: readonly OutputFieldType[] = ['string', 'number', 'boolean', 'array', 'object'];

/** Shape an analysis/decision step is asked to return. */
export interface ExpectedOutputFormat {
  fields: Record<string, OutputFieldType>;
}

/** A typed reference to an attachment, as produced by attachment normalization. */
export interface AttachmentRef {
  type: 'document_id' | 'reference';
  value: string;
}

export interface Step {
  /** 1-based, contiguous; defines execution order. */
  stepNumber: number;
  stepType: StepType;
  description: string;
  /** Present iff stepType is tool_call. */
  toolName?: string;
  /** May hold {{step_N.result...}} placeholders until execution. */
  toolParameters: Record<string, unknown>;
  requiresConfirmation: boolean;
  expectedOutputFormat?: ExpectedOutputFormat;
  status: StepStatus;
  result?: unknown;
  errorMessage?: string;
  /** Number of dispatch attempts made for this step. */
  attempts: number;
  startedAt?: string;
  completedAt?: string;
}

export interface Workflow {
  id: string;
  /** Opaque correlation key, stable across pause/resume. */
  sessionId: string;
  userIntent: string;
  status: WorkflowStatus;
  /** Step number awaiting confirmation, or null. */
  currentStep: number | null;
  steps: Step[];
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  errorMessage?: string;
}

/** Valid workflow status transitions. */
export const VALID_WORKFLOW_TRANSITIONS: Record<WorkflowStatus, WorkflowStatus[]> = {
  [WorkflowStatus.Created]: [WorkflowStatus.Running, WorkflowStatus.Cancelled],
  [WorkflowStatus.Running]: [
    WorkflowStatus.WaitingConfirmation,
    WorkflowStatus.Completed,
    WorkflowStatus.Failed,
    WorkflowStatus.Cancelled,
  ],
  [WorkflowStatus.WaitingConfirmation]: [
    WorkflowStatus.Running,
    WorkflowStatus.Failed,
    WorkflowStatus.Cancelled,
  ],
  [WorkflowStatus.Completed]: [],
  [WorkflowStatus.Failed]: [],
  [WorkflowStatus.Cancelled]: [],
};

/** Valid step status transitions. */
export const VALID_STEP_TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  [StepStatus.Pending]: [StepStatus.Running, StepStatus.Cancelled],
  [StepStatus.Running]: [
    StepStatus.Completed,
    StepStatus.Failed,
    StepStatus.PendingConfirmation,
    StepStatus.Cancelled,
  ],
  [StepStatus.PendingConfirmation]: [
    StepStatus.Completed,
    StepStatus.Rejected,
    StepStatus.Failed,
    StepStatus.Cancelled,
  ],
  [StepStatus.Completed]: [],
  [StepStatus.Failed]: [],
  [StepStatus.Cancelled]: [],
  [StepStatus.Rejected]: [],
};

/** Context key under which a completed step's result is addressable. */
export function contextKey(stepNumber: number): string {
  return `step_${stepNumber}`;
}

/** Status view returned to callers polling a session. */
export interface WorkflowStatusView {
  workflowId: string;
  sessionId: string;
  userIntent: string;
  status: WorkflowStatus;
  currentStep: number | null;
  steps: Array<Pick<Step, 'stepNumber' | 'stepType' | 'description' | 'toolName' | 'status' | 'requiresConfirmation' | 'result' | 'errorMessage' | 'completedAt'>>;
  createdAt: string;
  completedAt?: string;
}
