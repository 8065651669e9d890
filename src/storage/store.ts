/**
 * Persistence port.
 *
 * The store is the single source of truth for workflow and step state: the
 * executor reloads from it before every decision and writes every
 * transition back through it. Implementations must apply each method
 * atomically; `completeStep` in particular records a result and the
 * completed status together or not at all.
 */

import { Step, Workflow, WorkflowStatus } from '../domain/workflow';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface WorkflowListFilter extends ListOptions {
  status?: WorkflowStatus;
  sessionId?: string;
}

/** Fields of a workflow the executor may change. Steps change through updateStep/completeStep. */
export type WorkflowPatch = Partial<Pick<Workflow, 'status' | 'currentStep' | 'startedAt' | 'completedAt' | 'errorMessage'>>;

/** Fields of a step the executor may change. */
export type StepPatch = Partial<Pick<Step, 'status' | 'result' | 'errorMessage' | 'attempts' | 'startedAt' | 'completedAt'>>;

export interface WorkflowStore {
  /** Persist a new workflow with all of its steps in one write. */
  create(workflow: Workflow): Promise<Workflow>;
  getById(id: string): Promise<Workflow | null>;
  /** Most recently created workflow for a session. */
  getLatestBySession(sessionId: string): Promise<Workflow | null>;
  list(filter?: WorkflowListFilter): Promise<Workflow[]>;
  /** Throws StoreError when the workflow is terminal or the status change is not a valid transition. */
  updateWorkflow(id: string, patch: WorkflowPatch): Promise<Workflow | null>;
  /** Throws StoreError when the step is terminal or the status change is not a valid transition. */
  updateStep(id: string, stepNumber: number, patch: StepPatch): Promise<Workflow | null>;
  /** Atomically store `result` and mark the step completed. */
  completeStep(id: string, stepNumber: number, result: unknown): Promise<Workflow | null>;
  delete(id: string): Promise<boolean>;
}

export interface Store {
  workflows: WorkflowStore;
}
