/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every read and
 * write goes through deepCopy so callers can never alias the stored
 * aggregate: mutating a returned workflow does not change the store.
 *
 * Status writes are checked against the transition tables, so a step or
 * workflow that reached a terminal status stays there even when a slower
 * writer still holds an older copy.
 */

import {
  Workflow,
  StepStatus,
  WorkflowStatus,
  VALID_STEP_TRANSITIONS,
  VALID_WORKFLOW_TRANSITIONS,
} from '../domain/workflow';
import { createTypedError, TypedError } from '../domain/errors';
import {
  Store,
  WorkflowStore,
  WorkflowListFilter,
  WorkflowPatch,
  StepPatch,
  ListOptions,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function isTerminalWorkflow(status: WorkflowStatus): boolean {
  return VALID_WORKFLOW_TRANSITIONS[status].length === 0;
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Raised when a write would break a persistence invariant. */
export class StoreError extends Error {
  public readonly typedError: TypedError;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StoreError';
    this.typedError = createTypedError({ code, message, retryable: false, details });
  }
}

class MemoryWorkflowStore implements WorkflowStore {
  private data = new Map<string, Workflow>();

  async create(workflow: Workflow): Promise<Workflow> {
    if (this.data.has(workflow.id)) {
      throw new StoreError('WORKFLOW.DUPLICATE', `Workflow already exists: ${workflow.id}`);
    }
    this.data.set(workflow.id, deepCopy(workflow));
    return deepCopy(workflow);
  }

  async getById(id: string): Promise<Workflow | null> {
    const workflow = this.data.get(id);
    return workflow ? deepCopy(workflow) : null;
  }

  async getLatestBySession(sessionId: string): Promise<Workflow | null> {
    let latest: Workflow | undefined;
    for (const workflow of this.data.values()) {
      if (workflow.sessionId !== sessionId) continue;
      if (!latest || workflow.createdAt >= latest.createdAt) latest = workflow;
    }
    return latest ? deepCopy(latest) : null;
  }

  async list(filter?: WorkflowListFilter): Promise<Workflow[]> {
    const items = [...this.data.values()]
      .filter((w) => !filter?.status || w.status === filter.status)
      .filter((w) => !filter?.sessionId || w.sessionId === filter.sessionId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return applyListOptions(items, filter).map(deepCopy);
  }

  async updateWorkflow(id: string, patch: WorkflowPatch): Promise<Workflow | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    if (isTerminalWorkflow(existing.status)) {
      throw new StoreError('WORKFLOW.IMMUTABLE', `Workflow ${id} is ${existing.status} and cannot change`, {
        status: existing.status,
      });
    }
    if (patch.status && patch.status !== existing.status && !VALID_WORKFLOW_TRANSITIONS[existing.status].includes(patch.status)) {
      throw new StoreError('WORKFLOW.INVALID_TRANSITION', `Workflow ${id} cannot move from ${existing.status} to ${patch.status}`, {
        from: existing.status,
        to: patch.status,
      });
    }
    const updated: Workflow = {
      ...deepCopy(existing),
      ...deepCopy(patch),
      updatedAt: new Date().toISOString(),
    };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async updateStep(id: string, stepNumber: number, patch: StepPatch): Promise<Workflow | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = deepCopy(existing);
    const step = updated.steps.find((s) => s.stepNumber === stepNumber);
    if (!step) {
      throw new StoreError('STEP.NOT_FOUND', `Step ${stepNumber} not found in workflow ${id}`);
    }
    if (VALID_STEP_TRANSITIONS[step.status].length === 0) {
      throw new StoreError('STEP.IMMUTABLE', `Step ${stepNumber} of workflow ${id} is ${step.status} and cannot change`, {
        status: step.status,
      });
    }
    if (patch.status && patch.status !== step.status && !VALID_STEP_TRANSITIONS[step.status].includes(patch.status)) {
      throw new StoreError(
        'STEP.INVALID_TRANSITION',
        `Step ${stepNumber} of workflow ${id} cannot move from ${step.status} to ${patch.status}`,
        { from: step.status, to: patch.status },
      );
    }
    Object.assign(step, deepCopy(patch));
    updated.updatedAt = new Date().toISOString();
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async completeStep(id: string, stepNumber: number, result: unknown): Promise<Workflow | null> {
    return this.updateStep(id, stepNumber, {
      status: StepStatus.Completed,
      result,
      errorMessage: undefined,
      completedAt: new Date().toISOString(),
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(): Store {
  return {
    workflows: new MemoryWorkflowStore(),
  };
}
