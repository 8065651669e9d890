/**
 * WorkflowEngine — the single entry point callers use.
 *
 * Composes the planner, executor, store and status reporter. Holds no
 * workflow state of its own.
 */

import { Workflow, WorkflowStatusView } from '../domain/workflow';
import { notFoundError } from '../domain/errors';
import { Planner } from '../planner/interface';
import { WorkflowListFilter, WorkflowStore } from '../storage/store';
import { StatusReporter } from '../status/status-reporter';
import { ExecutorError, WorkflowExecutor } from './executor';
import { isTerminalWorkflowStatus } from './state-machine';

export class WorkflowEngine {
  constructor(
    private readonly planner: Planner,
    private readonly executor: WorkflowExecutor,
    private readonly store: WorkflowStore,
    readonly reporter: StatusReporter,
  ) {}

  createWorkflow(intent: string, sessionId: string): Promise<Workflow> {
    return this.planner.createWorkflow(intent, sessionId);
  }

  run(workflowId: string): Promise<Workflow> {
    return this.executor.run(workflowId);
  }

  confirm(workflowId: string, approved: boolean): Promise<Workflow> {
    return this.executor.confirm(workflowId, approved);
  }

  cancel(workflowId: string): Promise<Workflow> {
    return this.executor.cancel(workflowId);
  }

  getStatus(sessionId: string): Promise<WorkflowStatusView | null> {
    return this.executor.getStatus(sessionId);
  }

  async getWorkflow(workflowId: string): Promise<Workflow> {
    const workflow = await this.store.getById(workflowId);
    if (!workflow) {
      throw new ExecutorError(notFoundError('Workflow', workflowId));
    }
    return workflow;
  }

  listWorkflows(filter?: WorkflowListFilter): Promise<Workflow[]> {
    return this.store.list(filter);
  }

  /** Delete a workflow, cancelling it first if it has not finished. */
  async deleteWorkflow(workflowId: string): Promise<void> {
    const workflow = await this.getWorkflow(workflowId);
    if (!isTerminalWorkflowStatus(workflow.status)) {
      await this.executor.cancel(workflowId);
    }
    await this.store.delete(workflowId);
  }
}
