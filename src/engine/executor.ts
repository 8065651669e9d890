/**
 * Workflow Executor — runs a planned workflow step by step.
 *
 * The store is the only source of truth. Every loop iteration reloads the
 * workflow, so a run can be resumed by any executor instance and a
 * cancellation written by someone else is noticed before the next
 * dispatch. The only in-process state is the guard against two concurrent
 * run/confirm calls on the same workflow.
 *
 *   created ──run──▶ running ──▶ completed
 *                      │  ▲ ╲──▶ failed
 *          confirm(yes)│  │  ╲─▶ cancelled (cancel / confirm(no))
 *                      ▼  │
 *               waiting_confirmation
 */

import {
  Step,
  StepStatus,
  Workflow,
  WorkflowStatus,
  WorkflowStatusView,
} from '../domain/workflow';
import {
  TypedError,
  errorMessage,
  hasTypedError,
  notFoundError,
  workflowAlreadyRunningError,
  workflowInvalidStateError,
} from '../domain/errors';
import { WorkflowStore } from '../storage/store';
import { StatusReporter } from '../status/status-reporter';
import { ToolRegistry } from '../tools/registry';
import { CompletionProvider } from '../llm/provider';
import {
  assertFullyResolved,
  buildExecutionContext,
  resolve,
  resolveParameters,
  stringifyValue,
} from './context-resolver';
import {
  checkConfirmationInvariant,
  firstIncompleteStep,
  isTerminalWorkflowStatus,
  transitionStepStatus,
  transitionWorkflowStatus,
} from './state-machine';
import { DEFAULT_RETRY_POLICY, RetryPolicy, sleep as defaultSleep } from './retry';
import { runWithRetry, StepRunOutcome } from './step-runner';
import {
  STEP_HANDLERS,
  StepHandlerDeps,
  isPreparedCommunication,
  sendPreparedCommunication,
} from './step-handlers';
import { createLogger } from '../logger';

const log = createLogger({ component: 'executor' });

/** Executor configuration. */
export interface ExecutorConfig {
  retry: RetryPolicy;
  /** Pause before each step dispatch. */
  interStepDelayMs: number;
  /** Outbound-communication tools: prepared on dispatch, sent on approval. */
  confirmationTools: string[];
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  retry: DEFAULT_RETRY_POLICY,
  interStepDelayMs: 500,
  confirmationTools: ['send_email'],
  sleep: defaultSleep,
  random: Math.random,
};

export interface ExecutorDeps {
  tools: ToolRegistry;
  provider: CompletionProvider;
}

export class ExecutorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}

type StepOutcome = 'continue' | 'paused' | 'failed' | 'cancelled';

/** The workflow executor. */
export class WorkflowExecutor {
  private config: ExecutorConfig;
  private handlerDeps: StepHandlerDeps;
  /** Guard against concurrent run/confirm calls on the same workflow. */
  private runningWorkflows = new Set<string>();

  constructor(
    private store: WorkflowStore,
    private reporter: StatusReporter,
    deps: ExecutorDeps,
    config?: Partial<ExecutorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.handlerDeps = {
      tools: deps.tools,
      provider: deps.provider,
      confirmationTools: this.config.confirmationTools,
      notify: (sessionId, message) => this.report(sessionId, message),
    };
  }

  /**
   * Run a workflow until it completes, fails, is cancelled or pauses for
   * confirmation. Calling it on a terminal or paused workflow is a no-op.
   */
  async run(workflowId: string): Promise<Workflow> {
    return this.exclusive(workflowId, async () => {
      const workflow = await this.load(workflowId);
      this.assertConsistent(workflow);

      if (isTerminalWorkflowStatus(workflow.status) || workflow.status === WorkflowStatus.WaitingConfirmation) {
        log.forWorkflow(workflow).debug('Run skipped', { status: workflow.status });
        return workflow;
      }

      if (workflow.status === WorkflowStatus.Created) {
        await this.setWorkflowStatus(workflow, WorkflowStatus.Running, { startedAt: new Date().toISOString() });
        log.forWorkflow(workflow).info('Workflow started', { steps: workflow.steps.length });
      }

      return this.drive(workflowId);
    });
  }

  /** Approve or reject the step a paused workflow is waiting on. */
  async confirm(workflowId: string, approved: boolean): Promise<Workflow> {
    return this.exclusive(workflowId, async () => {
      const workflow = await this.load(workflowId);
      if (workflow.status !== WorkflowStatus.WaitingConfirmation) {
        throw new ExecutorError(
          workflowInvalidStateError(workflowId, workflow.status, [WorkflowStatus.WaitingConfirmation]),
        );
      }
      this.assertConsistent(workflow);

      const step = workflow.steps.find((s) => s.status === StepStatus.PendingConfirmation);
      if (!step) {
        throw new ExecutorError(workflowInvalidStateError(workflowId, workflow.status, [WorkflowStatus.WaitingConfirmation]));
      }

      if (!approved) {
        await this.setStepStatus(workflow, step, StepStatus.Rejected, { completedAt: new Date().toISOString() });
        await this.setWorkflowStatus(workflow, WorkflowStatus.Cancelled, {
          currentStep: null,
          completedAt: new Date().toISOString(),
        });
        log.forWorkflow(workflow, step.stepNumber).info('Step rejected');
        await this.report(workflow.sessionId, `Step ${step.stepNumber} rejected, workflow cancelled`);
        return this.load(workflowId);
      }

      await this.report(workflow.sessionId, `Step ${step.stepNumber} approved`);

      let result = step.result;
      if (isPreparedCommunication(step.result)) {
        const prepared = step.result;
        const outcome = await this.withRetry(workflow, step, () =>
          sendPreparedCommunication(prepared, this.handlerDeps, workflow.sessionId),
        );
        if (!outcome.ok) {
          if (outcome.cancelled) return this.load(workflowId);
          await this.failStep(workflow, step, outcome.error);
          return this.load(workflowId);
        }
        result = outcome.value;
        if ((await this.load(workflowId)).status === WorkflowStatus.Cancelled) {
          log.forWorkflow(workflow, step.stepNumber).info('Discarding send result of a cancelled workflow');
          return this.load(workflowId);
        }
      }

      const stored = await this.unlessCancelled(workflowId, step.stepNumber, () =>
        this.store.completeStep(workflowId, step.stepNumber, result),
      );
      if (!stored) {
        log.forWorkflow(workflow, step.stepNumber).info('Discarding send result of a cancelled workflow');
        return this.load(workflowId);
      }
      await this.report(workflow.sessionId, `Step ${step.stepNumber} completed`);
      const resumed = await this.unlessCancelled(workflowId, null, () =>
        this.setWorkflowStatus(workflow, WorkflowStatus.Running, { currentStep: null }),
      );
      if (!resumed) return this.load(workflowId);

      return this.drive(workflowId);
    });
  }

  /**
   * Cancel a workflow that has not finished. Not guarded by the run lock:
   * this is how a caller stops a run in flight.
   */
  async cancel(workflowId: string): Promise<Workflow> {
    const workflow = await this.load(workflowId);
    if (isTerminalWorkflowStatus(workflow.status)) {
      throw new ExecutorError(workflowInvalidStateError(workflowId, workflow.status, [
        WorkflowStatus.Created,
        WorkflowStatus.Running,
        WorkflowStatus.WaitingConfirmation,
      ]));
    }

    const now = new Date().toISOString();
    for (const step of workflow.steps) {
      if (step.status === StepStatus.Pending || step.status === StepStatus.Running || step.status === StepStatus.PendingConfirmation) {
        try {
          await this.store.updateStep(workflowId, step.stepNumber, { status: StepStatus.Cancelled, completedAt: now });
        } catch (err) {
          // The step finished between our read and this write; its outcome stands.
          if (!hasTypedError(err) || err.typedError.code !== 'STEP.IMMUTABLE') throw err;
          log.forWorkflow(workflow, step.stepNumber).debug('Step already finished, not cancelled');
        }
      }
    }
    await this.setWorkflowStatus(workflow, WorkflowStatus.Cancelled, { currentStep: null, completedAt: now });

    log.forWorkflow(workflow).info('Workflow cancelled');
    await this.report(workflow.sessionId, 'Workflow cancelled');
    return this.load(workflowId);
  }

  /** Status view of the session's most recent workflow, or null. */
  async getStatus(sessionId: string): Promise<WorkflowStatusView | null> {
    const workflow = await this.store.getLatestBySession(sessionId);
    return workflow ? toStatusView(workflow) : null;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async exclusive<T>(workflowId: string, fn: () => Promise<T>): Promise<T> {
    if (this.runningWorkflows.has(workflowId)) {
      throw new ExecutorError(workflowAlreadyRunningError(workflowId));
    }
    this.runningWorkflows.add(workflowId);
    try {
      return await fn();
    } finally {
      this.runningWorkflows.delete(workflowId);
    }
  }

  private async load(workflowId: string): Promise<Workflow> {
    const workflow = await this.store.getById(workflowId);
    if (!workflow) {
      throw new ExecutorError(notFoundError('Workflow', workflowId));
    }
    return workflow;
  }

  private assertConsistent(workflow: Workflow): void {
    const violation = checkConfirmationInvariant(workflow);
    if (violation) {
      log.error('Workflow state is inconsistent', { workflowId: workflow.id, error: violation.message });
      throw new ExecutorError(violation);
    }
  }

  /** Dispatch steps in order until the workflow leaves `running`. */
  private async drive(workflowId: string): Promise<Workflow> {
    for (;;) {
      let workflow = await this.load(workflowId);
      if (workflow.status !== WorkflowStatus.Running) return workflow;

      const next = firstIncompleteStep(workflow);
      if (!next) {
        const current = workflow;
        const completed = await this.unlessCancelled(workflowId, null, () =>
          this.setWorkflowStatus(current, WorkflowStatus.Completed, {
            currentStep: null,
            completedAt: new Date().toISOString(),
          }),
        );
        if (!completed) return this.load(workflowId);
        log.forWorkflow(workflow).info('Workflow completed');
        await this.report(workflow.sessionId, 'Workflow completed');
        return this.load(workflowId);
      }

      await this.config.sleep(this.config.interStepDelayMs);

      // Someone may have cancelled while we waited.
      workflow = await this.load(workflowId);
      if (workflow.status !== WorkflowStatus.Running) return workflow;
      const step = workflow.steps.find((s) => s.stepNumber === next.stepNumber);
      if (!step) return workflow;

      const outcome = await this.executeStep(workflow, step);
      if (outcome !== 'continue') return this.load(workflowId);
    }
  }

  private async executeStep(workflow: Workflow, step: Step): Promise<StepOutcome> {
    const slog = log.forWorkflow(workflow, step.stepNumber);

    // A step left `running` by a crashed process is simply dispatched again.
    if (step.status !== StepStatus.Running) {
      const started = await this.unlessCancelled(workflow.id, step.stepNumber, () =>
        this.setStepStatus(workflow, step, StepStatus.Running, { startedAt: new Date().toISOString(), attempts: 0 }),
      );
      if (!started) return 'cancelled';
    }

    const context = buildExecutionContext(workflow.steps, step.stepNumber);
    const parameters = resolveParameters(step.toolParameters, context);
    const description = stringifyValue(resolve(step.description, context));

    await this.report(workflow.sessionId, `Executing step ${step.stepNumber}: ${description}`);
    slog.info('Executing step', { stepType: step.stepType, toolName: step.toolName });

    // Notifications only carry text; an unresolved reference there is cosmetic.
    if (step.stepType !== 'notification') {
      try {
        assertFullyResolved(parameters, step.stepNumber);
      } catch (err) {
        await this.failStep(workflow, step, err);
        return 'failed';
      }
    }

    const handler = STEP_HANDLERS[step.stepType];
    const outcome = await this.withRetry(workflow, step, () =>
      handler(
        { workflowId: workflow.id, sessionId: workflow.sessionId, step, parameters, description, context },
        this.handlerDeps,
      ),
    );

    const latest = await this.load(workflow.id);
    if (latest.status === WorkflowStatus.Cancelled) {
      slog.info('Discarding step result of a cancelled workflow');
      return 'cancelled';
    }

    if (!outcome.ok) {
      await this.failStep(latest, step, outcome.error);
      return 'failed';
    }

    if (step.requiresConfirmation) {
      const paused = await this.unlessCancelled(workflow.id, step.stepNumber, async () => {
        await this.store.updateStep(workflow.id, step.stepNumber, {
          status: StepStatus.PendingConfirmation,
          result: outcome.value,
        });
        await this.setWorkflowStatus(latest, WorkflowStatus.WaitingConfirmation, { currentStep: step.stepNumber });
      });
      if (!paused) return 'cancelled';
      slog.info('Waiting for confirmation');
      await this.report(workflow.sessionId, `Waiting for confirmation on step ${step.stepNumber}: ${description}`);
      return 'paused';
    }

    const completed = await this.unlessCancelled(workflow.id, step.stepNumber, () =>
      this.store.completeStep(workflow.id, step.stepNumber, outcome.value),
    );
    if (!completed) {
      slog.info('Discarding step result of a cancelled workflow');
      return 'cancelled';
    }
    slog.info('Step completed', { attempts: outcome.attempts });
    await this.report(workflow.sessionId, `Step ${step.stepNumber} completed`);
    return 'continue';
  }

  private withRetry(workflow: Workflow, step: Step, attemptFn: () => Promise<unknown>): Promise<StepRunOutcome> {
    const { retry } = this.config;
    return runWithRetry(
      async (attempt) => {
        await this.store.updateStep(workflow.id, step.stepNumber, { attempts: attempt });
        return attemptFn();
      },
      {
        retry,
        sleep: this.config.sleep,
        random: this.config.random,
        onRetry: async (nextAttempt, delayMs, err) => {
          log.forWorkflow(workflow, step.stepNumber).warn('Retrying step', {
            attempt: nextAttempt,
            delayMs,
            error: errorMessage(err),
          });
          await this.report(
            workflow.sessionId,
            `Retrying step ${step.stepNumber} (attempt ${nextAttempt}/${retry.maxAttempts}) in ${delayMs}ms: ${errorMessage(err)}`,
          );
        },
        isCancelled: async () => (await this.load(workflow.id)).status === WorkflowStatus.Cancelled,
      },
    );
  }

  private async failStep(workflow: Workflow, step: Step, err: unknown): Promise<void> {
    const message = errorMessage(err);
    const now = new Date().toISOString();
    const code = hasTypedError(err) ? err.typedError.code : undefined;

    const recorded = await this.unlessCancelled(workflow.id, step.stepNumber, async () => {
      await this.store.updateStep(workflow.id, step.stepNumber, {
        status: StepStatus.Failed,
        errorMessage: message,
        completedAt: now,
      });
      await this.setWorkflowStatus(workflow, WorkflowStatus.Failed, {
        currentStep: null,
        completedAt: now,
        errorMessage: `Step ${step.stepNumber} failed: ${message}`,
      });
    });
    if (!recorded) return;

    log.forWorkflow(workflow, step.stepNumber).error('Step failed', { code, error: message });
    await this.report(workflow.sessionId, `Step ${step.stepNumber} failed: ${message}`);
  }

  private async setWorkflowStatus(
    workflow: Workflow,
    target: WorkflowStatus,
    patch: { currentStep?: number | null; startedAt?: string; completedAt?: string; errorMessage?: string } = {},
  ): Promise<void> {
    const current = (await this.load(workflow.id)).status;
    const transition = transitionWorkflowStatus(current, target);
    if (!transition.success) {
      throw new ExecutorError({ ...transition.error, workflowId: workflow.id });
    }
    await this.store.updateWorkflow(workflow.id, { ...patch, status: transition.newStatus });
  }

  private async setStepStatus(
    workflow: Workflow,
    step: Step,
    target: StepStatus,
    patch: { startedAt?: string; completedAt?: string; attempts?: number } = {},
  ): Promise<void> {
    const transition = transitionStepStatus(step.status, target);
    if (!transition.success) {
      throw new ExecutorError({ ...transition.error, workflowId: workflow.id, stepNumber: step.stepNumber });
    }
    await this.store.updateStep(workflow.id, step.stepNumber, { ...patch, status: transition.newStatus });
  }

  /**
   * Apply a state write unless a concurrent cancel got there first. Returns
   * false when the write failed and the workflow or step is now cancelled;
   * any other failure propagates.
   */
  private async unlessCancelled(
    workflowId: string,
    stepNumber: number | null,
    write: () => Promise<unknown>,
  ): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (err) {
      const current = await this.load(workflowId);
      const step = current.steps.find((s) => s.stepNumber === stepNumber);
      if (current.status !== WorkflowStatus.Cancelled && step?.status !== StepStatus.Cancelled) throw err;
      log.forWorkflow(current, step?.stepNumber).info('Write superseded by cancel', { error: errorMessage(err) });
      return false;
    }
  }

  /** Status entries are best effort; a reporter outage never fails a step. */
  private async report(sessionId: string, message: string): Promise<void> {
    try {
      await this.reporter.append(sessionId, message);
    } catch (err) {
      log.warn('Status report failed', { sessionId, error: errorMessage(err) });
    }
  }
}

export function toStatusView(workflow: Workflow): WorkflowStatusView {
  return {
    workflowId: workflow.id,
    sessionId: workflow.sessionId,
    userIntent: workflow.userIntent,
    status: workflow.status,
    currentStep: workflow.currentStep,
    steps: workflow.steps.map((s) => ({
      stepNumber: s.stepNumber,
      stepType: s.stepType,
      description: s.description,
      toolName: s.toolName,
      status: s.status,
      requiresConfirmation: s.requiresConfirmation,
      result: s.result,
      errorMessage: s.errorMessage,
      completedAt: s.completedAt,
    })),
    createdAt: workflow.createdAt,
    completedAt: workflow.completedAt,
  };
}
