/**
 * Workflow API routes.
 *
 * POST   /workflows              — Plan a workflow from an intent (and start it)
 * GET    /workflows              — List workflows (?status=, ?sessionId=, ?limit=, ?offset=)
 * GET    /workflows/:id          — Fetch a workflow
 * DELETE /workflows/:id          — Delete a workflow, cancelling it first
 * POST   /workflows/:id/run      — Start or resume execution in the background
 * POST   /workflows/:id/confirm  — Approve or reject the pending step
 * POST   /workflows/:id/cancel   — Cancel a workflow
 */

import { Router, Request } from 'express';
import { WorkflowStatus } from '../domain/workflow';
import { TypedError, errorMessage, validationError, workflowInvalidStateError } from '../domain/errors';
import { WorkflowEngine } from '../engine/engine';
import { ExecutorError } from '../engine/executor';
import { WorkflowListFilter } from '../storage/store';
import { logger } from '../logger';
import { asyncRoute } from './middleware';
import { rateLimit, RateLimitOptions, sessionKey } from './rate-limit';

const log = logger.child({ component: 'api' });

/** Raised for request bodies or queries the routes cannot use. */
export class RequestValidationError extends Error {
  public readonly typedError: TypedError;

  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
    this.typedError = validationError(message);
  }
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new RequestValidationError(`${key} is required and must be a non-empty string`);
  }
  return value.trim();
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value ? value : undefined;
}

function queryInteger(req: Request, key: string): number | undefined {
  const raw = queryString(req, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new RequestValidationError(`${key} must be a non-negative integer`);
  }
  return value;
}

function parseStatus(raw: string | undefined): WorkflowStatus | undefined {
  if (raw === undefined) return undefined;
  const status = Object.values(WorkflowStatus).find((s) => s === raw);
  if (!status) {
    throw new RequestValidationError(`status must be one of ${Object.values(WorkflowStatus).join(', ')}`);
  }
  return status;
}

/** Fire-and-forget execution; the outcome lands in the store and status log. */
export function runInBackground(action: string, workflowId: string, work: Promise<unknown>): void {
  work.catch((err: unknown) => {
    log.error('Background execution failed', { action, workflowId, error: errorMessage(err) });
  });
}

export function createWorkflowRoutes(engine: WorkflowEngine, planLimit?: RateLimitOptions): Router {
  const router = Router();

  router.post('/', rateLimit({ keyBy: sessionKey, ...planLimit }), asyncRoute(async (req, res) => {
    const body = bodyOf(req);
    const intent = requireString(body, 'intent');
    const sessionId = requireString(body, 'sessionId');
    if (body.autoRun !== undefined && typeof body.autoRun !== 'boolean') {
      throw new RequestValidationError('autoRun must be a boolean');
    }

    const workflow = await engine.createWorkflow(intent, sessionId);
    if (body.autoRun !== false) {
      runInBackground('run', workflow.id, engine.run(workflow.id));
    }
    res.status(201).json({ workflow });
  }));

  router.get('/', asyncRoute(async (req, res) => {
    const filter: WorkflowListFilter = {
      status: parseStatus(queryString(req, 'status')),
      sessionId: queryString(req, 'sessionId'),
      limit: queryInteger(req, 'limit'),
      offset: queryInteger(req, 'offset'),
    };
    const workflows = await engine.listWorkflows(filter);
    res.json({ workflows });
  }));

  router.get('/:workflowId', asyncRoute(async (req, res) => {
    const workflow = await engine.getWorkflow(req.params.workflowId);
    res.json({ workflow });
  }));

  router.delete('/:workflowId', asyncRoute(async (req, res) => {
    await engine.deleteWorkflow(req.params.workflowId);
    res.status(204).end();
  }));

  router.post('/:workflowId/run', asyncRoute(async (req, res) => {
    const workflow = await engine.getWorkflow(req.params.workflowId);
    runInBackground('run', workflow.id, engine.run(workflow.id));
    res.status(202).json({ workflowId: workflow.id, status: workflow.status, accepted: true });
  }));

  router.post('/:workflowId/confirm', asyncRoute(async (req, res) => {
    const approved = bodyOf(req).approved;
    if (typeof approved !== 'boolean') {
      throw new RequestValidationError('approved is required and must be a boolean');
    }
    const workflow = await engine.getWorkflow(req.params.workflowId);
    if (workflow.status !== WorkflowStatus.WaitingConfirmation) {
      throw new ExecutorError(
        workflowInvalidStateError(workflow.id, workflow.status, [WorkflowStatus.WaitingConfirmation]),
      );
    }
    runInBackground('confirm', workflow.id, engine.confirm(workflow.id, approved));
    res.status(202).json({ workflowId: workflow.id, approved, accepted: true });
  }));

  router.post('/:workflowId/cancel', asyncRoute(async (req, res) => {
    const workflow = await engine.cancel(req.params.workflowId);
    res.json({ workflow });
  }));

  return router;
}
