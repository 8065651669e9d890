/**
 * Session API routes.
 *
 * GET    /sessions/:sessionId/workflow — Status view of the latest workflow
 * GET    /sessions/:sessionId/status   — Status entries (?since=<ISO timestamp>)
 * DELETE /sessions/:sessionId/status   — Clear status entries
 */

import { Router } from 'express';
import { notFoundError } from '../domain/errors';
import { WorkflowEngine } from '../engine/engine';
import { ExecutorError } from '../engine/executor';
import { StatusReporter } from '../status/status-reporter';
import { asyncRoute } from './middleware';

export function createSessionRoutes(engine: WorkflowEngine, reporter: StatusReporter): Router {
  const router = Router();

  router.get('/:sessionId/workflow', asyncRoute(async (req, res) => {
    const view = await engine.getStatus(req.params.sessionId);
    if (!view) {
      throw new ExecutorError(notFoundError('Workflow', `session ${req.params.sessionId}`));
    }
    res.json({ workflow: view });
  }));

  router.get('/:sessionId/status', asyncRoute(async (req, res) => {
    const since = typeof req.query.since === 'string' && req.query.since ? req.query.since : undefined;
    const entries = since
      ? await reporter.since(req.params.sessionId, since)
      : await reporter.list(req.params.sessionId);
    res.json({ entries, latest: entries.length > 0 ? entries[entries.length - 1] : null });
  }));

  router.delete('/:sessionId/status', asyncRoute(async (req, res) => {
    await reporter.clear(req.params.sessionId);
    res.status(204).end();
  }));

  return router;
}
