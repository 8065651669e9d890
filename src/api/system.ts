/**
 * Capability and resilience routes.
 *
 * GET  /capabilities                       — Tools, step types, confirmation tools
 * GET  /resilience/circuits/:service       — Breaker status for a service
 * POST /resilience/circuits/:service/reset — Forget a service's breaker state
 * GET  /resilience/fallback                — Fallback selector status
 * POST /resilience/fallback/reset          — Return to the primary provider
 */

import { Router } from 'express';
import { STEP_TYPES } from '../domain/workflow';
import { mergeToolCatalog } from '../planner/tool-catalog';
import { ToolRegistry } from '../tools/registry';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { FallbackAgentSelector } from '../llm/fallback-selector';
import { logger } from '../logger';

const log = logger.child({ component: 'api' });

export interface SystemRouteDeps {
  tools: ToolRegistry;
  breaker: CircuitBreaker;
  selector: FallbackAgentSelector;
  confirmationTools: readonly string[];
}

export function createSystemRoutes(deps: SystemRouteDeps): Router {
  const router = Router();

  router.get('/capabilities', (_req, res) => {
    const registered = new Set(deps.tools.list().map((t) => t.name));
    res.json({
      stepTypes: STEP_TYPES,
      confirmationTools: deps.confirmationTools,
      tools: mergeToolCatalog(deps.tools.list()).map((tool) => ({
        ...tool,
        // Tools without a registered handler are carried out by the agent.
        execution: registered.has(tool.name) ? 'registry' : 'agent',
      })),
    });
  });

  router.get('/resilience/circuits/:service', (req, res) => {
    res.json({ circuit: deps.breaker.getStatus(req.params.service) });
  });

  router.post('/resilience/circuits/:service/reset', (req, res) => {
    deps.breaker.reset(req.params.service);
    log.info('Circuit reset', { service: req.params.service });
    res.json({ circuit: deps.breaker.getStatus(req.params.service) });
  });

  router.get('/resilience/fallback', (_req, res) => {
    res.json({ fallback: deps.selector.getStatus() });
  });

  router.post('/resilience/fallback/reset', (_req, res) => {
    deps.selector.reset();
    log.info('Fallback selector reset');
    res.json({ fallback: deps.selector.getStatus() });
  });

  return router;
}
