/**
 * Express server configuration.
 *
 * Assembles the services into an AppContext and mounts the API surface
 * on it. Everything is injectable so tests can swap providers and tools.
 */

import express from 'express';
import { AppConfig, loadConfig } from './config';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { MemoryStatusReporter, StatusReporter } from './status/status-reporter';
import { InMemoryToolRegistry } from './tools/registry';
import { CircuitBreaker } from './resilience/circuit-breaker';
import { guardProvider, guardToolRegistry } from './resilience/guards';
import { CompletionProvider, createAdapterProvider } from './llm/provider';
import { registerBuiltInAdapters } from './llm/adapters';
import { FallbackAgentSelector } from './llm/fallback-selector';
import { LLMPlanner } from './llm/llm-planner';
import { Planner } from './planner/interface';
import { WorkflowExecutor, ExecutorConfig } from './engine/executor';
import { WorkflowEngine } from './engine/engine';
import { isTransientError } from './engine/retry';
import { errorHandler, requestLogger } from './api/middleware';
import { createWorkflowRoutes } from './api/workflows';
import { createSessionRoutes } from './api/sessions';
import { createSystemRoutes } from './api/system';

const startTime = Date.now();

export const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: Readonly<AppConfig>;
  store: Store;
  reporter: StatusReporter;
  tools: InMemoryToolRegistry;
  breaker: CircuitBreaker;
  selector: FallbackAgentSelector;
  planner: Planner;
  executor: WorkflowExecutor;
  engine: WorkflowEngine;
}

export interface AppContextOptions {
  config?: Readonly<AppConfig>;
  store?: Store;
  reporter?: StatusReporter;
  tools?: InMemoryToolRegistry;
  /** Completion providers; built from config when omitted. */
  primary?: CompletionProvider;
  secondary?: CompletionProvider | null;
  /** Clock and sleep overrides for the executor. */
  executor?: Partial<Pick<ExecutorConfig, 'sleep' | 'random'>>;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig({});
  const store = options.store ?? createMemoryStore();
  const reporter = options.reporter ?? new MemoryStatusReporter({ sessionTtlMs: config.statusSessionTtlMs });
  const tools = options.tools ?? new InMemoryToolRegistry();

  if (!options.primary) {
    registerBuiltInAdapters();
  }
  const primary = options.primary ?? createAdapterProvider(config.primary);
  const secondary = options.secondary !== undefined
    ? options.secondary
    : config.secondary ? createAdapterProvider(config.secondary) : null;

  // Only failures worth retrying say anything about a service's health.
  const breaker = new CircuitBreaker({ ...config.breaker, isFailure: isTransientError });
  const selector = new FallbackAgentSelector(primary, secondary, reporter, config.fallback);
  const provider = guardProvider(selector, breaker);

  const planner = new LLMPlanner(provider, store.workflows, reporter, {
    confirmationTools: config.confirmationTools,
    tools: () => tools.list(),
  });
  const executor = new WorkflowExecutor(
    store.workflows,
    reporter,
    { tools: guardToolRegistry(tools, breaker), provider },
    {
      retry: config.retry,
      interStepDelayMs: config.interStepDelayMs,
      confirmationTools: config.confirmationTools,
      ...options.executor,
    },
  );
  const engine = new WorkflowEngine(planner, executor, store.workflows, reporter);

  return { config, store, reporter, tools, breaker, selector, planner, executor, engine };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
    });
  });

  const v1 = express.Router();
  v1.use('/workflows', createWorkflowRoutes(ctx.engine, { maxRequests: ctx.config.planRateLimitPerMinute }));
  v1.use('/sessions', createSessionRoutes(ctx.engine, ctx.reporter));
  v1.use('/', createSystemRoutes({
    tools: ctx.tools,
    breaker: ctx.breaker,
    selector: ctx.selector,
    confirmationTools: ctx.config.confirmationTools,
  }));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
