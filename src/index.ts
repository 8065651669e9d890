/**
 * intentflow — turns a free-text intent into a planned, executed workflow.
 *
 * Running this file starts the HTTP server; importing the package gives
 * the library surface.
 */

import { createApp, createAppContext } from './server';
import { loadConfig } from './config';
import { configureLogging, logger } from './logger';

export function main(): void {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, format: config.logFormat });

  const context = createAppContext({ config });
  const app = createApp(context);

  app.listen(config.port, () => {
    logger.info('Server listening', {
      port: config.port,
      provider: context.selector.name,
    });
  });
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext, VERSION } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './engine';
export * from './storage';
export * from './planner';
export * from './status';
export * from './tools';
export * from './resilience';
export * from './llm';
export { LLMPlanner, buildSystemPrompt } from './llm/llm-planner';
