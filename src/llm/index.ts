/**
 * LLM integration — completion provider port, adapters, failover and
 * structured response parsing.
 */

export * from './provider';
export * from './structured-response';
export * from './fallback-selector';
export * from './adapters';
