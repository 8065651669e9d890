export * from './ttl-store';
export * from './circuit-breaker';
export * from './guards';
