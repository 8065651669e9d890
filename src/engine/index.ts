export * from './state-machine';
export * from './context-resolver';
export * from './retry';
export * from './step-runner';
export * from './step-handlers';
export * from './executor';
export * from './engine';
