export * from './interface';
export * from './plan-validator';
export * from './tool-catalog';
