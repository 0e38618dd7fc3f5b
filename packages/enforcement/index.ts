export * from './src/clock';
export * from './src/counter';
export * from './src/enforcer';
export * from './src/grace';
export * from './src/justification';
export * from './src/lifecycle';
export * from './src/logger';
export * from './src/presentation';
export * from './src/reconciler';
export * from './src/run-state';
export * from './src/suppression';
export * from './src/thresholds';
export * from './src/timeline';
