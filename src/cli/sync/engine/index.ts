export * from './config';
export * from './discoverer';
export * from './errors';
export * from './identity';
export * from './orchestrator';
export * from './planner';
export * from './resourceLedger';
export * from './retryPolicy';
export * from './sorter';
export * from './types';
