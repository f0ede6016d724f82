// packages/core/src/index.ts
export * from './dtypes';
export * from './errors';
export * from './schema';
export * from './types';
export * from './trace';
export * from './config';
export * from './logger';
export * from './schemas';
export * from './expr/nodes';
export * from './expr/queries';
export * from './expr/infer';
export * from './expr/builder';
export * from './semantics/kleene';
export * from './semantics/reference';
export * from './semantics/plan';
