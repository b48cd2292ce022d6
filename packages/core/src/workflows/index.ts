export * from './types';
export * from './preconditions';
export * from './release-commit';
export * from './promotion';
