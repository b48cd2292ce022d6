export * from './types';
export * from './classifier';
