export * from './plan';
export * from './stager';
