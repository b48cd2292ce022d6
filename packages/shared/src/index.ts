export const name = '@release-stager/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
