export const name = '@release-stager/vcs';

export * from './types';
export * from './scm-url';
export * from './manager';
export * from './svn';
export * from './fake';
