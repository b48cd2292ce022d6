export const name = '@release-stager/core';

export * from './config/loader';
export * from './config/resolve';
export * from './classify';
export * from './site/archiver';
export * from './site/compress';
export * from './templates';
export * from './staging';
export * from './workflows';
