export const name = '@repairbench/shared';

export * from './errors';
export * from './logger';
export * from './types/events';
export * from './types/scenario';
export * from './types/patch';
export * from './types/results';
export * from './types/report';
export * from './types/run-state';
export * from './config/schema';
export * from './fs/path';
export * from './patch/edits';
export * from './string-utils';
