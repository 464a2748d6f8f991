export * from './types';
export * from './validate';
export * from './log';
export * from './health';
