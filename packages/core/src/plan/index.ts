export * from './types';
export * from './graph';
export * from './overlap';
export * from './validate';
export * from './execution';
export * from './store';
export * from './summary';
