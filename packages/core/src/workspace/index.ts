export * from './handle';
export * from './archive';
export * from './check';
