export const name = '@waveplan/shared';

export * from './errors';
export * from './best-effort';
export * from './logger';
export * from './fs/io';
export * from './jsonl/store';
export * from './config/schema';
export * from './time';
