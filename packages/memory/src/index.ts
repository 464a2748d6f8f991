export const name = '@waveplan/memory';

export * from './types';
export * from './scoring';
export * from './store';
