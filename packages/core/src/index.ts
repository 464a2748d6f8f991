export const name = '@waveplan/core';

export * from './plan';
export * from './reflection';
export * from './trace';
export * from './workspace';
export * from './config/loader';
