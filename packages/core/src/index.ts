export const name = '@moonfmt/core';

export * from './config/loader';
export * from './engine';
export * from './diff';
export * from './run';
