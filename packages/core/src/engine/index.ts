export * from './types';
export * from './range';
export * from './layout';
