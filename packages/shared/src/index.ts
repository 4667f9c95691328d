export const name = '@moonfmt/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './fs/io';
