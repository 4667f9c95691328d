export * from './outcome';
export * from './status';
export * from './channel';
export * from './pool';
export * from './streams';
export * from './job';
export * from './sink';
export * from './controller';
