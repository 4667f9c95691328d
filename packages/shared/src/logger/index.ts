export { ConsoleLogger } from './consoleLogger';
export type { ConsoleLoggerOptions } from './consoleLogger';
export type { Logger, MaybePromise } from './types';
