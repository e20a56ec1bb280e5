export type { LoggingConfig } from './types.js';
export type { Logger } from './logger.js';
export { createLogger, toCacheLogger } from './logger.js';
