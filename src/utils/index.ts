export { createLogger, type LoggerOptions } from './logger.js';
export * from './errors.js';
