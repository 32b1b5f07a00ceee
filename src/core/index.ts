export * from './webhook/index.js';
export { createLogger, Logger, type LoggerOptions } from '../utils/logger.js';
