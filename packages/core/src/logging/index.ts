export { Logger, redactSecrets, createRunId } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
