export { createLogger, serializeError } from './logger';
export type { LogFields, LogLevel, LogSink, Logger, LoggerOptions } from './logger';
