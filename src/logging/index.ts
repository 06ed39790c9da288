export type {LogLevel, LogFields, LogSink, Logger, LoggerConfig} from './logger';
export type {LogMetadata} from './metadata';

export {createLogger, parseLogLevel, isLogLevel} from './logger';
export {getLogMetadata, withLogMetadata, traceMetadata, bindLoggingContext} from './metadata';
