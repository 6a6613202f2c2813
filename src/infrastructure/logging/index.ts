export { Logger, getLogger, setGlobalLoggerConfig, isLogLevel } from './Logger';
export type { LogLevel, LogContext, LogEntry, LoggerConfig } from './Logger';
