export { Logger, formatText, getLogger, setGlobalLoggerConfig } from './Logger';
export type { LogLevel, LogContext, LogEntry, LoggerConfig } from './Logger';
