/**
 * Logging infrastructure - barrel export.
 */

export type { LogLevel, LogEntry, ILogger } from './types';
export { LOG_LEVELS, isLevelEnabled, parseLogLevel } from './types';

export type { ILogTransport } from './transports';
export { ConsoleTransport, MemoryTransport } from './transports';

export { truncateString, truncatePayload } from './truncate';

export type { AppLogCategory, InitAppLoggerOptions } from './appLogger';
export { AppLogger, appLogger, initAppLogger } from './appLogger';
