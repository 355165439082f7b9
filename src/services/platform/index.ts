// Host-facing platform services. Engine modules import logging from here.

export { appLogger, initAppLogger, AppLogger } from './logging/appLogger';
export type { AppLogCategory, InitAppLoggerOptions } from './logging/appLogger';
export type { LogLevel, LogEntry, ILogger } from './logging/types';
export { ConsoleTransport, MemoryTransport } from './logging/transports';
export type { ILogTransport } from './logging/transports';
export { truncateString, truncatePayload } from './logging/truncate';
