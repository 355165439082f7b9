export * from './types';
export * from './services/introspection';
export * from './services/runner';
export { loadIntrospectionConfig, DEFAULT_CACHE_TTL_MS, DEFAULT_PROBE_TIMEOUT_MS } from './config/introspection';
export type { IntrospectionConfig } from './config/introspection';
export { appLogger, initAppLogger, ConsoleTransport, MemoryTransport } from './services/platform';
export type { AppLogCategory, ILogTransport, LogEntry, LogLevel } from './services/platform';
export { systemClock, ManualClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { useModelCapabilities } from './hooks/useModelCapabilities';
export type { UseModelCapabilitiesResult } from './hooks/useModelCapabilities';
