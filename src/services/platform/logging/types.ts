/**
 * Logging vocabulary shared by the logger and its transports.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Ordered by severity: debug < info < warn < error
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Check if a log level should be emitted given the minimum level.
 *
 * @example
 * isLevelEnabled('debug', 'info') // false
 * isLevelEnabled('warn', 'info')  // true
 */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

/**
 * Parse a log level string (case-insensitive), returning `defaultLevel` if invalid.
 */
export function parseLogLevel(value: string | undefined, defaultLevel: LogLevel = 'info'): LogLevel {
  if (!value) return defaultLevel;

  const normalized = value.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? defaultLevel;
}

/**
 * A single structured log event.
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Category for filtering, e.g. 'introspection.probe' */
  category: string;
  message: string;
  /** Optional structured data (truncated before it reaches transports) */
  data?: Record<string, unknown>;
}

/**
 * Transport-agnostic logger surface.
 */
export interface ILogger<Category extends string = string> {
  log(level: LogLevel, category: Category, message: string, data?: Record<string, unknown>): void;
  debug(category: Category, message: string, data?: Record<string, unknown>): void;
  info(category: Category, message: string, data?: Record<string, unknown>): void;
  warn(category: Category, message: string, data?: Record<string, unknown>): void;
  error(category: Category, message: string, data?: Record<string, unknown>): void;
}
