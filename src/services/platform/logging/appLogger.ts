/**
 * Application Logger
 *
 * Unified logging for the introspection engine with:
 * - Strictly typed categories (no magic strings)
 * - Level filtering before any transport work
 * - Payload truncation
 * - Configurable via CAPPROBE_LOG_LEVEL
 */

import type { ILogger, LogEntry, LogLevel } from './types';
import { isLevelEnabled, parseLogLevel } from './types';
import type { ILogTransport } from './transports';
import { ConsoleTransport } from './transports';
import { truncateRecord } from './truncate';

// =============================================================================
// Strictly Typed Categories
// =============================================================================

export type AppLogCategory =
  // Introspection pipeline
  | 'introspection'
  | 'introspection.metadata'
  | 'introspection.family'
  | 'introspection.probe'
  | 'introspection.modifiability'
  | 'introspection.dependencies'
  | 'introspection.defaults'

  // Adapter overlays
  | 'overlay'

  // Cache
  | 'cache'

  // Runner transport
  | 'runner.http'

  // Host integration
  | 'config'
  | 'hook';

// =============================================================================
// AppLogger Implementation
// =============================================================================

/**
 * Logger with pluggable transports.
 *
 * Never throws; a failing transport does not affect the others.
 */
export class AppLogger implements ILogger<AppLogCategory> {
  private transports: ILogTransport[] = [];
  private minLevel: LogLevel = 'info';

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  addTransport(transport: ILogTransport): void {
    this.transports.push(transport);
  }

  /**
   * Detach a transport previously added.
   * @returns true if the transport was attached
   */
  removeTransport(transport: ILogTransport): boolean {
    const index = this.transports.indexOf(transport);
    if (index === -1) return false;
    this.transports.splice(index, 1);
    return true;
  }

  clearTransports(): void {
    this.transports = [];
  }

  get transportCount(): number {
    return this.transports.length;
  }

  log(level: LogLevel, category: AppLogCategory, message: string, data?: Record<string, unknown>): void {
    // Short-circuit before building the entry
    if (!isLevelEnabled(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      data: data ? truncateRecord(data) : undefined,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch {
        // Logging must never take the engine down with it.
        continue;
      }
    }
  }

  debug(category: AppLogCategory, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: AppLogCategory, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: AppLogCategory, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: AppLogCategory, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }
}

// =============================================================================
// Singleton Export
// =============================================================================

/**
 * Global logger instance.
 *
 * @example
 * ```ts
 * appLogger.info('introspection.probe', 'Baseline trial accepted', { modelId });
 * ```
 */
export const appLogger = new AppLogger();

// =============================================================================
// Initialization
// =============================================================================

export interface InitAppLoggerOptions {
  /** Overrides CAPPROBE_LOG_LEVEL */
  level?: LogLevel;
  /** Transports to install instead of the console */
  transports?: ILogTransport[];
}

/**
 * Configure the global logger. Call once at host startup.
 *
 * Replaces any installed transports, so repeated calls do not duplicate output.
 */
export function initAppLogger(
  options: InitAppLoggerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): void {
  const minLevel = options.level ?? parseLogLevel(env.CAPPROBE_LOG_LEVEL, 'info');

  appLogger.setMinLevel(minLevel);
  appLogger.clearTransports();
  for (const transport of options.transports ?? [new ConsoleTransport()]) {
    appLogger.addTransport(transport);
  }

  appLogger.debug('config', 'Application logger initialized', {
    minLevel,
    transports: appLogger.transportCount,
  });
}
