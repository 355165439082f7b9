/**
 * Log transport implementations.
 *
 * Transports define where logs go. All transports implement ILogTransport
 * and must never throw.
 */

import type { LogEntry, LogLevel } from './types';

export interface ILogTransport {
  write(entry: LogEntry): void;

  /** Flush any buffered logs (optional). */
  flush?(): void | Promise<void>;
}

// =============================================================================
// Console Transport
// =============================================================================

/**
 * Writes entries to the process console, routed by level.
 */
export class ConsoleTransport implements ILogTransport {
  /**
   * @param output - Console-like sink (defaults to the global console)
   */
  constructor(private readonly output: Pick<Console, LogLevel | 'log'> = console) {}

  write(entry: LogEntry): void {
    const prefix = `${entry.timestamp} [${entry.category}]`;
    const args: unknown[] = [prefix, entry.message];

    if (entry.data && Object.keys(entry.data).length > 0) {
      args.push(entry.data);
    }

    switch (entry.level) {
      case 'debug':
        this.output.debug(...args);
        break;
      case 'info':
        this.output.log(...args);
        break;
      case 'warn':
        this.output.warn(...args);
        break;
      case 'error':
        this.output.error(...args);
        break;
    }
  }
}

// =============================================================================
// Memory Transport
// =============================================================================

/**
 * Keeps the most recent entries in memory.
 * Used by tests and by hosts that surface engine logs in their own UI.
 */
export class MemoryTransport implements ILogTransport {
  private entries: LogEntry[] = [];

  constructor(private readonly capacity: number = 500) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** Entries in arrival order, optionally narrowed to one category. */
  getEntries(category?: string): LogEntry[] {
    return category ? this.entries.filter((e) => e.category === category) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}
