/**
 * Log Service
 *
 * Leveled, service-tagged logging for the server and the pipeline. Entries
 * are echoed to the console and kept in a bounded buffer that /api/logs
 * reads back.
 */

import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';
import type { PipelineLogger } from '@tonearm/core';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogQuery {
  /** Newest entries to return */
  count?: number;
  /** Minimum level */
  level?: LogLevel;
  /** Case-insensitive substring of the service name */
  service?: string;
}

export interface LogStats {
  buffered: number;
  capacity: number;
  /** Entries pushed out of the buffer since the last clear */
  dropped: number;
  byLevel: Record<LogLevel, number>;
  oldestTimestamp?: number;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

const CONSOLE: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

export class LogService extends EventEmitter {
  private entries: LogEntry[] = [];
  private dropped = 0;
  private minLevel: LogLevel = 'info';

  constructor(
    private readonly capacity = 1000,
    private readonly echo = true
  ) {
    super();
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  log(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
    if (rank(level) < rank(this.minLevel)) return;

    const entry: LogEntry = { id: nanoid(12), timestamp: Date.now(), level, service, message, data };
    this.append(entry);
    this.emit('log', entry);

    if (this.echo) {
      const args: unknown[] = [`[${service}]`, message];
      if (data && Object.keys(data).length > 0) args.push(data);
      CONSOLE[level](...args);
    }
  }

  /**
   * Newest entries matching the query, oldest first
   */
  recent(query: LogQuery = {}): LogEntry[] {
    const { count = 100, level, service } = query;
    const needle = service?.toLowerCase();

    const matching = this.entries.filter(entry =>
      (level === undefined || rank(entry.level) >= rank(level)) &&
      (needle === undefined || entry.service.toLowerCase().includes(needle))
    );

    return count > 0 ? matching.slice(-count) : [];
  }

  clear(): void {
    this.entries = [];
    this.dropped = 0;
  }

  stats(): LogStats {
    const byLevel: Record<LogLevel, number> = { debug: 0, info: 0, warn: 0, error: 0 };
    for (const entry of this.entries) {
      byLevel[entry.level]++;
    }

    return {
      buffered: this.entries.length,
      capacity: this.capacity,
      dropped: this.dropped,
      byLevel,
      oldestTimestamp: this.entries[0]?.timestamp
    };
  }

  private append(entry: LogEntry): void {
    this.entries.push(entry);
    const overflow = this.entries.length - this.capacity;
    if (overflow > 0) {
      this.entries.splice(0, overflow);
      this.dropped += overflow;
    }
  }
}

export const logService = new LogService();

export const log = {
  debug: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('debug', service, message, data),
  info: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('info', service, message, data),
  warn: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('warn', service, message, data),
  error: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('error', service, message, data),
};

/**
 * Adapt a log service to the logger interface the pipeline takes
 */
export function createServiceLogger(service: string, target: LogService = logService): PipelineLogger {
  return {
    debug: (message, data) => target.log('debug', service, message, data),
    info: (message, data) => target.log('info', service, message, data),
    warn: (message, data) => target.log('warn', service, message, data),
    error: (message, data) => target.log('error', service, message, data),
  };
}
