/**
 * Structured Logging Service
 * Keeps a memory buffer of recent entries for the HTTP API and log stream
 */

import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';
import type { LogLevel } from '../config';

export type { LogLevel };

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export class LogService extends EventEmitter {
  private buffer: LogEntry[] = [];
  private maxBufferSize = 1000;
  private minLevel: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Log a message with structured data. Entries below the configured
   * level are dropped.
   */
  log(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      id: nanoid(12),
      timestamp: Date.now(),
      level,
      service,
      message,
      data
    };

    // Add to circular buffer
    this.buffer.push(entry);
    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.shift();
    }

    // Emit for WebSocket subscribers
    this.emit('log', entry);

    // Also output to console for file/stdout logging
    const prefix = `[${service}]`;
    const logFn = level === 'error' ? console.error :
                  level === 'warn' ? console.warn : console.log;

    if (data && Object.keys(data).length > 0) {
      logFn(prefix, message, data);
    } else {
      logFn(prefix, message);
    }
  }

  /**
   * Get recent log entries with optional filtering
   */
  getRecent(count: number = 100, filter?: { level?: LogLevel; service?: string }): LogEntry[] {
    let entries = this.buffer.slice(-Math.min(Math.max(count, 1), this.maxBufferSize));

    if (filter?.level) {
      entries = entries.filter(e => e.level === filter.level);
    }
    if (filter?.service) {
      const serviceLower = filter.service.toLowerCase();
      entries = entries.filter(e => e.service.toLowerCase().includes(serviceLower));
    }

    return entries;
  }

  /**
   * Clear all buffered logs
   */
  clear(): void {
    this.buffer = [];
    this.emit('clear');
  }

  getStats(): { count: number; maxSize: number; oldestTimestamp?: number } {
    return {
      count: this.buffer.length,
      maxSize: this.maxBufferSize,
      oldestTimestamp: this.buffer[0]?.timestamp
    };
  }
}

// Singleton instance
export const logService = new LogService();

// Convenience helper functions for services to use
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
