import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps entries in memory. Used by tests and by callers that want to inspect
 * what a component logged.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {}

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
