import type { LogEntry, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean;
}

const levelColors: Record<LogEntry['level'], string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Writes entries synchronously as `[HH:MM:SS] LEVEL [category] message {context}`.
 * warn and error go to stderr through console.warn/console.error.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    const message = `${formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;

    if (entry.level === 'error') {
      console.error(message);
    } else if (entry.level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
  }

  flush(): void {
    // writes are unbuffered
  }

  private formatLevel(level: LogEntry['level']): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${levelColors[level]}${upper}\x1b[0m` : upper;
  }
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
