export {
  initLogger,
  getLogger,
  flushLoggers,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { serializeContext } from './serialize.js';
export { resolveLogLevel, type LoggerEnvConfig } from './env.schema.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
