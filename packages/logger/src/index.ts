export {
  DEFAULT_REDACT_KEYS,
  flushLoggers,
  getLogger,
  initLogger,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type Sink,
} from './logger.js';
export { ConsoleSink, type ConsoleOutput, type ConsoleSinkOptions } from './sinks/console.js';
export { logLevelSchema, resolveLogLevel, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
