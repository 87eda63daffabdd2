export {
  ShardStatsLogger,
  createLogger,
  type LogEntry,
  type LogFields,
  type LogLevel,
  type ShardStatsLoggerConfig,
} from './logger.js';
