export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  isLevelEnabled,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
