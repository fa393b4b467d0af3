/**
 * Shared infrastructure for Sigil services
 */

export {
  Logger,
  LogLevel,
  type LogEntry,
  type LogMetadata,
  type LoggerConfig,
  type DecisionLogEntry,
  type DecisionLogInput,
  type PerformanceTimer,
} from './logger/Logger';
