/**
 * Logging Module Index
 */

export {
  GateLogger,
  ConsoleLogSubscriber,
  formatLogLine,
  isLogLevel,
  levelRank,
  LOG_LEVELS,
  type GateLogLevel,
  type GateLogCategory,
  type GateLogEntry,
  type GateLogSubscriber,
} from './gate-logger';

// Atomic file writing with fsync and retry
export {
  atomicWriteFileSync,
  DEFAULT_MAX_RETRIES,
  type AtomicWriteOptions,
  type AtomicWriteResult,
} from './atomic-file-writer';
