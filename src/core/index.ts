/**
 * Core module exports
 * Configuration, logging and the error taxonomy
 */

export {
  type KeepcConfig,
  type LogLevel as ConfigLogLevel,
  type ShellConfig,
  type SystemInfo,
  ConfigurationError,
  loadConfigFromEnv,
  validateConfig,
  resolveConfigDir,
  defaultStorePath,
  shellForPlatform,
  currentSystem,
  DEFAULT_EDITOR,
} from './config.js';

export {
  type LogLevel,
  type LogEntry,
  type Logger,
  type LogSink,
  LoggerImpl,
  shouldLog,
  formatLogEntry,
  stderrSink,
  createLogger,
  createSilentLogger,
} from './logger.js';

export * from './errors.js';
