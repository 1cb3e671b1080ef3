// @chatrelay/core — barrel export
export const VERSION = '0.1.0';

export { ConfigError, InferenceError, errorMessage, type InferenceErrorKind } from './errors.ts';
export {
  createLogger,
  consoleSink,
  FileSink,
  formatLogLine,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogSink,
} from './logger.ts';
export {
  loadConfig,
  loadEnvFile,
  resolveLogOptions,
  DEFAULT_ENV_FILE,
  DEFAULT_LOG_DIR,
  DEFAULT_WELCOME_MESSAGE,
  REQUIRED_SETTINGS,
  OPTIONAL_SETTINGS,
  LEGACY_SETTINGS,
  withLegacySettings,
  type RelayConfig,
  type LogOptions,
} from './config.ts';
export { preview, elapsedSeconds } from './format.ts';
export * from './inference/index.ts';
