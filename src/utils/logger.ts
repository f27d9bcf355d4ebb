/**
 * Logger utility that respects the runtime environment
 *
 * Outside production: logs to console
 * In production: disabled unless TYPED_ENDPOINTS_LOG_LEVEL is set
 *
 * Usage:
 *   import { logger } from 'typed-endpoints';
 *   logger.configure({ minLevel: 'debug' });
 *   const log = logger.scope('[billing]');
 *   log.warn('quota nearly used', remaining);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  enabled: boolean;
  minLevel: LogLevel;
}

export interface ScopedLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_ENV = 'TYPED_ENDPOINTS_LOG_LEVEL';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function initialConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const level = env[LEVEL_ENV]?.toLowerCase();
  if (isLogLevel(level)) {
    return { enabled: true, minLevel: level };
  }
  return { enabled: env.NODE_ENV !== 'production', minLevel: 'info' };
}

let config: LoggerConfig = initialConfig();

function shouldLog(level: LogLevel): boolean {
  if (!config.enabled) return false;
  return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
}

function createLogMethod(level: LogLevel): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (shouldLog(level)) {
      console[level](...args);
    }
  };
}

export const logger = {
  /**
   * Configure the logger
   */
  configure(newConfig: Partial<LoggerConfig>): void {
    config = { ...config, ...newConfig };
  },

  /**
   * Restore the configuration derived from the environment
   */
  reset(env?: NodeJS.ProcessEnv): void {
    config = initialConfig(env);
  },

  getConfig(): Readonly<LoggerConfig> {
    return { ...config };
  },

  debug: createLogMethod('debug'),
  info: createLogMethod('info'),
  warn: createLogMethod('warn'),

  /**
   * Log at error level (always logs unless explicitly disabled)
   */
  error: createLogMethod('error'),

  /**
   * Create a scoped logger with a prefix
   */
  scope(prefix: string): ScopedLogger {
    return {
      debug: (...args: unknown[]) => logger.debug(prefix, ...args),
      info: (...args: unknown[]) => logger.info(prefix, ...args),
      warn: (...args: unknown[]) => logger.warn(prefix, ...args),
      error: (...args: unknown[]) => logger.error(prefix, ...args),
    };
  },
};
