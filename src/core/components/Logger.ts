/**
 * Global Logger Utility for zipsink
 * Provides centralized console control with configurable log levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

/**
 * Global Logger class for controlling console output throughout zipsink
 */
export class Logger {
  private static config: LoggerConfig = {
    enabled: true,
    level: 'info'
  };

  /**
   * Configure the logger
   */
  static configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Get current logger configuration
   */
  static getConfig(): LoggerConfig {
    return { ...this.config };
  }

  static enable(): void {
    this.config.enabled = true;
  }

  /**
   * Disable all logging
   */
  static disable(): void {
    this.config.enabled = false;
  }

  static setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Check if a log level should be output
   */
  private static shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;

    const currentLevelIndex = LOG_LEVELS.indexOf(this.config.level);
    const requestedLevelIndex = LOG_LEVELS.indexOf(level);

    return requestedLevelIndex >= currentLevelIndex;
  }

  static error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...args);
    }
  }

  static warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...args);
    }
  }

  static debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      // Use console.log for debug messages to ensure they're visible
      console.log(...args);
    }
  }

  static info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(...args);
    }
  }
}

/**
 * Environment-based configuration
 */
export function configureLoggerFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  if (env.ZIPSINK_DEBUG === 'false') {
    Logger.disable();
  } else if (env.ZIPSINK_DEBUG === 'true') {
    Logger.enable();
    Logger.setLevel('debug');
  }

  const level = env.ZIPSINK_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    Logger.setLevel(level);
  }

  if (env.NODE_ENV === 'production') {
    Logger.setLevel('error');
  }
}

// Auto-configure from environment on import
configureLoggerFromEnvironment();
