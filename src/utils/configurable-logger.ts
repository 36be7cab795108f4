// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

// Default logging profiles
const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

export interface LogFiles {
  combined: string;
  error: string;
  warning?: string;
}

export const lineFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  return `${timestamp} [${level}]: ${message}${stack ? '\n' + stack : ''}`;
});

export class ConfigurableLogger {
  private static config: LoggingProfile = DEFAULT_PROFILES.AppendDatetime;
  private static startedAt: Date = new Date();

  /**
   * Initialize the logger with configuration
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);
    this.config = effectiveConfig;
    this.startedAt = new Date();

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel || 'info',
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), lineFormat)
        })
      ]
    });

    const logsDir = this.getLogDirectory();
    try {
      fs.mkdirSync(logsDir, { recursive: true });
    } catch (error) {
      console.warn(`Could not create logs directory ${logsDir}, using console only: ${error}`);
      return logger;
    }

    const files = this.getLogFilePaths();
    logger.add(new winston.transports.File({ filename: files.combined, format: lineFormat }));
    logger.add(new winston.transports.File({ filename: files.error, level: 'error', format: lineFormat }));
    if (files.warning) {
      logger.add(new winston.transports.File({ filename: files.warning, level: 'warn', format: lineFormat }));
    }

    return logger;
  }

  /**
   * Resolve the effective logging configuration
   */
  private static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      console.warn(`Logging profile '${config.profile}' not found, using AppendDatetime`);
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.appendTimestamp !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        logDirectory: config.logDirectory || 'logs'
      };
    }

    return DEFAULT_PROFILES.AppendDatetime;
  }

  /**
   * Append the run's start time to a log file name when the profile asks for it
   */
  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const year = now.getFullYear();
      const month = String(now.getMonth() + 1).padStart(2, '0');
      const day = String(now.getDate()).padStart(2, '0');
      const hours = String(now.getHours()).padStart(2, '0');
      const minutes = String(now.getMinutes()).padStart(2, '0');
      const seconds = String(now.getSeconds()).padStart(2, '0');
      timestamp = `${year}-${month}-${day}-${hours}${minutes}${seconds}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);

    return `${name}-${timestamp}${ext}`;
  }

  static getLogDirectory(): string {
    return path.join(process.cwd(), this.config.logDirectory || 'logs');
  }

  /**
   * Get full paths to log files
   */
  static getLogFilePaths(): LogFiles {
    const logsDir = this.getLogDirectory();
    const result: LogFiles = {
      combined: path.join(logsDir, this.generateLogFilename('combined.log', this.config, this.startedAt)),
      error: path.join(logsDir, this.generateLogFilename('error.log', this.config, this.startedAt))
    };

    if (this.config.enableWarningLog) {
      result.warning = path.join(logsDir, this.generateLogFilename('warning.log', this.config, this.startedAt));
    }

    return result;
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
