// src/utils/logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurableLogger, createLogger, lineFormat, LogFiles } from './configurable-logger';
import { LoggingConfig } from '../types/config.types';

// Console-only until a CLI calls Logger.initialize; file transports come from config
const logger: winston.Logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
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

export const DOWNLOAD_LOG_MAX_BYTES = 10 * 1024 * 1024;
export const DOWNLOAD_LOG_MAX_FILES = 5;

export default logger;
export { logger };

/**
 * What components need from a logger. Tests hand in jest.fn() sinks.
 */
export interface LogSink {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
}

// Wrapper class for consistent logging interface
export class Logger implements LogSink {
  private context: string;
  static globalConfig: LoggingConfig | undefined;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Initialize logger with configuration
   * Call this at application startup with your config
   */
  static initialize(config: LoggingConfig): void {
    Logger.globalConfig = config;
    const configured = createLogger(config);

    // Replace all transports in the existing logger instance
    logger.clear();
    configured.transports.forEach(transport => {
      logger.add(transport);
    });

    if (!process.env.LOG_LEVEL) {
      logger.level = configured.level;
    }
  }

  /**
   * Mirror everything logged from now on into one extra file, rotated at
   * DOWNLOAD_LOG_MAX_BYTES
   */
  static addFileTransport(filePath: string): winston.transports.FileTransportInstance {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const transport = new winston.transports.File({
      filename: filePath,
      format: lineFormat,
      maxsize: DOWNLOAD_LOG_MAX_BYTES,
      maxFiles: DOWNLOAD_LOG_MAX_FILES,
      tailable: true
    });
    logger.add(transport);
    return transport;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error(`[${this.context}] ${message}: ${detail}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }
}

export function getLogFilePaths(): LogFiles | null {
  if (Logger.globalConfig) {
    return ConfigurableLogger.getLogFilePaths();
  }
  return null;
}
