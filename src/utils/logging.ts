import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LoggingConfig } from '../config/types.js';

// Created with defaults so early startup logs have somewhere to go.
// Reconfigured by initializeLogger() once configuration is loaded.
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Apply logging configuration: level, rotating file transports and console output.
 * Subsequent calls are ignored.
 */
export function initializeLogger(config: LoggingConfig): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;
  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/build-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-build.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when it has no transports at all
  if (!config.file.enabled && !config.console.enabled) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration', { level: config.level });
}

let flushing: Promise<void> | undefined;

/**
 * End the logger and wait until buffered entries reach the transports.
 * Resolves after `timeoutMs` even if a transport never reports back.
 * Nothing may be logged once this has been called.
 */
export function flushLogger(timeoutMs = 2000): Promise<void> {
  if (!flushing) {
    flushing = new Promise<void>(resolve => {
      const timer = setTimeout(resolve, timeoutMs);
      logger.once('finish', () => {
        clearTimeout(timer);
        resolve();
      });
      logger.end();
    });
  }
  return flushing;
}
