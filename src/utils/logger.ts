import '../config/env.js';
import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the extraction pipeline. Console output is always on;
 * JSON file output is enabled when LOG_DIR is set.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

const MAX_LOG_FILE_SIZE = 5242880; // 5MB

type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance;

function buildTransports(): LogTransport[] {
  const transports: LogTransport[] = [
    // stderr keeps stdout free for command output
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ];

  const logDir = process.env.LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: MAX_LOG_FILE_SIZE,
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: MAX_LOG_FILE_SIZE,
        maxFiles: 5,
      })
    );
  }

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'OutcomeClassifier', 'BatchRunner')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports: buildTransports(),
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Binds a document id to every entry so one decision can be followed
 * through the batch logs.
 */
export class DocumentLogger {
  private logger: winston.Logger;

  constructor(documentId: string, parent: winston.Logger = logger) {
    this.logger = parent.child({ documentId });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { ...metadata });
  }

  started(metadata?: object) {
    this.debug('Document started', metadata);
  }

  completed(metadata?: object) {
    this.debug('Document completed', metadata);
  }

  failed(error: unknown, metadata?: object) {
    this.error('Document failed', error, metadata);
  }
}
