import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the extraction engine. Console output is always on;
 * JSON file output is written only when LOG_DIR is set.
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

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  const logDir = process.env.LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'ScalingPlanner', 'AgentPool')
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
 * Logger bound to one processing run, so every line carries the document id
 */
export class RunLogger {
  private logger: winston.Logger;
  private documentId: string;

  constructor(component: string, documentId: string) {
    this.documentId = documentId;
    this.logger = createLogger(component);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { documentId: this.documentId, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      documentId: this.documentId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { documentId: this.documentId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { documentId: this.documentId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Run started', metadata);
  }

  completed(metadata?: object) {
    this.info('Run completed', metadata);
  }

  failed(error: unknown, metadata?: object) {
    this.error('Run failed', error, metadata);
  }
}
