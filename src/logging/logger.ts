/**
 * Logger Configuration
 * Winston-based logging for the anomaly engine
 */

import winston from 'winston';
import path from 'path';

export interface LoggerOptions {
  level?: string;
  format?: 'json' | 'pretty';
  service?: string;
  logDir?: string;
}

// Custom format for pretty printing
const prettyFormat = winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
  const prefix = component ? `[${component}] ` : '';
  let msg = `${timestamp} [${level.toUpperCase()}]: ${prefix}${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info';
  const format = options.format || (process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json');
  const logDir = options.logDir ?? process.env.LOG_DIR;
  const lineFormat = format === 'pretty' ? prettyFormat : winston.format.json();

  const transports: winston.transport[] = [
    new winston.transports.Console({ format: lineFormat }),
  ];

  // File output only when a directory is configured
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 10485760,
        maxFiles: 10,
        tailable: true,
      })
    );
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    defaultMeta: { service: options.service || 'cold-storage-anomaly-engine' },
    transports,
  });
}

const logger = createLogger();

// Export logger as default
export default logger;

// Also export named
export { logger };
