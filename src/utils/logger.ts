import path from 'path';
import winston from 'winston';
import config from './config.js';

/**
 * Custom log format combining timestamp and message.
 * Format: `YYYY-MM-DDTHH:mm:ss.sssZ [LEVEL]: message`
 */
const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

/**
 * List of Winston transports (outputs) for the logger.
 * - Always includes a Console transport.
 * - Includes file transports for 'error.log' (error level) and 'combined.log' (all levels)
 *   when a log directory is configured.
 */
const transports: winston.transport[] = [new winston.transports.Console()];

if (config.logger.dir) {
  transports.push(
    new winston.transports.File({ filename: path.join(config.logger.dir, 'error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(config.logger.dir, 'combined.log') }),
  );
}

/**
 * Application logger instance configured with timestamped format and multiple transports.
 * The log level is determined by the configuration (defaulting to 'info').
 */
const logger = winston.createLogger({
  level: config.logger.level,
  format: logFormat,
  transports: transports,
});

export default logger;
