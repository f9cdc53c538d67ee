/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Winston logger shared by the whole process.
 *
 * OUTPUT:
 * - development: colourised single lines, metadata appended as JSON
 * - production:  one JSON object per line, plus rotating files under logs/
 * - test:        silent
 *
 * SECURITY:
 * - API keys, tokens and secrets in metadata are replaced by [REDACTED],
 *   at any nesting depth
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'apikey', 'api_key', 'authorization'];

/**
 * Copy of `data` with sensitive keys redacted. Arrays are kept as they are.
 */
export function sanitizeLogData(data: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowered = key.toLowerCase();

    if (SENSITIVE_FIELDS.some(field => lowered.includes(field))) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

// Applied before any output format so no transport sees raw metadata
const redact = winston.format((info) => {
  for (const [key, value] of Object.entries(sanitizeLogData(info))) {
    info[key] = value;
  }
  return info;
});

const lineFormat = winston.format.printf(({ level, message, timestamp, stack, service: _service, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${extra}${stack ? `\n${stack}` : ''}`;
});

const consoleFormat = config.isProduction
  ? winston.format.json()
  : winston.format.combine(winston.format.colorize(), lineFormat);

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.isTest,
  defaultMeta: { service: 'parcel-quote' },
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    redact(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  transports: [
    new winston.transports.Console({ format: consoleFormat }),

    ...(config.isProduction ? [
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        format: winston.format.json(),
        maxsize: 5242880, // 5MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        format: winston.format.json(),
        maxsize: 5242880,
        maxFiles: 5
      })
    ] : [])
  ]
});
