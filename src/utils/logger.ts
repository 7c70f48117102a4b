import winston from 'winston';
import fs from 'fs';

export type ProcessRole = 'publisher' | 'subscriber';

const SERVICE_NAME = 'adsb-pipeline';

/**
 * One console line per event: time, role, level, message, then metadata.
 */
export const consoleLine = winston.format.printf((info) => {
  const {
    timestamp, level, message, service: _service, role, ...meta
  } = info;
  const prefix = typeof role === 'string' ? `[${role}] ` : '';
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${prefix}${level}: ${String(message)}${details}`;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      consoleLine,
    ),
  }),
];

// Opt-in file logging to avoid failures on read-only filesystems/containers
const LOG_TO_FILES = process.env.LOG_TO_FILES === 'true';
if (LOG_TO_FILES) {
  const logDir = process.env.LOG_DIR || 'logs';
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: `${logDir}/error.log`,
      level: 'error',
    }),
    new winston.transports.File({
      filename: `${logDir}/combined.log`,
    }),
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: SERVICE_NAME },
  transports,
});

/**
 * Tag every later log line with the process it came from.
 */
export function setProcessRole(role: ProcessRole): void {
  logger.defaultMeta = { service: SERVICE_NAME, role };
}

export default logger;
