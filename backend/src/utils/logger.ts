import path from 'node:path';
import winston from 'winston';
import { IS_PRODUCTION, LOG_DIR, LOG_LEVEL } from '../server/runtime.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

const devFormat = combine(
  errors({ stack: true }),
  colorize(),
  timestamp({ format: 'HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message} ${metaStr}`;
  }),
);

const prodFormat = combine(errors({ stack: true }), timestamp(), json());

const fileTransports = (logDir: string) => [
  new winston.transports.File({ filename: path.join(logDir, 'app.log'), format: prodFormat }),
  new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error', format: prodFormat }),
];

const consoleTransport = new winston.transports.Console();

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: IS_PRODUCTION ? prodFormat : devFormat,
  transports: LOG_DIR ? [consoleTransport, ...fileTransports(LOG_DIR)] : [consoleTransport],
});

export type Logger = Pick<winston.Logger, 'debug' | 'info' | 'warn' | 'error'>;

export default logger;
