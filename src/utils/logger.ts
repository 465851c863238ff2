import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { resolve } from 'path';

const LOG_DIR = resolve(process.cwd(), process.env.LOG_DIR ?? 'data');
const SILENT = process.env.LOG_SILENT === 'true';

// One file per process start: engine-YYYY-MM-DD_HHmmss.log
const SESSION_START = new Date();
const pad = (n: number) => String(n).padStart(2, '0');
const SESSION_TS = `${SESSION_START.getFullYear()}-${pad(SESSION_START.getMonth() + 1)}-${pad(SESSION_START.getDate())}_${pad(SESSION_START.getHours())}${pad(SESSION_START.getMinutes())}${pad(SESSION_START.getSeconds())}`;
const SESSION_LOG_FILE = `engine-${SESSION_TS}.log`;

export const SESSION_LOG_PATH = resolve(LOG_DIR, SESSION_LOG_FILE);

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    if (stack) {
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}\n${String(stack)}${metaStr}`;
    }
    return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
  }),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length
      ? ` ${JSON.stringify(meta, null, 0)}`
      : '';
    return `${String(timestamp)} ${level} ${String(message)}${metaStr}`;
  }),
);

function buildTransports(): winston.transport[] {
  if (SILENT) {
    return [new winston.transports.Console({ silent: true })];
  }
  return [
    new winston.transports.Console({
      format: consoleFormat,
      handleExceptions: false,
    }),
    new winston.transports.File({
      dirname: LOG_DIR,
      filename: SESSION_LOG_FILE,
      format: logFormat,
      maxsize: 50 * 1024 * 1024,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    }),
  ];
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  exitOnError: false,
  silent: SILENT,
  transports: buildTransports(),
});
