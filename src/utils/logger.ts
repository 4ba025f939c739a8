import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

/**
 * Human-readable format for development
 */
const devFormat = combine(
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

/**
 * JSON format for production log aggregation
 */
const prodFormat = combine(timestamp(), json());

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Determine log level from environment
 */
export function getLogLevel(): LogLevelName {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function getTransports(): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console()];

  const auditLogPath = process.env.AUDIT_LOG_PATH;
  if (auditLogPath) {
    transports.push(
      new winston.transports.File({
        filename: auditLogPath,
        level: 'info',
      })
    );
  }

  return transports;
}

/**
 * Main application logger
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
  transports: getTransports(),
  defaultMeta: { service: 'slack-plugin-host' },
});

/**
 * Render an unknown thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Audit record for every command the dispatcher routes to a plugin.
 * Always logged at 'info' so it reaches the audit file.
 */
export function auditLog(entry: {
  plugin: string;
  userId: string;
  userName?: string;
  channelId: string;
  command: string;
  args: string;
}): void {
  logger.info('Command dispatched', {
    type: 'audit',
    ...entry,
  });
}
