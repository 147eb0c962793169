import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';
const silent = process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL;

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level} [${component}] ${message}${extra}`;
  })
);

const rootLogger = winston.createLogger({
  level,
  silent,
  format: process.env.LOG_FORMAT === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : consoleFormat,
  transports: [new winston.transports.Console()]
});

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

// Errors lose their fields under JSON.stringify
function toMeta(meta: unknown): Record<string, unknown> {
  if (meta === undefined) return {};
  if (meta instanceof Error) {
    return { error: { name: meta.name, message: meta.message, stack: meta.stack } };
  }
  if (typeof meta === 'object' && meta !== null && !Array.isArray(meta)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta)) {
      result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return result;
  }
  return { detail: meta };
}

export function createLogger(component: string): Logger {
  const child = rootLogger.child({ component });
  return {
    debug: (message, meta) => child.debug(message, toMeta(meta)),
    info: (message, meta) => child.info(message, toMeta(meta)),
    warn: (message, meta) => child.warn(message, toMeta(meta)),
    error: (message, meta) => child.error(message, toMeta(meta))
  };
}
