import { config } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevel(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

function threshold(): number {
  const level = config.logging.level;
  return isLevel(level) ? LEVEL_WEIGHT[level] : LEVEL_WEIGHT.info;
}

function write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_WEIGHT[level] < threshold()) {
    return;
  }

  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

  if (level === 'error') {
    console.error(line + suffix);
  } else if (level === 'warn') {
    console.warn(line + suffix);
  } else {
    console.log(line + suffix);
  }
}

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => write('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => write('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => write('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => write('error', message, meta),
};
