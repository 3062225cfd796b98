// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = [
  'code',
  'accessToken',
  'access_token',
  'refreshToken',
  'password',
  'clientSecret',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!isRecord(obj)) return obj;

    const redacted = { ...obj };
    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Serialized authorize requests and redirect parameters
    if ('request' in redacted && isRecord(redacted.request)) {
      const request = { ...redacted.request };
      for (const key of SENSITIVE_KEYS) {
        if (key in request) request[key] = '[REDACTED]';
      }
      redacted.request = request;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}

/** What the core needs from a logger; lets tests pass plain spies. */
export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
