import { LoggerService, Injectable } from '@nestjs/common';
import * as winston from 'winston';
import { getRequestId } from './logging.context';

/**
 * LoggingService
 *
 * NestJS LoggerService implementation backed by Winston.
 * Produces structured JSON logs with the request ID, service name
 * and logging context. Sensitive fields are redacted before output.
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | debug | verbose (default: "info")
 * - LOG_FORMAT: "json" (default) | "pretty"
 * - LOG_SERVICE_NAME: service identifier (default: "club-membership-api")
 */

/** Fields that must be redacted from log output */
const SENSITIVE_FIELDS = [
  'password',
  'passwordHash',
  'confirmPassword',
  'token',
  'secret',
  'authorization',
  'smtp_pass',
  'accessToken',
];

type LogMeta = Record<string, unknown>;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

@Injectable()
export class LoggingService implements LoggerService {
  private readonly logger: winston.Logger;
  private readonly serviceName: string;

  constructor() {
    this.serviceName = process.env.LOG_SERVICE_NAME || 'club-membership-api';
    const level = this.mapLogLevel(process.env.LOG_LEVEL || 'info');
    const formatType = process.env.LOG_FORMAT || 'json';

    const formatters =
      formatType === 'pretty'
        ? winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
              const ctx = meta.context ? `[${String(meta.context)}]` : '';
              const requestId = meta.requestId ? `(${String(meta.requestId)})` : '';
              return `${String(timestamp)} ${lvl} ${ctx} ${requestId} ${String(message)}`;
            }),
          )
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level,
      defaultMeta: { service: this.serviceName },
      format: formatters,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Nest's "verbose" is its most permissive level while Winston's "verbose"
   * sits below "debug", so the two names swap.
   */
  private mapLogLevel(level: string): string {
    const mapping: Record<string, string> = {
      error: 'error',
      warn: 'warn',
      info: 'info',
      debug: 'verbose',
      verbose: 'debug',
    };
    return mapping[level] || 'info';
  }

  log(message: unknown, context?: string): void {
    this.logMessage('info', message, this.buildMeta(context));
  }

  error(message: unknown, trace?: string, context?: string): void {
    const meta = this.buildMeta(context);
    if (trace) {
      meta.error = trace;
    }
    this.logMessage('error', message, meta);
  }

  warn(message: unknown, context?: string): void {
    this.logMessage('warn', message, this.buildMeta(context));
  }

  debug(message: unknown, context?: string): void {
    this.logMessage('debug', message, this.buildMeta(context));
  }

  verbose(message: unknown, context?: string): void {
    this.logMessage('verbose', message, this.buildMeta(context));
  }

  /**
   * An object message has its properties merged into meta as top-level
   * fields, with its own 'message' property used as the log line.
   */
  private logMessage(level: string, message: unknown, meta: LogMeta): void {
    const sanitized = this.sanitize(message);
    if (isPlainRecord(sanitized)) {
      const { message: msg, ...rest } = sanitized;
      Object.assign(meta, rest);
      this.logger.log(level, typeof msg === 'string' ? msg : '', meta);
    } else {
      this.logger.log(level, String(sanitized), meta);
    }
  }

  private buildMeta(context?: string): LogMeta {
    const meta: LogMeta = {};
    if (context) {
      meta.context = context;
    }
    const requestId = getRequestId();
    if (requestId) {
      meta.requestId = requestId;
    }
    return meta;
  }

  /**
   * Strip sensitive fields from a log message or object.
   */
  sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
      return String(data);
    }
    if (data instanceof Error) {
      return data.message;
    }
    if (Array.isArray(data)) {
      return data.map((item) => (isPlainRecord(item) ? this.sanitizeObject(item) : item));
    }
    if (isPlainRecord(data)) {
      return this.sanitizeObject(data);
    }
    return data;
  }

  private sanitizeObject(source: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(source)) {
      if (SENSITIVE_FIELDS.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
        result[key] = '[REDACTED]';
      } else if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
        result[key] = this.sanitize(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  getWinstonLogger(): winston.Logger {
    return this.logger;
  }

  getServiceName(): string {
    return this.serviceName;
  }
}
