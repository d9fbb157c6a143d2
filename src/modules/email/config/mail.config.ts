import { ConfigService } from '@nestjs/config';

export const MAIL_CONFIG = 'MAIL_CONFIG';

/**
 * SMTP settings handed to the notification gateway at construction.
 * Nothing in the email module reads process.env directly.
 */
export interface MailConfig {
  host?: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from?: string;
  /** Fixed pause between attempts on a transient transport failure. */
  retryDelayMs: number;
  defaultBatchSize: number;
}

export interface MailConfigCheck {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const DEFAULT_SMTP_PORT = 587;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_BATCH_SIZE = 100;

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function buildMailConfig(configService: ConfigService): MailConfig {
  const port = parseNumber(configService.get<string>('SMTP_PORT'), DEFAULT_SMTP_PORT);
  const secureFlag = configService.get<string>('SMTP_SECURE');

  return {
    host: configService.get<string>('SMTP_HOST') || undefined,
    port,
    secure: secureFlag !== undefined ? secureFlag === 'true' : port === 465,
    user: configService.get<string>('SMTP_USER') || undefined,
    password: configService.get<string>('SMTP_PASS') || undefined,
    from:
      configService.get<string>('SMTP_FROM') ||
      configService.get<string>('SMTP_USER') ||
      undefined,
    retryDelayMs: parseNumber(
      configService.get<string>('MAIL_RETRY_DELAY_MS'),
      DEFAULT_RETRY_DELAY_MS,
    ),
    defaultBatchSize: parseNumber(
      configService.get<string>('MAIL_BATCH_SIZE'),
      DEFAULT_BATCH_SIZE,
    ),
  };
}

/**
 * Host, user and sender are required; a missing password only warns since
 * some relays accept unauthenticated submission from trusted networks.
 */
export function validateMailConfig(config: MailConfig): MailConfigCheck {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.host) {
    errors.push('SMTP_HOST not configured');
  }
  if (!config.user) {
    errors.push('SMTP_USER not configured');
  }
  if (!config.from) {
    errors.push('SMTP_FROM not configured');
  }
  if (!config.password) {
    warnings.push('SMTP_PASS not configured - emails may fail');
  }

  return { valid: errors.length === 0, errors, warnings };
}
