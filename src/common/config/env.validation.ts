import { Logger } from '@nestjs/common';

const INSECURE_DATABASE_PASSWORDS = ['change-me', 'password', 'admin'];

/**
 * Validates critical environment variables on application startup.
 * Missing mail settings only warn: the app still serves requests and the
 * notification gateway reports every send as failed.
 */
export function validateEnvironmentVariables(env: NodeJS.ProcessEnv = process.env): void {
  const logger = new Logger('EnvironmentValidation');
  const errors: string[] = [];
  const warnings: string[] = [];

  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    errors.push('JWT_SECRET is not defined. Set a secure random string (min 32 characters).');
  } else if (jwtSecret.length < 32) {
    errors.push(`JWT_SECRET must be at least 32 characters long. Current length: ${jwtSecret.length}`);
  }

  const dbPassword = env.DATABASE_PASSWORD;
  if (!dbPassword) {
    errors.push('DATABASE_PASSWORD is not defined.');
  } else if (INSECURE_DATABASE_PASSWORDS.includes(dbPassword)) {
    if (env.NODE_ENV === 'production') {
      errors.push('DATABASE_PASSWORD uses a default/insecure value in production. Change immediately!');
    } else {
      warnings.push('DATABASE_PASSWORD uses a default value. This is acceptable for development but MUST be changed for production.');
    }
  }

  if (!env.DATABASE_HOST) {
    warnings.push('DATABASE_HOST not set, using default: localhost');
  }
  if (!env.DATABASE_NAME) {
    warnings.push('DATABASE_NAME not set, using default: club_db');
  }
  if (!env.DATABASE_USER) {
    warnings.push('DATABASE_USER not set, using default: club');
  }

  // Mail
  for (const key of ['SMTP_HOST', 'SMTP_USER', 'SMTP_FROM']) {
    if (!env[key]) {
      warnings.push(`${key} not set. Email notifications will fail until it is configured.`);
    }
  }

  const reminderWindow = env.PICTURE_REMINDER_WINDOW_HOURS;
  if (reminderWindow !== undefined && !(Number(reminderWindow) > 0)) {
    errors.push(`PICTURE_REMINDER_WINDOW_HOURS must be a positive number. Got: ${reminderWindow}`);
  }

  if (env.NODE_ENV === 'production') {
    if (!env.CORS_ORIGIN) {
      errors.push('CORS_ORIGIN must be set in production to restrict API access.');
    }
    if (!env.SITE_URL) {
      warnings.push('SITE_URL not set. Links in emails will point nowhere.');
    }
  }

  if (warnings.length > 0) {
    logger.warn('Environment configuration warnings:');
    warnings.forEach((warning, index) => {
      logger.warn(`  ${index + 1}. ${warning}`);
    });
  }

  if (errors.length > 0) {
    logger.error('Environment configuration errors:');
    errors.forEach((error, index) => {
      logger.error(`  ${index + 1}. ${error}`);
    });
    throw new Error(
      `Environment validation failed with ${errors.length} error(s). Application cannot start.`,
    );
  }

  logger.log('Environment validation passed');
}
