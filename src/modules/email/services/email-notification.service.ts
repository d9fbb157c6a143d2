/**
 * EmailNotificationService
 *
 * Gateway between the membership workflows and the SMTP transport.
 * Sends one message or a bounded-size batch, validates configuration and
 * recipient addresses, renders templates per recipient, and retries
 * transient transport failures a fixed number of times.
 *
 * Batches run sequentially, one message at a time. Nothing is queued: a
 * crash mid-batch loses the unsent remainder.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';
import { isEmail } from 'class-validator';
import { MAIL_CONFIG, MailConfig, MailConfigCheck, validateMailConfig } from '../config/mail.config';
import {
  InvalidRecipientError,
  MailConfigurationError,
  MailTransportError,
} from '../errors/mail.errors';
import { EmailContext, EmailTemplateService } from './email-template.service';

export const MAX_SEND_ATTEMPTS = 3;

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ECONNRESET',
  'ECONNREFUSED',
]);

export interface SendOptions {
  /** When false (the default) a failure is also thrown to the caller. */
  failSilently?: boolean;
  /** Overrides the plain-text part produced by the template. */
  plainMessage?: string;
}

export interface BatchOptions {
  batchSize?: number;
  plainMessage?: string;
}

export interface SendResult {
  success: boolean;
  error?: string;
}

export interface BatchSendError {
  recipient: string;
  error: string;
}

export interface BatchSendResult {
  total: number;
  successful: number;
  failed: number;
  batches: number;
  errors: BatchSendError[];
}

/**
 * Connection-level failures and SMTP 4xx replies are worth another attempt;
 * authentication, envelope and 5xx failures are not.
 */
export function isTransientMailError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  const responseCode = 'responseCode' in error ? error.responseCode : undefined;
  return typeof responseCode === 'number' && responseCode >= 400 && responseCode < 500;
}

/**
 * Drop blanks-after-trim duplicates case-insensitively, keeping the first spelling.
 */
export function dedupeRecipients(recipients: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const raw of recipients) {
    const recipient = (raw ?? '').trim();
    const key = recipient.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(recipient);
  }
  return unique;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

@Injectable()
export class EmailNotificationService {
  private readonly logger = new Logger(EmailNotificationService.name);
  private readonly configCheck: MailConfigCheck;
  private readonly transporter: Transporter | null = null;

  constructor(
    @Inject(MAIL_CONFIG)
    private readonly config: MailConfig,
    private readonly templateService: EmailTemplateService,
  ) {
    this.configCheck = validateMailConfig(config);

    for (const warning of this.configCheck.warnings) {
      this.logger.warn(warning);
    }

    if (this.configCheck.valid) {
      this.transporter = nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth: { user: config.user, pass: config.password },
      });
      this.logger.log(`Email transporter initialized: ${config.host}:${config.port}`);
    } else {
      this.logger.error(
        `Email service not properly configured: ${this.configCheck.errors.join(', ')}`,
      );
    }
  }

  /**
   * Result of validating the mail configuration this gateway was built with.
   */
  checkConfiguration(): MailConfigCheck {
    return {
      valid: this.configCheck.valid,
      errors: [...this.configCheck.errors],
      warnings: [...this.configCheck.warnings],
    };
  }

  getConfiguration(): Readonly<MailConfig> {
    return this.config;
  }

  /**
   * Send a single templated email.
   *
   * The returned tuple has the same shape whatever failSilently says;
   * the flag only decides whether a failure is also thrown.
   */
  async sendOne(
    recipient: string,
    subject: string,
    template: string,
    context: EmailContext = {},
    options: SendOptions = {},
  ): Promise<SendResult> {
    const failSilently = options.failSilently ?? false;

    try {
      await this.deliver(recipient, subject, template, context, options.plainMessage);
      return { success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Email to ${recipient || '<empty>'} failed: ${message}`);
      if (!failSilently) {
        throw error;
      }
      return { success: false, error: message };
    }
  }

  /**
   * Send the same templated email to many recipients.
   * Recipients are de-duplicated, split into groups of batchSize and sent
   * one after another; a failed recipient never stops the batch.
   */
  async sendBatch(
    recipients: string[],
    subject: string,
    template: string,
    context: EmailContext = {},
    options: BatchOptions = {},
  ): Promise<BatchSendResult> {
    const batchSize = Math.max(1, Math.floor(options.batchSize ?? this.config.defaultBatchSize));
    const unique = dedupeRecipients(recipients);

    const result: BatchSendResult = {
      total: unique.length,
      successful: 0,
      failed: 0,
      batches: 0,
      errors: [],
    };

    if (unique.length === 0) {
      this.logger.warn('No recipients provided for bulk email send');
      return result;
    }

    this.logger.log(
      `Starting bulk email send to ${unique.length} recipients in batches of ${batchSize}`,
    );

    for (let start = 0; start < unique.length; start += batchSize) {
      const batch = unique.slice(start, start + batchSize);
      result.batches++;
      this.logger.debug(`Processing batch ${result.batches} (${batch.length} recipients)`);

      for (const recipient of batch) {
        const outcome = await this.sendOne(recipient, subject, template, context, {
          failSilently: true,
          plainMessage: options.plainMessage,
        });

        if (outcome.success) {
          result.successful++;
        } else {
          result.failed++;
          result.errors.push({ recipient, error: outcome.error ?? 'Unknown error' });
        }
      }
    }

    this.logger.log(
      `Bulk email send complete - Total: ${result.total}, Successful: ${result.successful}, Failed: ${result.failed}`,
    );

    return result;
  }

  // ============================================================================
  // Private helpers
  // ============================================================================

  private async deliver(
    recipient: string,
    subject: string,
    template: string,
    context: EmailContext,
    plainMessage?: string,
  ): Promise<void> {
    if (!this.configCheck.valid || !this.transporter) {
      throw new MailConfigurationError(this.configCheck.errors);
    }

    const to = (recipient ?? '').trim();
    if (!to || !isEmail(to)) {
      throw new InvalidRecipientError(to);
    }

    const rendered = this.templateService.render(template, context);

    await this.sendWithRetry(this.transporter, {
      to,
      subject: this.sanitizeSubject(subject),
      html: rendered.html,
      text: plainMessage || rendered.text,
    });
  }

  private async sendWithRetry(
    transporter: Transporter,
    message: { to: string; subject: string; html: string; text: string },
  ): Promise<void> {
    for (let attempt = 1; attempt <= MAX_SEND_ATTEMPTS; attempt++) {
      try {
        const info = await transporter.sendMail({ from: this.config.from, ...message });
        this.logger.log(`Email sent: ${info.messageId} to ${message.to} (attempt ${attempt})`);
        return;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        const transient = isTransientMailError(error);

        if (!transient) {
          throw new MailTransportError(`Email send failed to ${message.to}: ${reason}`, false);
        }

        if (attempt === MAX_SEND_ATTEMPTS) {
          throw new MailTransportError(
            `Email send failed to ${message.to} after ${MAX_SEND_ATTEMPTS} attempts: ${reason}`,
            true,
          );
        }

        this.logger.warn(
          `Email send failed to ${message.to}: ${reason} - retrying in ${this.config.retryDelayMs}ms (attempt ${attempt}/${MAX_SEND_ATTEMPTS})`,
        );
        await sleep(this.config.retryDelayMs);
      }
    }
  }

  /**
   * Strip CR/LF so user data cannot inject extra mail headers.
   */
  private sanitizeSubject(subject: string): string {
    return String(subject ?? '').replace(/[\r\n]+/g, ' ').trim();
  }
}
