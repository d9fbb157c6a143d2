import { MailConfig, MailConfigCheck } from '../modules/email/config/mail.config';
import {
  BatchSendResult,
  EmailNotificationService,
  SendResult,
} from '../modules/email/services/email-notification.service';
import { EmailTemplate, isEmailTemplate } from '../modules/email/services/email-template.service';
import { MemberAudienceService } from '../modules/members/services/member-audience.service';
import { ANNOUNCEMENT_BATCH_SIZE } from '../modules/members/services/member-notification.service';

export const MAX_REPORTED_ERRORS = 10;

/** Templates that render from the bulk context, `{ title, message }`. */
export const BULK_EMAIL_TEMPLATES: readonly EmailTemplate[] = [
  EmailTemplate.ANNOUNCEMENT,
  EmailTemplate.TEST_EMAIL,
];

export interface BulkEmailOptions {
  target: string;
  subject: string;
  template?: string;
  message?: string;
}

export function describeMailConfiguration(
  config: Readonly<MailConfig>,
  check: MailConfigCheck,
): string[] {
  const lines = [
    'Mail configuration',
    `  SMTP_HOST:   ${config.host || '(not set)'}`,
    `  SMTP_PORT:   ${config.port}`,
    `  SMTP_SECURE: ${config.secure}`,
    `  SMTP_USER:   ${config.user || '(not set)'}`,
    `  SMTP_PASS:   ${config.password ? '********' : '(not set)'}`,
    `  SMTP_FROM:   ${config.from || '(not set)'}`,
    '',
    check.valid ? '✅ Configuration is valid' : '❌ Configuration is invalid',
  ];
  for (const error of check.errors) {
    lines.push(`  error: ${error}`);
  }
  for (const warning of check.warnings) {
    lines.push(`  warning: ${warning}`);
  }
  return lines;
}

/**
 * Throws on failure, so the operator sees the transport error.
 */
export async function sendTestEmail(
  emailService: EmailNotificationService,
  recipient: string,
  now: Date = new Date(),
): Promise<SendResult> {
  return emailService.sendOne(
    recipient,
    'ICT Club - Test Email',
    EmailTemplate.TEST_EMAIL,
    { recipientEmail: recipient, timestamp: now },
    { failSilently: false },
  );
}

export async function sendBulkEmail(
  audience: MemberAudienceService,
  emailService: EmailNotificationService,
  options: BulkEmailOptions,
): Promise<BatchSendResult> {
  const template = options.template || EmailTemplate.ANNOUNCEMENT;
  if (!isEmailTemplate(template)) {
    throw new Error(`Unknown template: ${template}`);
  }
  if (!BULK_EMAIL_TEMPLATES.includes(template)) {
    throw new Error(
      `Template ${template} cannot be used for bulk email (use one of: ${BULK_EMAIL_TEMPLATES.join(', ')})`,
    );
  }

  const subject = options.subject.trim();
  if (!subject) {
    throw new Error('--subject is required');
  }

  const recipients = await audience.resolve(options.target);
  if (recipients.length === 0) {
    throw new Error('No recipients found for the specified target');
  }

  const message = options.message ?? '';
  return emailService.sendBatch(
    recipients,
    subject,
    template,
    { title: subject, message },
    { batchSize: ANNOUNCEMENT_BATCH_SIZE, plainMessage: message || undefined },
  );
}

export function describeBatchResult(result: BatchSendResult): string[] {
  const lines = [
    `Total:      ${result.total}`,
    `Successful: ${result.successful}`,
    `Failed:     ${result.failed}`,
    `Batches:    ${result.batches}`,
  ];

  if (result.errors.length > 0) {
    lines.push('', 'Errors:');
    for (const { recipient, error } of result.errors.slice(0, MAX_REPORTED_ERRORS)) {
      lines.push(`  ${recipient}: ${error}`);
    }
    if (result.errors.length > MAX_REPORTED_ERRORS) {
      lines.push(`  ... and ${result.errors.length - MAX_REPORTED_ERRORS} more`);
    }
  }

  return lines;
}
