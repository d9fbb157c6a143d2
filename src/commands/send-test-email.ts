#!/usr/bin/env ts-node
/**
 * Send the test template to one address, failing loudly.
 *
 * Usage:
 *   npm run cli:send-test-email -- --recipient someone@example.com
 */
import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { MailCommandModule } from './command.module';
import { sendTestEmail } from './mail-commands';
import { runCommand } from './run-command';
import { EmailNotificationService } from '../modules/email/services/email-notification.service';

const { values } = parseArgs({
  options: {
    recipient: { type: 'string' },
  },
});

void runCommand(MailCommandModule, async (app) => {
  if (!values.recipient) {
    console.error('❌ --recipient is required');
    return 1;
  }

  const emailService = app.get(EmailNotificationService);
  const check = emailService.checkConfiguration();
  if (!check.valid) {
    console.error(`❌ Mail is not configured: ${check.errors.join(', ')}`);
    return 1;
  }

  console.log(`📧 Sending test email to ${values.recipient}...`);
  await sendTestEmail(emailService, values.recipient);
  console.log('✅ Test email sent');
  return 0;
});
