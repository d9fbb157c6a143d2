#!/usr/bin/env ts-node
/**
 * Send one templated message to a group of members.
 *
 * Usage:
 *   npm run cli:send-bulk-email -- --target all_members --subject "Meeting" --message "Friday 4pm"
 *   npm run cli:send-bulk-email -- --target department:programming --subject "Hackathon"
 *   npm run cli:send-bulk-email -- --target a@example.com,b@example.com --subject "Hello"
 *
 * Targets: all_members, approved_members, pending_members,
 * department:<name>, or a comma-separated list of addresses.
 * Templates: announcement (default) or test-email.
 */
import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { DataCommandModule } from './command.module';
import { describeBatchResult, sendBulkEmail } from './mail-commands';
import { runCommand } from './run-command';
import { EmailNotificationService } from '../modules/email/services/email-notification.service';
import { MemberAudienceService } from '../modules/members/services/member-audience.service';

const { values } = parseArgs({
  options: {
    target: { type: 'string' },
    subject: { type: 'string' },
    template: { type: 'string' },
    message: { type: 'string' },
  },
});

void runCommand(DataCommandModule, async (app) => {
  if (!values.target || !values.subject) {
    console.error('❌ --target and --subject are required');
    return 1;
  }

  const result = await sendBulkEmail(app.get(MemberAudienceService), app.get(EmailNotificationService), {
    target: values.target,
    subject: values.subject,
    template: values.template,
    message: values.message,
  });

  for (const line of describeBatchResult(result)) {
    console.log(line);
  }

  return result.failed > 0 ? 1 : 0;
});
