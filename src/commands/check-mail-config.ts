#!/usr/bin/env ts-node
/**
 * Print the mail settings (password masked) and whether they are usable.
 *
 * Usage:
 *   npm run cli:check-mail-config
 */
import 'reflect-metadata';
import { MailCommandModule } from './command.module';
import { describeMailConfiguration } from './mail-commands';
import { runCommand } from './run-command';
import { EmailNotificationService } from '../modules/email/services/email-notification.service';

void runCommand(MailCommandModule, async (app) => {
  const emailService = app.get(EmailNotificationService);
  const check = emailService.checkConfiguration();

  for (const line of describeMailConfiguration(emailService.getConfiguration(), check)) {
    console.log(line);
  }

  return check.valid ? 0 : 1;
});
