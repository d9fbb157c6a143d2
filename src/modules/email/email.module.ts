/**
 * EmailModule
 *
 * Mail configuration, template rendering and the notification gateway used
 * by the membership workflows and management commands.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { MAIL_CONFIG, buildMailConfig } from './config/mail.config';
import { EmailNotificationService } from './services/email-notification.service';
import { EmailTemplateService } from './services/email-template.service';

@Module({
  providers: [
    {
      provide: MAIL_CONFIG,
      useFactory: buildMailConfig,
      inject: [ConfigService],
    },
    EmailNotificationService,
    EmailTemplateService,
  ],
  exports: [MAIL_CONFIG, EmailNotificationService, EmailTemplateService],
})
export class EmailModule {}
