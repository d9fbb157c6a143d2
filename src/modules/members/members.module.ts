import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { EmailModule } from '../email/email.module';
import { PermissionService } from '../../common/services/permission.service';
import { MembersController } from './members.controller';
import { RegistrationService } from './services/registration.service';
import { ApprovalService } from './services/approval.service';
import { MembersService } from './services/members.service';
import { MemberNotificationService } from './services/member-notification.service';
import { MemberAudienceService } from './services/member-audience.service';
import { MemberBootstrapService } from './services/member-bootstrap.service';
import { PictureReminderService } from './tasks/picture-reminder.service';

@Module({
  imports: [DatabaseModule, EmailModule],
  controllers: [MembersController],
  providers: [
    RegistrationService,
    ApprovalService,
    MembersService,
    MemberNotificationService,
    MemberAudienceService,
    MemberBootstrapService,
    PictureReminderService,
    PermissionService,
  ],
  exports: [
    MembersService,
    MemberNotificationService,
    MemberAudienceService,
    MemberBootstrapService,
  ],
})
export class MembersModule {}
