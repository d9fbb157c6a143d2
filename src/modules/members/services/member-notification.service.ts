import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Member } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';
import {
  BatchSendResult,
  EmailNotificationService,
  SendResult,
} from '../../email/services/email-notification.service';
import { EmailContext, EmailTemplate } from '../../email/services/email-template.service';
import { pictureDeadline } from '../picture-deadline.policy';

/** Staff alerts go out in smaller groups than member-wide mailings. */
export const STAFF_BATCH_SIZE = 50;
export const ANNOUNCEMENT_BATCH_SIZE = 100;

export interface RegistrationNotificationResult {
  confirmation: SendResult;
  staffAlert: BatchSendResult;
}

export interface ContactMessage {
  name: string;
  email: string;
  subject: string;
  message: string;
}

/**
 * MemberNotificationService
 *
 * Builds the notification for each membership event and hands it to the
 * gateway. Every send here fails silently: callers get the outcome, never
 * an exception, so a mail problem cannot undo a registration or review.
 */
@Injectable()
export class MemberNotificationService {
  private readonly logger = new Logger(MemberNotificationService.name);
  private readonly siteUrl: string;

  constructor(
    private readonly emailService: EmailNotificationService,
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    configService: ConfigService,
  ) {
    this.siteUrl = (configService.get<string>('SITE_URL') || 'http://localhost:3000').replace(/\/+$/, '');
  }

  /**
   * Confirmation to the new member plus an alert to every system admin and
   * the department leader.
   */
  async notifyRegistered(member: Member, department: Department): Promise<RegistrationNotificationResult> {
    const confirmation = await this.emailService.sendOne(
      member.email,
      'Welcome to ICT Club - Account Pending Approval',
      EmailTemplate.REGISTRATION_CONFIRMATION,
      this.withSite({
        fullName: member.fullName,
        regNumber: member.regNumber,
        departmentName: department.name,
      }),
      { failSilently: true },
    );

    const staffEmails = await this.getStaffEmails(department);
    const staffAlert = await this.emailService.sendBatch(
      staffEmails,
      `New Registration: ${member.fullName}`,
      EmailTemplate.STAFF_NEW_REGISTRATION,
      this.withSite({
        fullName: member.fullName,
        regNumber: member.regNumber,
        email: member.email,
        departmentName: department.name,
        registeredAt: member.registeredAt,
        reviewUrl: `${this.siteUrl}/members/pending`,
      }),
      { batchSize: STAFF_BATCH_SIZE },
    );

    if (staffEmails.length === 0) {
      this.logger.warn(`No staff recipients for registration of ${member.regNumber}`);
    }

    return { confirmation, staffAlert };
  }

  async notifyApproved(member: Member): Promise<SendResult> {
    return this.emailService.sendOne(
      member.email,
      'Your ICT Club Account Has Been Approved!',
      EmailTemplate.MEMBER_APPROVED,
      this.withSite({
        fullName: member.fullName,
        pictureDeadline: pictureDeadline(member) ?? undefined,
        uploadUrl: `${this.siteUrl}/profile/picture`,
      }),
      { failSilently: true },
    );
  }

  async notifyRejected(member: Member, reason?: string): Promise<SendResult> {
    return this.emailService.sendOne(
      member.email,
      'ICT Club Registration - Status Update',
      EmailTemplate.MEMBER_REJECTED,
      this.withSite({ fullName: member.fullName, reason }),
      { failSilently: true },
    );
  }

  async sendPictureReminder(member: Member, deadline: Date): Promise<SendResult> {
    return this.emailService.sendOne(
      member.email,
      'Picture Upload Reminder - ICT Club',
      EmailTemplate.PICTURE_REMINDER,
      this.withSite({
        fullName: member.fullName,
        deadline,
        uploadUrl: `${this.siteUrl}/profile/picture`,
      }),
      { failSilently: true },
    );
  }

  async sendAnnouncement(
    title: string,
    content: string,
    recipients: Array<string | Pick<Member, 'email'>>,
  ): Promise<BatchSendResult> {
    const emails = recipients.map((recipient) =>
      typeof recipient === 'string' ? recipient : recipient.email,
    );

    return this.emailService.sendBatch(
      emails,
      `Announcement: ${title}`,
      EmailTemplate.ANNOUNCEMENT,
      this.withSite({ title, message: content }),
      { batchSize: ANNOUNCEMENT_BATCH_SIZE, plainMessage: content },
    );
  }

  /**
   * Forward a visitor's message to every system admin, or to the
   * configured sender address when there are none.
   */
  async sendContactMessage(contact: ContactMessage): Promise<BatchSendResult> {
    let recipients = await this.getAdminEmails();
    if (recipients.length === 0) {
      const fallback = this.emailService.getConfiguration().from;
      recipients = fallback ? [fallback] : [];
    }

    return this.emailService.sendBatch(
      recipients,
      `New Contact Message: ${contact.subject}`,
      EmailTemplate.CONTACT_MESSAGE,
      this.withSite({ ...contact }),
      { batchSize: STAFF_BATCH_SIZE },
    );
  }

  // ============================================================================
  // Recipient lookup
  // ============================================================================

  private async getAdminEmails(): Promise<string[]> {
    const admins = await this.memberRepository.find({
      where: { isSystemAdmin: true, isActive: true },
      select: { id: true, email: true },
    });
    return admins.map((admin) => admin.email);
  }

  private async getStaffEmails(department: Department): Promise<string[]> {
    const emails = await this.getAdminEmails();

    if (department.leaderId) {
      const leader =
        department.leader ??
        (await this.memberRepository.findOne({ where: { id: department.leaderId, isActive: true } }));
      if (leader && leader.isActive) {
        emails.push(leader.email);
      }
    }

    return emails;
  }

  private withSite(context: EmailContext): EmailContext {
    return { ...context, siteUrl: this.siteUrl };
  }
}
