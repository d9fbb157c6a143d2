import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, MoreThan, Repository } from 'typeorm';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { MemberNotificationService } from '../services/member-notification.service';
import { PICTURE_DEADLINE_MS, isWithinReminderWindow, pictureDeadline } from '../picture-deadline.policy';

export const DEFAULT_REMINDER_WINDOW_HOURS = 24;

export interface ReminderRunSummary {
  candidates: number;
  sent: number;
  failed: number;
}

@Injectable()
export class PictureReminderService {
  private readonly logger = new Logger(PictureReminderService.name);
  private readonly windowMs: number;

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    private readonly memberNotificationService: MemberNotificationService,
    configService: ConfigService,
  ) {
    const hours = Number(configService.get<string>('PICTURE_REMINDER_WINDOW_HOURS'));
    this.windowMs = (hours > 0 ? hours : DEFAULT_REMINDER_WINDOW_HOURS) * 60 * 60 * 1000;
  }

  /**
   * Hourly: mail every approved member whose picture deadline falls inside
   * the reminder window. Each member is reminded at most once.
   */
  @Cron(CronExpression.EVERY_HOUR)
  async sendDueReminders(now: Date = new Date()): Promise<ReminderRunSummary> {
    const candidates = await this.memberRepository.find({
      where: {
        status: MemberStatus.APPROVED,
        isActive: true,
        pictureUploadedAt: IsNull(),
        pictureReminderSentAt: IsNull(),
        approvedAt: MoreThan(new Date(now.getTime() - PICTURE_DEADLINE_MS)),
      },
    });

    const due = candidates.filter((member) => isWithinReminderWindow(member, now, this.windowMs));
    const summary: ReminderRunSummary = { candidates: due.length, sent: 0, failed: 0 };

    for (const member of due) {
      const deadline = pictureDeadline(member);
      if (!deadline) continue;

      try {
        const result = await this.memberNotificationService.sendPictureReminder(member, deadline);
        if (!result.success) {
          this.logger.warn(`Picture reminder to ${member.email} failed: ${result.error}`);
          summary.failed++;
          continue;
        }

        await this.memberRepository.update({ id: member.id }, { pictureReminderSentAt: now });
        summary.sent++;
      } catch (error) {
        this.logger.error(
          `Failed to process picture reminder for member: ${member.id}`,
          error instanceof Error ? error.stack : String(error),
        );
        summary.failed++;
      }
    }

    if (due.length > 0) {
      this.logger.log(
        `Picture reminders completed. Sent: ${summary.sent}, Failed: ${summary.failed}`,
      );
    }

    return summary;
  }
}
