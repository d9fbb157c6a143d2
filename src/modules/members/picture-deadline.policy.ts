/**
 * Picture-deadline policy
 *
 * An approved member must upload a profile picture within 72 hours of
 * approval. Until approval there is no deadline; once a picture has been
 * uploaded the obligation is satisfied for good.
 */

import { Member } from '../../database/entities/member.entity';

export const PICTURE_DEADLINE_HOURS = 72;
export const PICTURE_DEADLINE_MS = PICTURE_DEADLINE_HOURS * 60 * 60 * 1000;

export type PictureDeadlineSubject = Pick<Member, 'approvedAt' | 'pictureUploadedAt'>;

export function pictureDeadline(member: PictureDeadlineSubject): Date | null {
  if (!member.approvedAt) {
    return null;
  }
  return new Date(member.approvedAt.getTime() + PICTURE_DEADLINE_MS);
}

export function isPictureOverdue(member: PictureDeadlineSubject, now: Date = new Date()): boolean {
  if (member.pictureUploadedAt) {
    return false;
  }
  const deadline = pictureDeadline(member);
  if (!deadline) {
    return false;
  }
  return now.getTime() > deadline.getTime();
}

/**
 * Milliseconds left before the deadline; 0 when there is none, the picture
 * is uploaded or the deadline has passed.
 */
export function pictureTimeRemaining(member: PictureDeadlineSubject, now: Date = new Date()): number {
  if (member.pictureUploadedAt) {
    return 0;
  }
  const deadline = pictureDeadline(member);
  if (!deadline) {
    return 0;
  }
  return Math.max(0, deadline.getTime() - now.getTime());
}

export function isWithinReminderWindow(
  member: PictureDeadlineSubject,
  now: Date,
  windowMs: number,
): boolean {
  if (member.pictureUploadedAt || isPictureOverdue(member, now)) {
    return false;
  }
  const deadline = pictureDeadline(member);
  if (!deadline) {
    return false;
  }
  return deadline.getTime() - now.getTime() <= windowMs;
}
